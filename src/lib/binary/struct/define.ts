import { CreateStructTypeError } from "../../errors";
import { PlainStructDefinition } from "./struct";
import { StructOptions, StructType, StructTypes } from "./shared";

export function defineStruct<Types extends StructTypes>(input: Types, options: Partial<StructOptions> = {}) {
    return new PlainStructDefinition<Types>(input, options)
}

/**
 * Makes a value type callable with a narrower bitLength, eg. `UINT8(4)` for a nibble.
 * Narrowed types are meant for bit-field groups.
 */
export function defineSizedType<ST extends StructType<unknown>>(input: ST, resize: (bitLength: number) => ST) {
    return Object.assign((bitLength: number): ST => {
        if (input.bitLength < bitLength || bitLength < 1) {
            throw new CreateStructTypeError(defineSizedType, `bitLength "${bitLength}" does not fit type size "${input.bitLength}".`)
        }
        return resize(bitLength);
    }, input)
}
