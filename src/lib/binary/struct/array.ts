import { CreateStructTypeError, FormatError, ParseError, StructValueError } from "../../errors";
import { uint8_concat } from "../uint8-array";
import { StructBound, StructOptions, StructType } from "./shared";

export type ArraySize = number | { counter: string };

/**
 * Homogeneous sequence of `sType`.
 *
 * - `ARRAY(sType, 4)` always holds four elements
 * - `ARRAY(sType, { counter: "count" })` holds as many elements as the `count` field says,
 *   the counter is read again before every element
 * - `ARRAY(sType)` holds elements until its input, or the length given by `LENGTH_FROM`, is used up
 */
export function ARRAY<T>(sType: StructType<T>, size?: ArraySize): StructType<T[]> {
    if (sType.bitLength > 0 && sType.bitLength % 8 != 0) {
        throw new CreateStructTypeError(ARRAY, "Cannot create an 'array type' with a bitLength that is not a multiple of 8")
    }

    let fixed = typeof size == "number" ? size : undefined;
    let counter = typeof size == "object" ? size.counter : undefined;

    function decodeElement(buf: Uint8Array, options: StructOptions, bound: StructBound): [T, number] {
        let budgeted = bound.length !== undefined;
        if (sType.bitLength > 0 && buf.byteLength < sType.bitLength / 8) {
            if (budgeted) {
                throw new FormatError("array element overruns the array length");
            }
            throw new ParseError("too few bytes for array element", sType.bitLength / 8, buf.byteLength);
        }

        try {
            return sType.decode(buf, options, {});
        } catch (error) {
            if (budgeted && error instanceof ParseError) {
                throw new FormatError("array element overruns the array length", { cause: error });
            }
            throw error;
        }
    }

    return {
        bitLength: fixed !== undefined && sType.bitLength > 0 ? sType.bitLength * fixed : -1,
        greedy: fixed === undefined && counter === undefined,
        counter,
        defaultValue: () => Array.from({ length: fixed ?? 0 }, () => sType.defaultValue()),
        decode(buf, options, bound) {
            let values: T[] = [], offset = 0;
            let more = (): boolean => {
                if (fixed !== undefined) return values.length < fixed;
                if (bound.count) return values.length < bound.count();
                return offset < buf.byteLength;
            };

            while (more()) {
                let [value, consumed] = decodeElement(buf.subarray(offset), options, bound);
                if (consumed == 0) {
                    throw new FormatError("array element has no length");
                }
                values.push(value);
                offset += consumed;
            }

            return [values, offset];
        },
        encode(values, options) {
            if (fixed !== undefined && values.length != fixed) {
                throw new StructValueError(`expected ${fixed} elements`, values);
            }
            return uint8_concat(values.map(v => sType.encode(v, options)));
        },
        size: (values, options) => values.reduce((sum, v) => sum + sType.size(v, options), 0),
        toHuman: values => `[${values.map(v => sType.toHuman(v)).join(", ")}]`,
    };
}
