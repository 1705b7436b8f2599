import { Struct, StructDefinition } from "../struct";
import { StructType, StructTypes } from "../shared";

/** embeds a struct as a single value, it is decoded with the options of the enclosing struct */
export function STRUCT<Types extends StructTypes, Instance extends Struct<Types>>(definition: StructDefinition<Types, Instance>): StructType<Instance> {
    return {
        bitLength: -1,
        greedy: definition.greedy,
        defaultValue: () => definition.create(),
        decode: (buf, options) => definition.decode(buf, options),
        encode: (value, options) => value.getBuffer(options),
        size: value => value.size,
        toHuman: value => `{ ${value.toHuman().split("\n").join(", ")} }`,
    };
}
