import { FormatError, ParseError } from "../errors";
import { TLV, UINT16, defineTLV } from "../binary/struct";
import { uint8_concat, uint8_fromString, uint8_padLength, uint8_toString } from "../binary/uint8-array";
import { PCAPNG_OPTION_TYPES } from "./constants";

/**
 ```txt
                  1                   2                   3
0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
|      Option Type              |         Option Length         |
+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
/                       Option Value                            /
/              variable length, padded to 32 bits               /
+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 ```
 * The padding is not part of the option, `readOptions` and `writeOptions` handle it.
 */
export const PCAPNG_OPTION = defineTLV(UINT16, UINT16)
    .register(PCAPNG_OPTION_TYPES.COMMENT, { toHuman: uint8_toString, fromHuman: uint8_fromString });

/**
 * Decodes the options in `raw` up to the end of options marker or the end of `raw`.
 * @throws {FormatError} when an option is longer than what is left of `raw`
 */
export function readOptions(raw: Uint8Array, bigEndian: boolean): TLV[] {
    let options: TLV[] = [];
    let offset = 0;

    while (offset < raw.byteLength) {
        let [option, consumed] = decodeOption(raw, offset, bigEndian);
        if (option.get("type") == PCAPNG_OPTION_TYPES.END_OF_OPTIONS) break;

        options.push(option);
        offset += consumed + uint8_padLength(option.get("length"));
    }

    return options;
}

function decodeOption(raw: Uint8Array, offset: number, bigEndian: boolean): [TLV, number] {
    try {
        return PCAPNG_OPTION.decode(raw.subarray(offset), { bigEndian });
    } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        throw new FormatError(`option at offset ${offset} overruns the options`, { cause: error });
    }
}

/** encodes `options`, each padded to 32 bits, followed by the end of options marker */
export function writeOptions(options: readonly TLV[], bigEndian: boolean): Uint8Array {
    if (!options.length) return new Uint8Array(0);

    let parts: Uint8Array[] = [];
    for (let option of options) {
        let buf = option.getBuffer({ bigEndian });
        parts.push(buf, new Uint8Array(uint8_padLength(buf.byteLength)));
    }
    parts.push(PCAPNG_OPTION.create({ type: PCAPNG_OPTION_TYPES.END_OF_OPTIONS }).getBuffer({ bigEndian }));

    return uint8_concat(parts);
}

export function createOption(type: number, value: Uint8Array | string): TLV {
    return PCAPNG_OPTION.create({ type, value: typeof value == "string" ? uint8_fromString(value) : value });
}

export function findOption(options: readonly TLV[], type: number): TLV | undefined {
    return options.find(o => o.get("type") == type);
}

/** values of the opt_comment options */
export function readComments(raw: Uint8Array, bigEndian: boolean): string[] {
    return readOptions(raw, bigEndian)
        .filter(o => o.get("type") == PCAPNG_OPTION_TYPES.COMMENT)
        .map(o => uint8_toString(o.get("value")));
}
