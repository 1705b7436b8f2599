// SOURCE <https://ietf-opsawg-wg.github.io/draft-ietf-opsawg-pcap/draft-ietf-opsawg-pcapng.html>

export const PCAPNG_MAGIC_NUMBER = 0x0A0D0D0A;

/** the byte order magic read as big endian, it reads reversed in little endian sections */
export const PCAPNG_BYTE_ORDER_MAGIC_BIG = 0x1A2B3C4D;
export const PCAPNG_BYTE_ORDER_MAGIC_LITTLE = 0x4D3C2B1A;

export const PCAPNG_BLOCK_TYPES = {
    SECTION_HEADER: PCAPNG_MAGIC_NUMBER,
    IFACE_DESC: 0x00000001,
    SPACKET: 0x00000003,
    EPACKET: 0x00000006,
} as const satisfies Record<string, number>;

export const PCAPNG_OPTION_TYPES = {
    END_OF_OPTIONS: 0,
    COMMENT: 1,
    IF_NAME: 2,
    IF_DESCRIPTION: 3,
    IF_TSRESOL: 9,
} as const satisfies Record<string, number>;

/** section length of a section header that does not know it */
export const SECTION_LENGTH_UNKNOWN = -1n;

/** if_tsresol when the option is missing, microseconds */
export const DEFAULT_TSRESOL = 6;

/** type and both length fields */
export const BLOCK_FRAME_SIZE = 12;
