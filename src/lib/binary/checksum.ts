/**
 * Internet checksum, RFC 1071: the one's complement of the one's complement sum
 * of the 16-bit words of `buf`.
 * @param initial partial sum to start from, eg. a pseudo header sum
 */
export function calculateChecksum(buf: Uint8Array, initial = 0): number {
    return ~foldSum(sum16(buf, initial)) & 0xffff;
}

/**
 * Sum of the 16-bit big endian words in `buf`, a trailing odd byte is padded with zero.
 * Carries are not folded.
 */
export function sum16(buf: Uint8Array, initial = 0): number {
    let sum = initial;
    for (let i = 0; i < buf.byteLength; i += 2) {
        sum += (buf[i] << 8) | (i + 1 < buf.byteLength ? buf[i + 1] : 0);
    }
    return sum;
}

/** folds the carries above bit 16 back in, until none remain */
export function foldSum(sum: number): number {
    while (sum > 0xffff) {
        sum = (sum % 0x10000) + Math.floor(sum / 0x10000);
    }
    return sum;
}

/** ICMP style checksum, where a computed zero is transmitted as `0xffff` */
export function calculateIcmpChecksum(buf: Uint8Array, initial = 0): number {
    let checksum = calculateChecksum(buf, initial);
    return checksum == 0 ? 0xffff : checksum;
}
