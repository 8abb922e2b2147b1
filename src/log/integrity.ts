/**
 * Standard CRC32 implementation (table-based, IEEE polynomial).
 */
const CRC_TABLE = new Uint32Array(256);
for (let i = 0; i < 256; i++) {
    let c = i;
    for (let j = 0; j < 8; j++) {
        c = (c & 1) ? (0xEDB88320 ^ (c >>> 1)) : (c >>> 1);
    }
    CRC_TABLE[i] = c;
}

function update(crc: number, data: Uint8Array): number {
    for (let i = 0; i < data.length; i++) {
        crc = (crc >>> 8) ^ CRC_TABLE[(crc ^ data[i]) & 0xFF];
    }
    return crc;
}

export function calculateCRC32(data: Uint8Array): number {
    return (update(0xFFFFFFFF, data) ^ 0xFFFFFFFF) >>> 0;
}

/**
 * Checksum stored in a record header: CRC32 over the type byte followed by the payload.
 */
export function recordChecksum(type: number, payload: Uint8Array): number {
    const crc = update(0xFFFFFFFF, Uint8Array.of(type & 0xFF));
    return (update(crc, payload) ^ 0xFFFFFFFF) >>> 0;
}
