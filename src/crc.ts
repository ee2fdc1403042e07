/**
 * CRC-16/MODBUS (reflected polynomial 0xA001, initial value 0xFFFF).
 */

function buildTable(): Uint16Array {
  const table = new Uint16Array(256);
  for (let n = 0; n < 256; n++) {
    let c = n;
    for (let k = 0; k < 8; k++) {
      c = c & 1 ? (c >>> 1) ^ 0xa001 : c >>> 1;
    }
    table[n] = c;
  }
  return table;
}

const TABLE = buildTable();

export function calculateCRC16(bytes: ArrayLike<number>): number {
  let crc = 0xffff;
  for (let i = 0; i < bytes.length; i++) {
    crc = (crc >>> 8) ^ TABLE[(crc ^ bytes[i]) & 0xff];
  }
  return crc & 0xffff;
}

/** CRC as it travels on the wire: low byte first. */
export function crcBytes(bytes: ArrayLike<number>): [number, number] {
  const crc = calculateCRC16(bytes);
  return [crc & 0xff, (crc >>> 8) & 0xff];
}
