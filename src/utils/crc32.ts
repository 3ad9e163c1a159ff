// CRC-32 (IEEE, reflected) used to fingerprint framebuffers and screenshots
const TABLE = new Uint32Array(256).map((_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = (c & 1) ? 0xEDB88320 ^ (c >>> 1) : (c >>> 1);
  return c >>> 0;
});

// Pass a previous result as `prev` to continue a checksum across chunks
export function crc32(bytes: ArrayLike<number>, prev = 0): number {
  let crc = ~prev >>> 0;
  for (let i = 0; i < bytes.length; i++) {
    crc = (crc >>> 8) ^ TABLE[(crc ^ bytes[i]) & 0xFF];
  }
  return (~crc) >>> 0;
}
