/**
 * Frame compression using pako (zlib).
 */

import pako from 'pako';

/**
 * Deflate a frame.
 *
 * @param data - Encoded frame bytes
 * @param level - zlib level, 0 returns the input unchanged
 */
export function compressFrame(data: Uint8Array, level: pako.DeflateOptions['level'] = 6): Uint8Array {
  if (level === 0) {
    return data;
  }

  const compressed = pako.deflate(data, { level });
  const ratio = data.length > 0 ? (compressed.length / data.length) * 100 : 0;
  console.debug(
    `Compressed frame ${data.length} bytes -> ${compressed.length} bytes (${ratio.toFixed(1)}%)`
  );
  return compressed;
}

/**
 * Inflate a frame written by compressFrame.
 */
export function decompressFrame(data: Uint8Array): Uint8Array {
  return pako.inflate(data);
}
