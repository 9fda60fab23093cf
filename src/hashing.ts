import md5 from 'md5';

export function getMD5Hash(input: string): string {
  return md5(input);
}

/**
 * Takes the first 4 bytes of the md5 hex digest as an unsigned integer
 * (8 hex characters represent 4 bytes, e.g. 0xffffffff is the max 4-byte integer).
 */
export function hashToUint32(input: string): number {
  return parseInt(getMD5Hash(input).slice(0, 8), 16);
}
