/**
 * Bencode TypeScript Decoder
 * Zero-dependency decoder for bencoded data
 */

export { BencodeDecoder } from './decoder';
export { ByteReader } from './reader';
export * from './tokens';
export * from './types';
export * from './values';

import { BencodeDecoder } from './decoder';
import { Token, isDigit } from './tokens';
import { BencodedValue, DecoderOptions } from './types';

/**
 * Convenience function to decode a complete bencoded buffer
 */
export function decode(data: Uint8Array, options?: DecoderOptions): BencodedValue {
  const decoder = new BencodeDecoder(options);
  return decoder.decode(data);
}

/**
 * Check if data starts with a byte that opens a bencoded value
 */
export function startsValue(data: Uint8Array): boolean {
  if (data.length === 0) return false;
  const first = data[0];
  return first === Token.Dict || first === Token.List || first === Token.Int || isDigit(first);
}

// Version info
export const VERSION = '0.1.0';
