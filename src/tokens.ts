/**
 * Grammar bytes for bencoding
 */

export enum Token {
  Dict = 0x64,   // 'd'
  List = 0x6c,   // 'l'
  Int = 0x69,    // 'i'
  End = 0x65,    // 'e'
  Colon = 0x3a,  // ':'
  Minus = 0x2d,  // '-'
  Zero = 0x30,   // '0'
  Nine = 0x39,   // '9'
}

// Lookahead past the last byte
export const EOF = -1;

export function isDigit(byte: number): boolean {
  return byte >= Token.Zero && byte <= Token.Nine;
}

export function describeByte(byte: number): string {
  if (byte === EOF) return 'end of input';
  if (byte >= 0x20 && byte < 0x7f) return `'${String.fromCharCode(byte)}'`;
  return `0x${byte.toString(16).padStart(2, '0')}`;
}
