/**
 * ByteReader - cursor over a bencoded buffer
 * The lookahead is derived from pos on every read
 */

import { BencodeError } from './types';
import { EOF, Token, describeByte, isDigit } from './tokens';

export class ByteReader {
  public readonly data: Uint8Array;
  public pos: number = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  get offset(): number {
    return this.pos;
  }

  get remaining(): number {
    return this.data.length - this.pos;
  }

  get atEnd(): boolean {
    return this.pos >= this.data.length;
  }

  /**
   * Byte at pos, or EOF once every byte has been consumed
   */
  peek(): number {
    return this.pos < this.data.length ? this.data[this.pos] : EOF;
  }

  consume(expected: Token): void {
    const found = this.peek();
    if (found !== expected) {
      throw new BencodeError(
        'UnexpectedByte',
        this.pos,
        `Expected ${describeByte(expected)}, found ${describeByte(found)}`
      );
    }
    this.pos++;
  }

  readDigit(): number {
    const byte = this.peek();
    if (!isDigit(byte)) {
      throw new BencodeError('InvalidGrammar', this.pos, `Expected a digit, found ${describeByte(byte)}`);
    }
    this.pos++;
    return byte - Token.Zero;
  }

  /**
   * Reads a run of decimal digits. "0" is only valid on its own.
   */
  readNumber(): string {
    if (this.peek() === Token.Zero) {
      this.pos++;
      if (isDigit(this.peek())) {
        throw new BencodeError('LeadingZero', this.pos, 'Leading zeros are not allowed');
      }
      return '0';
    }

    let digits = '';
    while (isDigit(this.peek())) {
      digits += this.readDigit();
    }

    if (digits.length === 0) {
      throw new BencodeError(
        'InvalidGrammar',
        this.pos,
        `Expected at least one digit, found ${describeByte(this.peek())}`
      );
    }
    return digits;
  }

  /**
   * Copies the next length bytes out of the buffer
   */
  readBytes(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new BencodeError(
        'TruncatedString',
        this.pos,
        `Byte string declares ${length} bytes but only ${this.remaining} remain`
      );
    }
    const result = new Uint8Array(this.data.subarray(this.pos, this.pos + length));
    this.pos += length;
    return result;
  }
}
