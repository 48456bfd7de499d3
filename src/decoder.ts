/**
 * BencodeDecoder - recursive-descent decoder for bencoded data
 *
 * One byte of lookahead picks the production; a production is never
 * abandoned once chosen. Lists and dictionaries must hold at least one
 * element, so "le" and "de" are rejected.
 */

import {
  BencodeError,
  BencodeLimitError,
  BencodedBytes,
  BencodedDictionary,
  BencodedInteger,
  BencodedList,
  BencodedValue,
  DecoderOptions,
  DEFAULT_LIMITS,
  DictionaryEntry,
} from './types';
import { ByteReader } from './reader';
import { Token, describeByte, isDigit } from './tokens';

export class BencodeDecoder {
  private limits: Required<DecoderOptions>;

  constructor(options: DecoderOptions = {}) {
    this.limits = {
      maxNestingDepth: options.maxNestingDepth ?? DEFAULT_LIMITS.maxNestingDepth,
      maxStringLength: options.maxStringLength ?? DEFAULT_LIMITS.maxStringLength,
      maxListLength: options.maxListLength ?? DEFAULT_LIMITS.maxListLength,
      maxDictSize: options.maxDictSize ?? DEFAULT_LIMITS.maxDictSize,
    };

    for (const [name, limit] of Object.entries(this.limits)) {
      if (!Number.isInteger(limit) || limit <= 0) {
        throw new RangeError(`${name} must be a positive integer, got ${limit}`);
      }
    }
  }

  decode(data: Uint8Array): BencodedValue {
    if (data.length === 0) {
      throw new BencodeError('EmptyInput', 0, 'Empty input');
    }

    const reader = new ByteReader(data);
    let value: BencodedValue;
    try {
      value = this.decodeValue(reader, 0);
    } catch (error) {
      // Call stack ran out before maxNestingDepth was reached
      if (error instanceof RangeError) {
        throw new BencodeLimitError(
          'NestingTooDeep',
          reader.offset,
          'Nesting exceeds the available call stack'
        );
      }
      throw error;
    }

    if (!reader.atEnd) {
      throw new BencodeError(
        'TrailingData',
        reader.offset,
        `${reader.remaining} bytes left after the top-level value`
      );
    }
    return value;
  }

  private decodeValue(reader: ByteReader, depth: number): BencodedValue {
    const byte = reader.peek();
    switch (byte) {
      case Token.Dict:
        return this.decodeDictionary(reader, depth + 1);
      case Token.List:
        return this.decodeList(reader, depth + 1);
      case Token.Int:
        return this.decodeInteger(reader);
      default:
        if (isDigit(byte)) {
          return this.decodeBytes(reader);
        }
        throw new BencodeError('InvalidGrammar', reader.offset, `Expected a value, found ${describeByte(byte)}`);
    }
  }

  private decodeDictionary(reader: ByteReader, depth: number): BencodedDictionary {
    this.checkDepth(reader, depth);
    reader.consume(Token.Dict);

    const entries: DictionaryEntry[] = [];
    const positions = new Map<string, number>();

    do {
      if (reader.atEnd) {
        throw new BencodeError('UnexpectedEndOfInput', reader.offset, 'Unterminated dictionary');
      }

      const keyOffset = reader.offset;
      const key = this.decodeBytes(reader).value;
      const id = keyId(key);
      const existing = positions.get(id);

      if (existing === undefined && entries.length >= this.limits.maxDictSize) {
        throw new BencodeLimitError(
          'ContainerTooLarge',
          keyOffset,
          `Dictionary exceeds maximum of ${this.limits.maxDictSize} entries`
        );
      }

      const value = this.decodeValue(reader, depth);

      // A repeated key replaces the value but keeps its first position
      if (existing === undefined) {
        positions.set(id, entries.length);
        entries.push({ key, value });
      } else {
        entries[existing] = { key, value };
      }
    } while (reader.peek() !== Token.End);

    reader.consume(Token.End);
    return { type: 'dictionary', value: entries };
  }

  private decodeList(reader: ByteReader, depth: number): BencodedList {
    this.checkDepth(reader, depth);
    reader.consume(Token.List);

    const items: BencodedValue[] = [];

    do {
      if (reader.atEnd) {
        throw new BencodeError('UnexpectedEndOfInput', reader.offset, 'Unterminated list');
      }
      if (items.length >= this.limits.maxListLength) {
        throw new BencodeLimitError(
          'ContainerTooLarge',
          reader.offset,
          `List exceeds maximum of ${this.limits.maxListLength} elements`
        );
      }
      items.push(this.decodeValue(reader, depth));
    } while (reader.peek() !== Token.End);

    reader.consume(Token.End);
    return { type: 'list', value: items };
  }

  private decodeInteger(reader: ByteReader): BencodedInteger {
    reader.consume(Token.Int);

    let value: bigint;
    if (isDigit(reader.peek())) {
      value = BigInt(reader.readNumber());
    } else if (reader.peek() === Token.Minus) {
      reader.consume(Token.Minus);
      if (reader.peek() === Token.Zero) {
        throw new BencodeError('NegativeZero', reader.offset, 'Negative zero is not allowed');
      }
      value = -BigInt(reader.readNumber());
    } else {
      throw new BencodeError(
        'InvalidGrammar',
        reader.offset,
        `Expected a digit or '-', found ${describeByte(reader.peek())}`
      );
    }

    reader.consume(Token.End);
    return { type: 'integer', value };
  }

  private decodeBytes(reader: ByteReader): BencodedBytes {
    const length = Number(reader.readNumber());
    reader.consume(Token.Colon);

    if (length > this.limits.maxStringLength) {
      throw new BencodeLimitError(
        'StringTooLong',
        reader.offset,
        `Byte string length ${length} exceeds maximum ${this.limits.maxStringLength}`
      );
    }

    return { type: 'bytes', value: reader.readBytes(length) };
  }

  private checkDepth(reader: ByteReader, depth: number): void {
    if (depth > this.limits.maxNestingDepth) {
      throw new BencodeLimitError(
        'NestingTooDeep',
        reader.offset,
        `Nesting exceeds maximum depth ${this.limits.maxNestingDepth}`
      );
    }
  }
}

// Byte-for-byte map key; one char per byte
function keyId(key: Uint8Array): string {
  let id = '';
  for (let i = 0; i < key.length; i++) {
    id += String.fromCharCode(key[i]);
  }
  return id;
}
