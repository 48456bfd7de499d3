/**
 * TypeScript type definitions for the bencode decoder
 */

export interface DecoderOptions {
  maxNestingDepth?: number;
  maxStringLength?: number;
  maxListLength?: number;
  maxDictSize?: number;
}

export const DEFAULT_LIMITS: Required<DecoderOptions> = {
  maxNestingDepth: 100,
  maxStringLength: 10 * 1024 * 1024,    // 10MB
  maxListLength: 1000000,               // 1M elements
  maxDictSize: 100000,                  // 100K entries
};

// Decoded value types
export interface BencodedBytes {
  type: 'bytes';
  value: Uint8Array;
}

export interface BencodedInteger {
  type: 'integer';
  value: bigint;
}

export interface BencodedList {
  type: 'list';
  value: BencodedValue[];
}

export interface DictionaryEntry {
  key: Uint8Array;
  value: BencodedValue;
}

/**
 * Entries keep the order in which their keys first appeared on the wire.
 */
export interface BencodedDictionary {
  type: 'dictionary';
  value: DictionaryEntry[];
}

export type BencodedValue =
  | BencodedBytes
  | BencodedInteger
  | BencodedList
  | BencodedDictionary;

export type BencodeErrorKind =
  | 'EmptyInput'
  | 'InvalidGrammar'
  | 'UnexpectedEndOfInput'
  | 'UnexpectedByte'
  | 'LeadingZero'
  | 'NegativeZero'
  | 'TruncatedString'
  | 'TrailingData'
  | BencodeLimitKind;

export type BencodeLimitKind =
  | 'NestingTooDeep'
  | 'StringTooLong'
  | 'ContainerTooLarge';

export class BencodeError extends Error {
  readonly kind: BencodeErrorKind;
  readonly offset: number;

  constructor(kind: BencodeErrorKind, offset: number, message: string) {
    super(`${message} at offset ${offset}`);
    this.name = 'BencodeError';
    this.kind = kind;
    this.offset = offset;
  }
}

export class BencodeLimitError extends BencodeError {
  constructor(kind: BencodeLimitKind, offset: number, message: string) {
    super(kind, offset, message);
    this.name = 'BencodeLimitError';
  }
}
