/**
 * Read helpers for decoded bencode trees
 */

import { TextDecoder, TextEncoder } from 'util';
import { BencodedDictionary, BencodedValue } from './types';

const TYPE_NAMES: Record<BencodedValue['type'], string> = {
  bytes: 'byte string',
  integer: 'integer',
  list: 'list',
  dictionary: 'dictionary',
};

let textEncoder: TextEncoder | null = null;
let utf8Decoder: TextDecoder | null = null;

export function typeName(value: BencodedValue): string {
  return TYPE_NAMES[value.type];
}

/**
 * Finds the value stored under key. String keys are compared as UTF-8.
 */
export function lookup(dict: BencodedDictionary, key: string | Uint8Array): BencodedValue | undefined {
  let wanted: Uint8Array;
  if (typeof key === 'string') {
    if (!textEncoder) {
      textEncoder = new TextEncoder();
    }
    wanted = textEncoder.encode(key);
  } else {
    wanted = key;
  }

  for (const entry of dict.value) {
    if (bytesEqual(entry.key, wanted)) {
      return entry.value;
    }
  }
  return undefined;
}

/**
 * UTF-8 view of a byte string; undefined for anything that is not valid text
 */
export function asText(value: BencodedValue): string | undefined {
  if (value.type !== 'bytes') {
    return undefined;
  }
  if (!utf8Decoder) {
    utf8Decoder = new TextDecoder('utf-8', { fatal: true });
  }
  try {
    return utf8Decoder.decode(value.value);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
