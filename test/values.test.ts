/**
 * Tests for the value helpers and the package entry point
 */

import * as assert from 'node:assert';
import { describe, it } from 'node:test';
import { VERSION, asText, decode, lookup, startsValue, typeName } from '../src/index';
import { BencodedDictionary, BencodedValue } from '../src/types';

function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

function decodeDictionary(text: string): BencodedDictionary {
  const value = decode(bytes(text));
  if (value.type !== 'dictionary') {
    assert.fail(`Expected a dictionary, got ${value.type}`);
  }
  return value;
}

describe('typeName', () => {
  it('names every variant', () => {
    assert.strictEqual(typeName(decode(bytes('1:a'))), 'byte string');
    assert.strictEqual(typeName(decode(bytes('i1e'))), 'integer');
    assert.strictEqual(typeName(decode(bytes('li1ee'))), 'list');
    assert.strictEqual(typeName(decode(bytes('d1:ai1ee'))), 'dictionary');
  });
});

describe('lookup', () => {
  const dict = decodeDictionary('d8:announce9:tracker:14:infod6:lengthi7eee');

  it('finds values by string key', () => {
    assert.deepStrictEqual(lookup(dict, 'announce'), { type: 'bytes', value: bytes('tracker:1') });
  });

  it('finds values by byte key', () => {
    const info = lookup(dict, bytes('info'));
    if (info === undefined || info.type !== 'dictionary') {
      assert.fail('Expected an info dictionary');
    }
    assert.deepStrictEqual(lookup(info, 'length'), { type: 'integer', value: 7n });
  });

  it('returns undefined for a missing key', () => {
    assert.strictEqual(lookup(dict, 'comment'), undefined);
    assert.strictEqual(lookup(dict, 'info '), undefined);
  });
});

describe('asText', () => {
  it('decodes UTF-8 byte strings', () => {
    assert.strictEqual(asText(decode(bytes('6:héllo'))), 'héllo');
  });

  it('returns undefined for invalid UTF-8', () => {
    const value: BencodedValue = { type: 'bytes', value: Uint8Array.from([0xff, 0xfe]) };
    assert.strictEqual(asText(value), undefined);
  });

  it('returns undefined for values that are not byte strings', () => {
    assert.strictEqual(asText(decode(bytes('i1e'))), undefined);
  });
});

describe('startsValue', () => {
  it('accepts every production opener', () => {
    for (const text of ['d', 'l', 'i', '0', '9:']) {
      assert.strictEqual(startsValue(bytes(text)), true, text);
    }
  });

  it('rejects anything else', () => {
    assert.strictEqual(startsValue(new Uint8Array(0)), false);
    assert.strictEqual(startsValue(bytes('e')), false);
    assert.strictEqual(startsValue(bytes('{}')), false);
  });
});

describe('VERSION', () => {
  it('is a semver string', () => {
    assert.match(VERSION, /^\d+\.\d+\.\d+$/);
  });
});
