/**
 * Basic example of using the bencode decoder
 *
 * Usage: tsx examples/basic.ts [file.torrent]
 */

import * as fs from 'fs';
import { BencodeDecoder, BencodeError, BencodedValue, asText, lookup, typeName } from '../src/index';

// Small metainfo-shaped document used when no file is given
function createSampleData(): Uint8Array {
  return new TextEncoder().encode(
    'd8:announce22:http://tracker.test/an' +
    '4:infod6:lengthi1048576e4:name10:sample.bin12:piece lengthi262144eee'
  );
}

function describe(value: BencodedValue, indent: string = ''): string {
  switch (value.type) {
    case 'bytes': {
      const text = asText(value);
      return text !== undefined && value.value.length <= 64
        ? JSON.stringify(text)
        : `<${value.value.length} bytes>`;
    }
    case 'integer':
      return value.value.toString();
    case 'list':
      return '[\n' + value.value.map(item => `${indent}  ${describe(item, indent + '  ')}`).join(',\n') + `\n${indent}]`;
    case 'dictionary':
      return '{\n' + value.value
        .map(entry => `${indent}  ${new TextDecoder().decode(entry.key)}: ${describe(entry.value, indent + '  ')}`)
        .join(',\n') + `\n${indent}}`;
  }
}

function main(): void {
  const file = process.argv[2];
  const data = file ? new Uint8Array(fs.readFileSync(file)) : createSampleData();
  console.log(`Decoding ${data.length} bytes${file ? ` from ${file}` : ''}`);

  const decoder = new BencodeDecoder({ maxNestingDepth: 32 });

  try {
    const value = decoder.decode(data);
    console.log(`Top-level ${typeName(value)}:`);
    console.log(describe(value));

    if (value.type === 'dictionary') {
      const info = lookup(value, 'info');
      const name = info && info.type === 'dictionary' ? lookup(info, 'name') : undefined;
      if (name) {
        console.log(`\nName: ${asText(name) ?? '<binary>'}`);
      }
    }
  } catch (error) {
    if (error instanceof BencodeError) {
      console.error(`${error.kind}: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main();
}
