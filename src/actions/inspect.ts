import { readFileSync } from 'fs';
import { countBy, padEnd, padStart } from 'lodash';
import minimist from 'minimist';
import { ScCompressionError } from '../errors';
import { LZMA } from '../models/lzma';
import { HeaderOffsets, isLzmaSignature } from '../models/sc';
import { classify, Signature } from '../models/signature';
import { formatJson, listInputFiles } from '../utils';

export interface InspectRecord {
  file: string;
  size: number;
  signature: string;
  headerOffset?: number;
  properties?: number;
  dictionarySize?: number;
  uncompressedSize?: number | null;
  error?: string;
}

export function inspect(file: string, buf: Buffer): InspectRecord {
  const signature = classify(buf);
  const record: InspectRecord = { file, size: buf.length, signature: Signature[signature] };
  if (!isLzmaSignature(signature)) {
    return record;
  }

  const headerOffset = HeaderOffsets[signature];
  record.headerOffset = headerOffset;
  try {
    const header = LZMA.readHeader(buf, headerOffset);
    record.properties = header.properties;
    record.dictionarySize = header.dictionarySize;
    record.uncompressedSize = header.uncompressedSize;
  } catch (err) {
    if (!(err instanceof ScCompressionError)) throw err;
    record.error = err.message;
  }
  return record;
}

export function formatRecord(record: InspectRecord, width: number): string {
  let line = `${padEnd(record.file, width)}  ${padEnd(record.signature, 4)}  ${record.size} bytes`;
  if (record.error !== undefined) {
    line += `, ${record.error}`;
  } else if (record.headerOffset !== undefined) {
    const props = padStart((record.properties ?? 0).toString(16), 2, '0');
    const size = record.uncompressedSize === null ? 'unknown' : `${record.uncompressedSize}`;
    line += `, header: ${record.headerOffset}, props: 0x${props}, dictionary: ${record.dictionarySize}, uncompressed: ${size}`;
  }
  return line;
}

export async function main(args: string[]) {
  const parsedArgs = minimist(args, {
    boolean: ['help', 'json'],
  });

  if (parsedArgs._.length !== 1 || parsedArgs.help) {
    console.log('usage: sc-decompress inspect <file|directory|glob> [--json]');
    return Boolean(parsedArgs.help);
  }

  const files = listInputFiles(String(parsedArgs._[0]));
  if (files.length === 0) {
    console.error(`no input files match ${parsedArgs._[0]}`);
    return false;
  }

  const records = files.map((file) => inspect(file, readFileSync(file)));
  if (parsedArgs.json) {
    console.log(formatJson(records));
    return true;
  }

  const width = Math.max(...records.map((record) => record.file.length));
  for (const record of records) {
    console.log(formatRecord(record, width));
  }
  const counts = countBy(records, (record) => record.signature);
  console.log(Object.keys(counts).sort().map((name) => `${name}: ${counts[name]}`).join(', '));
  return true;
}
