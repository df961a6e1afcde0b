import fs from 'fs';
import os from 'os';
import path from 'path';

const FIXTURES_DIR = path.join(__dirname, '..', 'fixtures');

export const TEXT = Buffer.from('The quick brown fox jumps over the lazy dog. '.repeat(40));
// starts with a zero byte and runs through 0x80-0xff, so it is not text
export const BINARY = Buffer.from(Array.from({ length: 1024 }, (_, i) => (i * 7) % 256));
// a UTF-16 surrogate encoded as UTF-8, and an overlong NUL
export const SURROGATE = Buffer.from([0x41, 0xed, 0xa0, 0x80, 0x42]);
export const OVERLONG = Buffer.from([0x41, 0xc0, 0x80, 0x42]);

export const PAYLOADS = {
  text: TEXT,
  binary: BINARY,
  surrogate: SURROGATE,
  overlong: OVERLONG,
};

export type FixtureName = keyof typeof PAYLOADS;

/**
 * test/fixtures/<name>.lzma holds the payload as an LZMA stream with the
 * 9-byte stored header: size FF FF FF FF, terminated by an end marker.
 */
export function unknownSizeStream(name: FixtureName): Buffer {
  return fs.readFileSync(path.join(FIXTURES_DIR, `${name}.lzma`));
}

export function withStoredSize(stream: Buffer, size: number): Buffer {
  const copy = Buffer.from(stream);
  copy.writeInt32LE(size, 5);
  return copy;
}

export function knownSizeStream(name: FixtureName): Buffer {
  return withStoredSize(unknownSizeStream(name), PAYLOADS[name].length);
}

export function scContainer(stream: Buffer): Buffer {
  return Buffer.concat([Buffer.from('SC'), Buffer.alloc(24, 0x01), stream]);
}

export function sclzContainer(payload: Buffer): Buffer {
  return Buffer.concat([Buffer.from('SC'), Buffer.alloc(24, 0x01), Buffer.from('SCLZ'), payload]);
}

export function sigContainer(stream: Buffer): Buffer {
  return Buffer.concat([Buffer.from('Sig:'), Buffer.alloc(64, 0x02), stream]);
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'sc-decompress-'));
}
