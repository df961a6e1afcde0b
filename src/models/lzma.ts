import { decodeLzma } from 'xz-compat';
import {
  CanonicalLzmaHeaderSize,
  DefaultMaxOutputSize,
  SizeFieldOffset,
  StoredLzmaHeaderSize,
  UnknownSize,
} from '../config';
import { DecodeError } from '../errors';

export interface LzmaHeader {
  properties: number;
  dictionarySize: number;
  /** null when the stream is terminated by an end marker instead */
  uncompressedSize: number | null;
}

export interface LzmaDecodeOptions {
  maxOutputSize?: number;
}

function checkHeader(buf: Buffer, offset: number) {
  if (buf.length < offset + StoredLzmaHeaderSize) {
    throw new DecodeError(`truncated lzma header: need ${offset + StoredLzmaHeaderSize} bytes, got ${buf.length}`);
  }
}

// Reads the 8-byte size of a canonical stream; null when every byte is 0xff.
function readCanonicalSize(stream: Buffer): number | null {
  const low = stream.readUInt32LE(SizeFieldOffset);
  const high = stream.readUInt32LE(SizeFieldOffset + 4);
  if (low === 0xffffffff && high === 0xffffffff) {
    return null;
  }
  return high * 0x100000000 + low;
}

export const LZMA = {
  readHeader(buf: Buffer, offset: number): LzmaHeader {
    checkHeader(buf, offset);
    const size = buf.readInt32LE(offset + SizeFieldOffset);
    return {
      properties: buf[offset],
      dictionarySize: buf.readUInt32LE(offset + 1),
      // anything but -1 is zero-extended, so sizes past 2 GiB read as unsigned
      uncompressedSize: size === UnknownSize ? null : size >>> 0,
    };
  },
  /**
   * Rebuilds the 13-byte LZMA-alone header from the 9-byte one stored in
   * asset files: the 4-byte size stays in place and is widened to 8 bytes
   * with 0x00 padding, or 0xFF padding when the size is unknown.
   */
  toLzmaStream(buf: Buffer, offset: number): Buffer {
    checkHeader(buf, offset);
    const size = buf.readInt32LE(offset + SizeFieldOffset);
    const padding = Buffer.alloc(CanonicalLzmaHeaderSize - StoredLzmaHeaderSize, size === UnknownSize ? 0xff : 0x00);
    return Buffer.concat([
      buf.slice(offset, offset + StoredLzmaHeaderSize),
      padding,
      buf.slice(offset + StoredLzmaHeaderSize),
    ]);
  },
  decode(stream: Buffer, options: LzmaDecodeOptions = {}): Buffer {
    if (stream.length < CanonicalLzmaHeaderSize) {
      throw new DecodeError(`truncated lzma stream: ${stream.length} bytes`);
    }
    const properties = stream.slice(0, 5);
    if (stream.readUInt32LE(1) > 0x7fffffff) {
      throw new DecodeError(`invalid lzma dictionary size: ${stream.readUInt32LE(1)}`);
    }

    const limit = options.maxOutputSize ?? DefaultMaxOutputSize;
    const size = readCanonicalSize(stream);
    if (size !== null && size > limit) {
      throw new DecodeError(`lzma stream declares ${size} bytes, over the ${limit} byte limit`);
    }

    // The sink reports how many bytes were really produced, so a stream that
    // ends early is caught instead of coming back padded.
    const chunks: Buffer[] = [];
    let result: Buffer | number;
    try {
      result = decodeLzma(stream.slice(CanonicalLzmaHeaderSize), properties, size ?? limit, {
        write: (chunk: Buffer) => chunks.push(chunk),
      });
    } catch (err) {
      throw new DecodeError(`lzma decode failed: ${err instanceof Error ? err.message : err}`, err);
    }
    const written = typeof result === 'number' ? result : result.length;

    if (size === null && written >= limit) {
      throw new DecodeError(`lzma stream has no end marker within ${limit} bytes`);
    }
    if (size !== null && written !== size) {
      throw new DecodeError(`lzma size mismatch: expected ${size} bytes, got ${written}`);
    }
    return Buffer.concat(chunks);
  },
  decompress(buf: Buffer, offset: number, options: LzmaDecodeOptions = {}): Buffer {
    return LZMA.decode(LZMA.toLzmaStream(buf, offset), options);
  },
};
