import { readFileSync, writeFileSync } from 'fs';
import { TextDecoder } from 'util';
import { EncodingError, InvalidInputError } from './errors';
import { decompress, type DecompressOptions } from './models/sc';
import { classify, Signature } from './models/signature';

export interface ScCompressionSource {
  path?: string;
  buffer?: Buffer;
}

/**
 * A single asset, read once from disk or taken as-is from memory.
 *
 * Exactly one of `path` or `buffer` must be given. The buffer is never
 * modified; every call decompresses it again.
 */
export class ScCompression {
  public readonly buffer: Buffer;

  private readonly options: DecompressOptions;

  constructor(source: ScCompressionSource, options: DecompressOptions = {}) {
    const { path, buffer } = source;
    if (path !== undefined && buffer !== undefined) {
      throw new InvalidInputError('pass either a file path or a buffer, not both');
    } else if (path !== undefined) {
      this.buffer = readFileSync(path);
    } else if (buffer !== undefined) {
      this.buffer = buffer;
    } else {
      throw new InvalidInputError('a file path or a buffer must be passed in');
    }
    this.options = options;
  }

  public get signature(): Signature {
    return classify(this.buffer);
  }

  public decompress(): Buffer {
    return decompress(this.buffer, this.options);
  }

  public decompressToString(): string {
    const data = this.decompress();
    try {
      return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(data);
    } catch (err) {
      throw new EncodingError('decompressed data is not valid UTF-8', err);
    }
  }

  /** Returns the number of bytes written. */
  public decompressToFile(path: string): number {
    const data = this.decompress();
    writeFileSync(path, data);
    return data.length;
  }
}
