export { ScCompression } from './compression';
export type { ScCompressionSource } from './compression';
export * from './errors';
export { LZMA } from './models/lzma';
export type { LzmaDecodeOptions, LzmaHeader } from './models/lzma';
export { decompress, HeaderOffsets, isLzmaSignature } from './models/sc';
export type { DecompressOptions, UnsupportedPolicy } from './models/sc';
export { classify, matchText, Signature } from './models/signature';
