// Properties byte 5D (lc=3, lp=0, pb=2) followed by the two low dictionary size bytes.
export const LzmaMagic = [0x5d, 0x00, 0x00];

export const ScMagic = 'SC';
export const SclzMagic = 'SCLZ';
export const SclzMagicOffset = 26;
export const SigMagic = 'Sig:';

export const ScHeaderSize = 26;
export const SigHeaderSize = 68;

// properties (1) + dictionary size (4) + uncompressed size (4)
export const StoredLzmaHeaderSize = 9;
// properties (1) + dictionary size (4) + uncompressed size (8)
export const CanonicalLzmaHeaderSize = 13;

// Every header field is little-endian. The stored int32 size is widened in
// place to the 8-byte LZMA-alone size, which only works in that byte order.
export const SizeFieldOffset = 5;
export const UnknownSize = -1;

// Upper bound on decoded output, and the budget for streams of unknown size.
export const DefaultMaxOutputSize = 256 * 1024 * 1024;
