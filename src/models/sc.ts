import { ScHeaderSize, SigHeaderSize } from '../config';
import { UnsupportedFormatError } from '../errors';
import { LZMA } from './lzma';
import { classify, Signature } from './signature';

export type UnsupportedPolicy = 'throw' | 'passthrough';

export interface DecompressOptions {
  /** What to do with SCLZ (LZHAM) containers. Defaults to 'throw'. */
  unsupported?: UnsupportedPolicy;
  /** Largest output accepted, in bytes. Defaults to DefaultMaxOutputSize. */
  maxOutputSize?: number;
}

type LzmaSignature = Signature.Lzma | Signature.Sc | Signature.Sig;

export const HeaderOffsets: Record<LzmaSignature, number> = {
  [Signature.Lzma]: 0,
  [Signature.Sc]: ScHeaderSize,
  [Signature.Sig]: SigHeaderSize,
};

export function isLzmaSignature(signature: Signature): signature is LzmaSignature {
  return signature === Signature.Lzma || signature === Signature.Sc || signature === Signature.Sig;
}

export function decompress(buf: Buffer, options: DecompressOptions = {}): Buffer {
  const signature = classify(buf);
  switch (signature) {
    case Signature.None:
      return buf;
    case Signature.Lzma:
    case Signature.Sc:
    case Signature.Sig:
      return LZMA.decompress(buf, HeaderOffsets[signature], { maxOutputSize: options.maxOutputSize });
    case Signature.Sclz:
      if (options.unsupported === 'passthrough') {
        return buf;
      }
      throw new UnsupportedFormatError('SCLZ containers use LZHAM compression, which is not supported');
    default: {
      const unreachable: never = signature;
      throw new Error(`unknown signature: ${unreachable}`);
    }
  }
}
