import { LzmaMagic, ScMagic, SclzMagic, SclzMagicOffset, SigMagic } from '../config';

export enum Signature {
  None,
  Lzma,
  Sc,
  Sclz,
  Sig,
}

function matchBytes(buf: Buffer, offset: number, bytes: number[]): boolean {
  if (buf.length < offset + bytes.length) return false;
  for (let i = 0; i < bytes.length; i++) {
    if (buf[offset + i] !== bytes[i]) return false;
  }
  return true;
}

function foldCase(byte: number): number {
  // A-Z only; anything outside ASCII letters compares as-is
  return byte >= 0x41 && byte <= 0x5a ? byte + 0x20 : byte;
}

/**
 * Compares raw bytes against an ASCII tag ignoring letter case. Bytes that
 * are not valid text never match, they are not decoded.
 */
export function matchText(buf: Buffer, offset: number, text: string): boolean {
  if (buf.length < offset + text.length) return false;
  for (let i = 0; i < text.length; i++) {
    if (foldCase(buf[offset + i]) !== foldCase(text.charCodeAt(i))) return false;
  }
  return true;
}

export function classify(buf: Buffer): Signature {
  if (matchBytes(buf, 0, LzmaMagic)) {
    return Signature.Lzma;
  } else if (matchText(buf, 0, ScMagic)) {
    if (buf.length > 30 && matchText(buf, SclzMagicOffset, SclzMagic)) {
      return Signature.Sclz;
    }
    return Signature.Sc;
  } else if (matchText(buf, 0, SigMagic)) {
    return Signature.Sig;
  }
  return Signature.None;
}
