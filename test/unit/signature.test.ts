import assert from 'assert';
import { classify, matchText, Signature } from '../../src/models/signature';

function bytes(...values: number[]): Buffer {
  return Buffer.from(values);
}

describe('signature', () => {
  describe('classify', () => {
    it('should detect raw lzma from the first three bytes', () => {
      assert.equal(classify(bytes(0x5d, 0x00, 0x00)), Signature.Lzma);
      assert.equal(classify(bytes(0x5d, 0x00, 0x00, 0x04, 0x00, 0xff)), Signature.Lzma);
    });

    it('should not detect lzma from a partial prefix', () => {
      assert.equal(classify(bytes(0x5d, 0x00)), Signature.None);
      assert.equal(classify(bytes(0x5d, 0x00, 0x01)), Signature.None);
    });

    it('should detect SC in any case', () => {
      for (const prefix of ['SC', 'sc', 'Sc', 'sC']) {
        const buf = Buffer.concat([Buffer.from(prefix), Buffer.alloc(18, 0xaa)]);
        assert.equal(buf.length, 20);
        assert.equal(classify(buf), Signature.Sc, prefix);
      }
    });

    it('should detect SCLZ only past 30 bytes', () => {
      const header = Buffer.concat([Buffer.from('SC'), Buffer.alloc(24)]);
      assert.equal(classify(Buffer.concat([header, Buffer.from('SCLZ')])), Signature.Sc);
      assert.equal(classify(Buffer.concat([header, Buffer.from('SCLZ'), bytes(0)])), Signature.Sclz);
      assert.equal(classify(Buffer.concat([header, Buffer.from('sClz'), bytes(0)])), Signature.Sclz);
    });

    it('should fall back to SC when the SCLZ marker is absent', () => {
      const buf = Buffer.concat([Buffer.from('sc'), Buffer.alloc(24), bytes(0x5d, 0x00, 0x00, 0x01, 0x00)]);
      assert.equal(classify(buf), Signature.Sc);
    });

    it('should detect Sig: in any case', () => {
      for (const prefix of ['Sig:', 'SIG:', 'sig:', 'sIg:']) {
        assert.equal(classify(Buffer.from(`${prefix}rest`)), Signature.Sig, prefix);
      }
      assert.equal(classify(Buffer.from('Sig:')), Signature.Sig);
    });

    it('should require the colon for Sig:', () => {
      assert.equal(classify(Buffer.from('Sig')), Signature.None);
      assert.equal(classify(Buffer.from('Sig;')), Signature.None);
    });

    it('should classify an empty buffer as none', () => {
      assert.equal(classify(Buffer.alloc(0)), Signature.None);
    });

    it('should treat non-text bytes as no match', () => {
      assert.equal(classify(bytes(0xff)), Signature.None);
      assert.equal(classify(bytes(0xc3, 0x28)), Signature.None);
      assert.equal(classify(bytes(0xd3, 0xc3)), Signature.None);
      assert.equal(classify(bytes(0x53, 0xe3, 0x69, 0x67)), Signature.None);
    });

    it('should classify plain data as none', () => {
      assert.equal(classify(Buffer.from('name,value\n')), Signature.None);
      assert.equal(classify(bytes(0x00, 0x00, 0x00)), Signature.None);
    });
  });

  describe('matchText', () => {
    it('should compare at an offset', () => {
      assert.equal(matchText(Buffer.from('xxSCLZ'), 2, 'sclz'), true);
      assert.equal(matchText(Buffer.from('xxSCL'), 2, 'sclz'), false);
    });

    it('should only fold ASCII letters', () => {
      // '[' (0x5b) and '{' (0x7b) differ by 0x20 like a case pair but are not letters
      assert.equal(matchText(Buffer.from('['), 0, '{'), false);
    });
  });
});
