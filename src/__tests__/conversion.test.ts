import { describe, it, expect } from 'vitest';
import {
  bytesToBinaryString,
  binaryStringToBytes,
  utf8ToBinaryString,
} from '../conversions';
import { allByteValues } from './utils';

describe('bytesToBinaryString', () => {
  it('maps every byte to a single character', () => {
    const text = bytesToBinaryString(allByteValues());
    expect(text.length).toBe(256);
    for (let idx = 0; idx < 256; idx++) expect(text.charCodeAt(idx)).toBe(idx);
  });

  it('keeps bytes that windows-1252 would remap', () => {
    expect(bytesToBinaryString(new Uint8Array([0x80, 0x9f]))).toBe(
      '\u0080\u009f'
    );
  });

  it('converts inputs larger than a single chunk', () => {
    const bytes = new Uint8Array(100_000).fill(0x41);
    bytes[99_999] = 0xff;
    const text = bytesToBinaryString(bytes);
    expect(text.length).toBe(100_000);
    expect(text.charCodeAt(99_998)).toBe(0x41);
    expect(text.charCodeAt(99_999)).toBe(0xff);
  });

  it('converts empty input', () => {
    expect(bytesToBinaryString(new Uint8Array(0))).toBe('');
  });
});

describe('binaryStringToBytes', () => {
  it('restores the original bytes', () => {
    const bytes = allByteValues();
    expect(binaryStringToBytes(bytesToBinaryString(bytes))).toEqual(bytes);
  });

  it('throws for characters above U+00FF', () => {
    expect(() => binaryStringToBytes('abĀ')).toThrow(
      new TypeError(
        'Binary strings may only contain characters up to U+00FF (found U+0100 at index 2)'
      )
    );
  });
});

describe('utf8ToBinaryString', () => {
  it('leaves ASCII unchanged', () => {
    expect(utf8ToBinaryString('John Doe')).toBe('John Doe');
  });

  it('expands non-ASCII characters to their UTF-8 octets', () => {
    expect(utf8ToBinaryString('é')).toBe('Ã©');
    expect(utf8ToBinaryString('€')).toBe('â\u0082¬');
  });
});
