import { describe, it, expect } from 'vitest';
import { foldLines, splitPhysicalLines, unfoldLines } from '../../src/vcard/lines.js';

describe('splitPhysicalLines', () => {
  it('should accept CRLF, LF and lone CR', () => {
    expect(splitPhysicalLines('A\r\nB\nC\rD\r\n')).toEqual(['A', 'B', 'C', 'D']);
  });

  it('should drop a leading byte order mark', () => {
    expect(splitPhysicalLines('\uFEFFBEGIN:VCARD\n')).toEqual(['BEGIN:VCARD']);
  });

  it('should return no lines for empty text', () => {
    expect(splitPhysicalLines('')).toEqual([]);
  });

  it('should keep blank lines in the middle', () => {
    expect(splitPhysicalLines('A\n\nB')).toEqual(['A', '', 'B']);
  });
});

describe('unfoldLines', () => {
  it('should join folded lines starting with a space or tab', () => {
    expect(unfoldLines([
      'PHOTO;ENCODING=BASE64:AAAA',
      ' BBBB',
      '\tCCCC',
      'END:VCARD',
    ])).toEqual(['PHOTO;ENCODING=BASE64:AAAABBBBCCCC', 'END:VCARD']);
  });

  it('should join quoted-printable soft line breaks', () => {
    expect(unfoldLines([
      'NOTE;ENCODING=QUOTED-PRINTABLE:Ol=C3=A1 =',
      'mundo',
      'END:VCARD',
    ])).toEqual(['NOTE;ENCODING=QUOTED-PRINTABLE:Ol=C3=A1 mundo', 'END:VCARD']);
  });

  it('should follow several soft breaks in a row', () => {
    expect(unfoldLines([
      'N;CHARSET=UTF-8;ENCODING=QUOTED-PRINTABLE:a=',
      'b=',
      'c',
      'FN:x',
    ])).toEqual(['N;CHARSET=UTF-8;ENCODING=QUOTED-PRINTABLE:abc', 'FN:x']);
  });

  it('should keep a soft-break continuation that starts with a space', () => {
    expect(unfoldLines([
      'NOTE;QUOTED-PRINTABLE:one=',
      ' two',
    ])).toEqual(['NOTE;QUOTED-PRINTABLE:one two']);
  });

  it('should not treat a trailing = as a soft break without quoted-printable', () => {
    expect(unfoldLines(['NOTE:1+1=', 'FN:x'])).toEqual(['NOTE:1+1=', 'FN:x']);
  });

  it('should leave a document without continuations unchanged', () => {
    const lines = ['BEGIN:VCARD', 'VERSION:3.0', 'FN:Ana', 'END:VCARD'];
    expect(unfoldLines(lines)).toEqual(lines);
  });
});

describe('foldLines', () => {
  it('should keep every line whole without a width', () => {
    const lines = ['NOTE:' + 'a'.repeat(200)];
    expect(foldLines(lines)).toEqual(lines);
  });

  it('should fold long lines with a leading space', () => {
    const line = 'NOTE:' + 'a'.repeat(30);
    const folded = foldLines([line], 20);
    expect(folded).toEqual(['NOTE:' + 'a'.repeat(15), ' ' + 'a'.repeat(15)]);
    expect(unfoldLines(folded)).toEqual([line]);
  });

  it('should not cut a multi-byte character', () => {
    const folded = foldLines(['FN:' + 'é'.repeat(10)], 16);
    expect(folded).toEqual(['FN:' + 'é'.repeat(6), ' ' + 'é'.repeat(4)]);
    for (const line of folded) {
      expect(Buffer.byteLength(line, 'utf-8')).toBeLessThanOrEqual(16);
    }
  });

  it('should never fold quoted-printable lines', () => {
    const line = 'NOTE;ENCODING=QUOTED-PRINTABLE:' + '=41'.repeat(30);
    expect(foldLines([line], 20)).toEqual([line]);
  });
});
