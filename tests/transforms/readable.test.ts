import { describe, it, expect, vi, afterEach } from 'vitest';
import { convertToReadable } from '../../src/transforms/readable.js';
import { logger } from '../../src/utils/logger.js';
import { makeRecord, recordLines } from '../helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('convertToReadable', () => {
  it('should decode quoted-printable values and drop ENCODING and CHARSET', () => {
    const record = makeRecord('N;CHARSET=UTF-8;ENCODING=QUOTED-PRINTABLE:Silva;Jo=C3=A3o;;;');
    expect(recordLines(convertToReadable(record))).toEqual(['N:Silva;João;;;']);
  });

  it('should keep other parameters in place', () => {
    const record = makeRecord('ADR;HOME;ENCODING=QUOTED-PRINTABLE;CHARSET=UTF-8:;;Rua=20A;;;;');
    expect(recordLines(convertToReadable(record))).toEqual(['ADR;HOME:;;Rua A;;;;']);
  });

  it('should handle the bare QUOTED-PRINTABLE token', () => {
    const record = makeRecord('NOTE;QUOTED-PRINTABLE:caf=C3=A9');
    expect(recordLines(convertToReadable(record))).toEqual(['NOTE:café']);
  });

  it('should honour CHARSET', () => {
    const record = makeRecord('FN;CHARSET=ISO-8859-1;ENCODING=QUOTED-PRINTABLE:Jos=E9');
    expect(recordLines(convertToReadable(record))).toEqual(['FN:José']);
  });

  it('should keep decoded line breaks on one line', () => {
    const record = makeRecord('NOTE;ENCODING=QUOTED-PRINTABLE:line1=0D=0Aline2=0Aline3');
    expect(recordLines(convertToReadable(record))).toEqual(['NOTE:line1\\nline2\\nline3']);
  });

  it('should leave fields without quoted-printable untouched', () => {
    const record = makeRecord('PHOTO;ENCODING=BASE64:AAAA', 'TEL:912 345 678', 'FN:Ol=C3=A1');
    expect(recordLines(convertToReadable(record))).toEqual(['PHOTO;ENCODING=BASE64:AAAA', 'TEL:912 345 678', 'FN:Ol=C3=A1']);
  });

  it('should pass through a value it cannot decode and warn', () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const record = makeRecord('FN;CHARSET=X-NOPE;ENCODING=QUOTED-PRINTABLE:Ana', 'NOTE;ENCODING=QUOTED-PRINTABLE:Jos=E9');

    expect(recordLines(convertToReadable(record))).toEqual([
      'FN;CHARSET=X-NOPE;ENCODING=QUOTED-PRINTABLE:Ana',
      'NOTE;ENCODING=QUOTED-PRINTABLE:Jos=E9',
    ]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('should not modify the input record', () => {
    const record = makeRecord('FN;ENCODING=QUOTED-PRINTABLE:Ana=20Costa');
    convertToReadable(record);
    expect(recordLines(record)).toEqual(['FN;ENCODING=QUOTED-PRINTABLE:Ana=20Costa']);
  });

  it('should be idempotent', () => {
    const record = makeRecord('FN;CHARSET=UTF-8;ENCODING=QUOTED-PRINTABLE:Jo=C3=A3o', 'TEL:1');
    const once = convertToReadable(record);
    expect(convertToReadable(once)).toEqual(once);
  });
});
