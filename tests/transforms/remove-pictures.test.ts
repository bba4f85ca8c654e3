import { describe, it, expect } from 'vitest';
import { removeContactPictures } from '../../src/transforms/remove-pictures.js';
import { loadRecords } from '../../src/vcard/document.js';
import { doc, makeRecord, recordLines } from '../helpers.js';

describe('removeContactPictures', () => {
  it('should drop PHOTO together with its folded data', () => {
    const [record] = loadRecords(doc(
      'BEGIN:VCARD',
      'VERSION:2.1',
      'FN:Ana',
      'PHOTO;ENCODING=BASE64;JPEG:/9j/4AAQ',
      ' SkZJRgABAQ',
      ' AAAQABAAD',
      '',
      'TEL:912345678',
      'END:VCARD',
    ));
    expect(recordLines(removeContactPictures(record))).toEqual(['VERSION:2.1', 'FN:Ana', 'TEL:912345678']);
  });

  it('should match PHOTO in any case and with a group', () => {
    const record = makeRecord('photo;VALUE=uri:http://example.com/a.jpg', 'item1.PHOTO:AAAA', 'FN:Ana');
    expect(recordLines(removeContactPictures(record))).toEqual(['FN:Ana']);
  });

  it('should be a no-op without pictures and idempotent', () => {
    const record = makeRecord('FN:Ana', 'LOGO:AAAA');
    const once = removeContactPictures(record);
    expect(recordLines(once)).toEqual(['FN:Ana', 'LOGO:AAAA']);
    expect(removeContactPictures(once)).toEqual(once);
  });
});
