import { describe, it, expect } from 'vitest';
import { cameraLabel, displayValue, summarizeMetadata } from '../../src/exif/summarize.js';
import { CaptureTag, PrimaryTag } from '../../src/exif/tags.js';
import { cameraDocument, makeDocument, text } from '../helpers/images.js';

describe('displayValue', () => {
  it('should trim text', () => {
    expect(displayValue(text('  TestCam  '))).toBe('TestCam');
  });

  it('should join the strings of a multi-string field', () => {
    const value = { kind: 'text', bytes: new Uint8Array([0x41, 0x00, 0x42, 0x43, 0x00, 0x00]) } as const;
    expect(displayValue(value)).toBe('A, BC');
  });

  it('should drop trailing NULs from opaque bytes', () => {
    expect(displayValue({ kind: 'bytes', type: 'undefined', bytes: new Uint8Array([0x41, 0x42, 0, 0]) })).toBe('AB');
  });

  it('should join numeric values', () => {
    expect(displayValue({ kind: 'integer', type: 'short', values: [1, 2, 3] })).toBe('1, 2, 3');
    expect(displayValue({ kind: 'rational', signed: false, values: [[1, 2], [3, 4]] })).toBe('1/2, 3/4');
  });

  it('should replace invalid UTF-8 instead of throwing', () => {
    expect(displayValue({ kind: 'text', bytes: new Uint8Array([0x41, 0xff]) })).toBe('A�');
  });
});

describe('summarizeMetadata', () => {
  it('should project the display fields', () => {
    expect(summarizeMetadata(cameraDocument())).toEqual({
      cameraMake: 'TestCam',
      cameraModel: 'Model 7',
      dateTime: '2023:09:10 14:23:11',
      lens: 'Test Lens 35mm',
      gpsPresent: true,
    });
  });

  it('should fall back to the original capture time', () => {
    const doc = makeDocument({ capture: [[CaptureTag.DateTimeOriginal, text('2021-01-02 03:04:05')]] });
    expect(summarizeMetadata(doc)).toEqual({ dateTime: '2021-01-02 03:04:05', gpsPresent: false });
  });

  it('should omit empty fields', () => {
    const doc = makeDocument({ primary: [[PrimaryTag.Make, text('   ')]] });
    expect(summarizeMetadata(doc)).toEqual({ gpsPresent: false });
  });
});

describe('cameraLabel', () => {
  it('should join make and model', () => {
    expect(cameraLabel({ cameraMake: 'TestCam', cameraModel: 'Model 7', gpsPresent: false })).toBe('TestCam Model 7');
    expect(cameraLabel({ cameraModel: 'Model 7', gpsPresent: false })).toBe('Model 7');
    expect(cameraLabel({ gpsPresent: false })).toBe('');
  });
});
