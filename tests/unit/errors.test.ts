import { describe, it, expect } from 'vitest';
import {
  PhotoBatcherError,
  BufferOverflowError,
  CorruptedFileError,
  MetadataDecodeError,
  DateParseError,
  FilenameTemplateError,
  UnsupportedTokenError,
  TemplateSyntaxError,
  ImageDecodeError,
  ImageEncodeError,
  InvalidOptionsError,
  BatchProcessingError,
  describeError,
} from '../../src/errors.js';

describe('errors', () => {
  it('should keep the prototype chain for instanceof checks', () => {
    const err = new UnsupportedTokenError('foo', 'a_{foo}');
    expect(err).toBeInstanceOf(UnsupportedTokenError);
    expect(err).toBeInstanceOf(FilenameTemplateError);
    expect(err).toBeInstanceOf(PhotoBatcherError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('UnsupportedTokenError');
  });

  it('should name the bad token and pattern', () => {
    const err = new UnsupportedTokenError('foo', 'a_{foo}');
    expect(err.message).toBe('Unsupported token {foo} in pattern "a_{foo}"');
    expect(err.token).toBe('foo');
    expect(err.pattern).toBe('a_{foo}');
  });

  it('should point at the unmatched brace', () => {
    const err = new TemplateSyntaxError('img_{index', 4);
    expect(err.message).toBe(`Unmatched '{' at position 4 in pattern "img_{index"`);
    expect(err.position).toBe(4);
  });

  it('should append offsets when known', () => {
    expect(new CorruptedFileError('Invalid JPEG', 12).message).toBe('Invalid JPEG at offset 12');
    expect(new MetadataDecodeError('Bad TIFF magic').message).toBe('Bad TIFF magic');
  });

  it('should describe the remaining error types', () => {
    expect(new BufferOverflowError(10, 8).message).toBe(
      'Buffer overflow: requested 10 bytes but only 8 available',
    );
    expect(new DateParseError('yesterday').message).toBe('Unrecognized date: "yesterday"');
    expect(new ImageDecodeError('a.jpg', 'bad header').message).toBe('Cannot decode a.jpg: bad header');
    expect(new ImageEncodeError('a.jpg', 'too large').message).toBe('Cannot encode a.jpg: too large');
    expect(new InvalidOptionsError(['x: bad', 'y: worse']).message).toBe('Invalid options: x: bad; y: worse');
  });

  it('should wrap the cause of an aborted batch', () => {
    const cause = new ImageDecodeError('b.png', 'truncated');
    const err = new BatchProcessingError(2, 'b.png', cause);
    expect(err.message).toBe('Batch aborted at item 2 (b.png): Cannot decode b.png: truncated');
    expect(err.index).toBe(2);
    expect(err.fileName).toBe('b.png');
    expect(err.cause).toBe(cause);
  });

  it('should describe non-Error values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
