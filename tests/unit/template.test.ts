import { describe, it, expect } from 'vitest';
import { TemplateSyntaxError, UnsupportedTokenError } from '../../src/errors.js';
import { buildName, compileTemplate, normalizeBaseName } from '../../src/naming/template.js';

describe('buildName', () => {
  it('should render index and date tokens', () => {
    expect(buildName('img_{index}_{date}', 3, 'Vacation Photo.jpg', '2023:09:10 14:23:11')).toBe('img_3_20230910');
  });

  it('should leave the date blank when unknown', () => {
    expect(buildName('img_{index}_{date}', 3, 'Vacation Photo.jpg')).toBe('img_3_');
    expect(buildName('img_{index}_{date}', 3, 'Vacation Photo.jpg', 'not a date')).toBe('img_3_');
  });

  it('should render the normalized original name', () => {
    expect(buildName('{name}-{index}', 12, 'Vacation Photo.jpg')).toBe('Vacation_Photo-12');
  });

  it('should accept hyphenated timestamps', () => {
    expect(buildName('{date}', 1, 'a.jpg', '2021-01-02 03:04:05')).toBe('20210102');
  });

  it('should zero-pad the index', () => {
    expect(buildName('{index:03d}', 7, 'a.jpg')).toBe('007');
    expect(buildName('{index:02d}', 123, 'a.jpg')).toBe('123');
  });

  it('should treat doubled braces as literals', () => {
    expect(buildName('{{x}}_{index}', 1, 'a.jpg')).toBe('{x}_1');
  });

  it('should render a pattern without tokens as-is', () => {
    expect(buildName('photo', 1, 'a.jpg')).toBe('photo');
  });
});

describe('compileTemplate', () => {
  it('should reject unknown tokens', () => {
    expect(() => compileTemplate('img_{camera}')).toThrow(UnsupportedTokenError);
    try {
      compileTemplate('img_{camera}');
    } catch (err) {
      expect(err).toBeInstanceOf(UnsupportedTokenError);
      if (err instanceof UnsupportedTokenError) expect(err.token).toBe('camera');
    }
  });

  it('should reject unmatched braces with their position', () => {
    const cases: [string, number][] = [
      ['img_{index', 4],
      ['a}b', 1],
      ['{a{b}', 0],
    ];
    for (const [pattern, position] of cases) {
      try {
        compileTemplate(pattern);
        expect.unreachable(`${pattern} should not compile`);
      } catch (err) {
        expect(err).toBeInstanceOf(TemplateSyntaxError);
        if (err instanceof TemplateSyntaxError) expect(err.position).toBe(position);
      }
    }
  });

  it('should render many names from one compilation', () => {
    const template = compileTemplate('p{index}');
    expect([1, 2, 3].map(index => template.render({ index, originalName: 'x.jpg' }))).toEqual(['p1', 'p2', 'p3']);
  });
});

describe('normalizeBaseName', () => {
  it('should drop directories and the extension', () => {
    expect(normalizeBaseName('dir/sub\\My  photo (1).jpeg')).toBe('My_photo_1_');
  });

  it('should keep a leading dot as part of the name', () => {
    expect(normalizeBaseName('.hidden')).toBe('_hidden');
  });

  it('should keep letters outside ASCII', () => {
    expect(normalizeBaseName('café crème.png')).toBe('café_crème');
  });
});
