/**
 * Output-name templates.
 *
 * A pattern is literal text with placeholders:
 *   {index}      1-based position in the batch ({index:03d} zero-pads to 3 digits)
 *   {name}       original base name, extension dropped, non-word runs → "_"
 *   {date}       capture date as YYYYMMDD, empty when unknown
 * `{{` and `}}` produce literal braces. Anything else in braces is rejected.
 */

import { TemplateSyntaxError, UnsupportedTokenError } from '../errors.js';
import { dateToken } from './date.js';

export type TemplateToken = 'index' | 'name' | 'date';

type TemplatePart =
  | { kind: 'literal'; text: string }
  | { kind: 'token'; token: TemplateToken; width?: number };

export interface NameContext {
  /** 1-based */
  index: number;
  originalName: string;
  /** Raw capture timestamp, if the image has one */
  dateTime?: string | undefined;
}

export interface CompiledTemplate {
  readonly pattern: string;
  render(context: NameContext): string;
}

const TOKENS: readonly TemplateToken[] = ['index', 'name', 'date'];

function isToken(value: string): value is TemplateToken {
  return TOKENS.some(token => token === value);
}

function parsePlaceholder(body: string, pattern: string): TemplatePart {
  if (isToken(body)) return { kind: 'token', token: body };

  // Zero-padded index, e.g. {index:03d}
  const padded = /^index:0(\d{1,2})d$/.exec(body);
  if (padded?.[1] !== undefined) {
    return { kind: 'token', token: 'index', width: Number(padded[1]) };
  }

  throw new UnsupportedTokenError(body, pattern);
}

function parse(pattern: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let literal = '';

  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);

    if (ch === '{') {
      if (pattern[i + 1] === '{') {
        literal += '{';
        i++;
        continue;
      }
      const close = pattern.indexOf('}', i + 1);
      const nextOpen = pattern.indexOf('{', i + 1);
      if (close === -1 || (nextOpen !== -1 && nextOpen < close)) {
        throw new TemplateSyntaxError(pattern, i);
      }
      if (literal) parts.push({ kind: 'literal', text: literal });
      literal = '';
      parts.push(parsePlaceholder(pattern.slice(i + 1, close), pattern));
      i = close;
      continue;
    }

    if (ch === '}') {
      if (pattern[i + 1] === '}') {
        literal += '}';
        i++;
        continue;
      }
      throw new TemplateSyntaxError(pattern, i);
    }

    literal += ch;
  }

  if (literal) parts.push({ kind: 'literal', text: literal });
  return parts;
}

/**
 * Original file name without directories or extension, with every run of
 * non-word characters collapsed to a single underscore
 */
export function normalizeBaseName(originalName: string): string {
  const file = originalName.split(/[\\/]/).pop() ?? '';
  const dot = file.lastIndexOf('.');
  const stem = dot > 0 ? file.slice(0, dot) : file;
  return stem.replace(/[^\p{L}\p{N}_]+/gu, '_');
}

/**
 * Validate a pattern once; the result renders any number of names
 */
export function compileTemplate(pattern: string): CompiledTemplate {
  const parts = parse(pattern);

  const renderToken = (part: Extract<TemplatePart, { kind: 'token' }>, ctx: NameContext): string => {
    switch (part.token) {
      case 'index':
        return String(ctx.index).padStart(part.width ?? 0, '0');
      case 'name':
        return normalizeBaseName(ctx.originalName);
      case 'date':
        return dateToken(ctx.dateTime);
    }
  };

  return {
    pattern,
    render: ctx => parts.map(p => (p.kind === 'literal' ? p.text : renderToken(p, ctx))).join(''),
  };
}

/**
 * Render the output base name (no extension) for one image
 */
export function buildName(
  pattern: string,
  index: number,
  originalName: string,
  dateTime?: string,
): string {
  return compileTemplate(pattern).render({ index, originalName, dateTime });
}
