/**
 * Policy-driven redaction of a metadata document.
 */

import type { MetadataDocument, MetadataValue, SectionName } from '../types.js';
import { CaptureTag, PrimaryTag } from './tags.js';

export interface SanitizeOptions {
  /** Drop the whole GPS section */
  stripGps: boolean;
  /** Drop body serial, lens serial and camera owner */
  stripSerials: boolean;
}

/**
 * Tags removed by `stripSerials`, by section
 */
export const IDENTIFYING_TAGS: readonly (readonly [SectionName, number])[] = [
  ['capture', CaptureTag.BodySerialNumber],
  ['capture', CaptureTag.LensSerialNumber],
  ['primary', PrimaryTag.CameraOwnerName],
];

function copySections(doc: MetadataDocument): Record<SectionName, Map<number, MetadataValue>> {
  return {
    primary: new Map(doc.sections.primary),
    capture: new Map(doc.sections.capture),
    location: new Map(doc.sections.location),
    interop: new Map(doc.sections.interop),
  };
}

/**
 * Return a redacted copy of `doc`. The input is left untouched so the
 * before/after pair can be compared for the report.
 */
export function sanitizeMetadata(doc: MetadataDocument, options: SanitizeOptions): MetadataDocument {
  const sections = copySections(doc);

  if (options.stripGps) {
    sections.location = new Map();
  }
  if (options.stripSerials) {
    for (const [section, tag] of IDENTIFYING_TAGS) {
      sections[section].delete(tag);
    }
  }

  return { byteOrder: doc.byteOrder, sections };
}

/**
 * Copy of `doc` without the given tags
 */
export function withoutTags(
  doc: MetadataDocument,
  tags: readonly (readonly [SectionName, number])[],
): MetadataDocument {
  const sections = copySections(doc);
  for (const [section, tag] of tags) {
    sections[section].delete(tag);
  }
  return { byteOrder: doc.byteOrder, sections };
}

/**
 * True when the document carries a location tag or one of the identifying tags
 */
export function hasIdentifyingMetadata(doc: MetadataDocument): boolean {
  return (
    doc.sections.location.size > 0 ||
    IDENTIFYING_TAGS.some(([section, tag]) => doc.sections[section].has(tag))
  );
}
