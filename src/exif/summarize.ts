import type { MetadataDocument, MetadataSection, MetadataSummary, MetadataValue } from '../types.js';
import { CaptureTag, PrimaryTag } from './tags.js';

const utf8 = new TextDecoder('utf-8', { fatal: false });

/**
 * Render a tag value for display. Byte content is decoded as UTF-8 with
 * U+FFFD for invalid sequences, so this never throws. The strings of a
 * NUL-separated text field are joined with ", ".
 */
export function displayValue(value: MetadataValue): string {
  switch (value.kind) {
    case 'text':
      return utf8
        .decode(value.bytes)
        .split('\0')
        .map(part => part.trim())
        .filter(part => part.length > 0)
        .join(', ');
    case 'bytes':
      return utf8.decode(value.bytes).replace(/\0+$/, '').trim();
    case 'integer':
      return value.values.join(', ');
    case 'rational':
      return value.values.map(([num, den]) => `${num}/${den}`).join(', ');
  }
}

function field(section: MetadataSection, tag: number): string | undefined {
  const value = section.get(tag);
  if (value === undefined) return undefined;
  const text = displayValue(value);
  return text.length > 0 ? text : undefined;
}

/**
 * Project a document into the handful of fields shown in previews and used for naming
 */
export function summarizeMetadata(doc: MetadataDocument): MetadataSummary {
  const { primary, capture, location } = doc.sections;

  const cameraMake = field(primary, PrimaryTag.Make);
  const cameraModel = field(primary, PrimaryTag.Model);
  const software = field(primary, PrimaryTag.Software);
  const dateTime = field(primary, PrimaryTag.DateTime) ?? field(capture, CaptureTag.DateTimeOriginal);
  const lens = field(capture, CaptureTag.LensModel);

  return {
    ...(cameraMake !== undefined && { cameraMake }),
    ...(cameraModel !== undefined && { cameraModel }),
    ...(software !== undefined && { software }),
    ...(dateTime !== undefined && { dateTime }),
    ...(lens !== undefined && { lens }),
    gpsPresent: location.size > 0,
  };
}

/**
 * "Make Model", or an empty string when neither is known
 */
export function cameraLabel(summary: MetadataSummary): string {
  return [summary.cameraMake, summary.cameraModel].filter(Boolean).join(' ');
}
