import { CorruptedFileError, MetadataEncodeError } from '../errors.js';
import * as bytes from '../binary/bytes.js';
import { EXIF_HEADER, MAX_EXIF_LENGTH } from '../exif/codec.js';

/**
 * JPEG marker constants
 */
const MARKERS = {
  SOI: 0xffd8, // Start of Image
  SOS: 0xffda, // Start of Scan (entropy-coded data follows)
  EOI: 0xffd9, // End of Image
  APP0: 0xffe0, // JFIF
  APP1: 0xffe1, // EXIF, XMP
} as const;

const SOI_BYTES = new Uint8Array([0xff, 0xd8]);

/**
 * Marker segment preceding the scan data
 */
interface JpegSegment {
  marker: number;
  /** Whole segment including marker and length */
  data: Uint8Array;
  offset: number;
}

interface JpegLayout {
  segments: JpegSegment[];
  /** SOS onwards, copied through untouched */
  tail: Uint8Array;
}

/**
 * Split a JPEG into its header segments and the scan data
 */
function parseSegments(data: Uint8Array): JpegLayout {
  if (!bytes.matchesAt(data, 0, SOI_BYTES)) {
    throw new CorruptedFileError('Invalid JPEG: missing SOI marker');
  }

  const segments: JpegSegment[] = [];
  let offset = 2;

  while (offset < data.length) {
    if (data[offset] !== 0xff) {
      throw new CorruptedFileError('Invalid JPEG: expected marker', offset);
    }
    const start = offset;

    // Fill bytes
    while (offset < data.length && data[offset] === 0xff) {
      offset++;
    }
    if (offset >= data.length) break;

    const marker = 0xff00 | bytes.readUint8(data, offset);
    offset++;

    if (marker === MARKERS.SOS || marker === MARKERS.EOI) {
      return { segments, tail: data.subarray(start) };
    }

    // Standalone markers: TEM and RST0-7
    if (marker === 0xff01 || (marker >= 0xffd0 && marker <= 0xffd7)) {
      segments.push({ marker, data: data.subarray(start, offset), offset: start });
      continue;
    }

    const length = bytes.readUint16(data, offset, 'MM');
    if (length < 2) {
      throw new CorruptedFileError('Invalid JPEG: segment length too small', offset);
    }
    const end = offset + length;
    if (end > data.length) {
      throw new CorruptedFileError('Invalid JPEG: segment extends beyond file', offset);
    }

    segments.push({ marker, data: data.subarray(start, end), offset: start });
    offset = end;
  }

  return { segments, tail: new Uint8Array(0) };
}

function isExifSegment(segment: JpegSegment): boolean {
  return segment.marker === MARKERS.APP1 && bytes.matchesAt(segment.data, 4, EXIF_HEADER);
}

/**
 * The TIFF block of the first EXIF APP1 segment, if any
 */
export function extractExif(data: Uint8Array): Uint8Array | undefined {
  const exif = parseSegments(data).segments.find(isExifSegment);
  return exif?.data.slice(4 + EXIF_HEADER.length);
}

/**
 * Wrap a TIFF block into an APP1 segment
 */
export function buildExifSegment(tiff: Uint8Array): Uint8Array {
  if (tiff.length > MAX_EXIF_LENGTH) {
    throw new MetadataEncodeError(`EXIF block of ${tiff.length} bytes does not fit an APP1 segment`);
  }
  const segment = new Uint8Array(4 + EXIF_HEADER.length + tiff.length);
  bytes.writeUint16(segment, 0, MARKERS.APP1, 'MM');
  bytes.writeUint16(segment, 2, segment.length - 2, 'MM');
  segment.set(EXIF_HEADER, 4);
  segment.set(tiff, 4 + EXIF_HEADER.length);
  return segment;
}

/**
 * Replace any EXIF segment with `tiff`, placed right after SOI and JFIF (APP0)
 */
export function embedExif(data: Uint8Array, tiff: Uint8Array): Uint8Array {
  const { segments, tail } = parseSegments(data);
  const app1 = buildExifSegment(tiff);

  const kept = segments.filter(s => !isExifSegment(s));
  const jfifCount = kept.findIndex(s => s.marker !== MARKERS.APP0);
  const insertAt = jfifCount === -1 ? kept.length : jfifCount;

  return bytes.concat(
    SOI_BYTES,
    ...kept.slice(0, insertAt).map(s => s.data),
    app1,
    ...kept.slice(insertAt).map(s => s.data),
    tail,
  );
}

export const jpeg = {
  extractExif,
  embedExif,
  buildExifSegment,
};
