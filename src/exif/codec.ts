/**
 * EXIF (TIFF IFD) block codec.
 *
 * Decodes a raw TIFF-formatted block (II/MM byte-order mark, optionally
 * prefixed with `Exif\0\0` as found in JPEG APP1 segments) into a
 * MetadataDocument, and serializes a document back into a block.
 *
 * Layout produced by the encoder:
 *   offset 0 : byte-order mark + TIFF magic 42 + IFD0 offset (= 8)
 *   offset 8 : IFD0, followed by its out-of-line values
 *   then     : EXIF IFD, GPS IFD, Interop IFD (each only when non-empty)
 */

import * as bytes from '../binary/bytes.js';
import { BufferOverflowError, MetadataDecodeError, MetadataEncodeError } from '../errors.js';
import type {
  ByteOrder,
  IntegerType,
  MetadataDocument,
  MetadataSection,
  MetadataValue,
  OpaqueType,
  Outcome,
  Rational,
} from '../types.js';
import { FIELD_TYPES, PointerTag, isFieldTypeCode } from './tags.js';
import type { FieldTypeCode } from './tags.js';

/** Prefix of the EXIF payload inside a JPEG APP1 segment */
export const EXIF_HEADER = bytes.fromAscii('Exif\x00\x00');

/** Largest TIFF block that still fits into one APP1 segment */
export const MAX_EXIF_LENGTH = 0xffff - 2 - EXIF_HEADER.length;

const TIFF_MAGIC = 42;
const MAX_IFD_ENTRIES = 1000;

const INTEGER_CODES: Record<IntegerType, FieldTypeCode> = {
  byte: 1,
  short: 3,
  long: 4,
  sbyte: 6,
  sshort: 8,
  slong: 9,
};

const INTEGER_RANGES: Record<IntegerType, readonly [number, number]> = {
  byte: [0, 0xff],
  short: [0, 0xffff],
  long: [0, 0xffffffff],
  sbyte: [-0x80, 0x7f],
  sshort: [-0x8000, 0x7fff],
  slong: [-0x80000000, 0x7fffffff],
};

const OPAQUE_CODES: Record<OpaqueType, FieldTypeCode> = {
  undefined: 7,
  float: 11,
  double: 12,
  ifd: 13,
  utf8: 129,
};

// ─── Documents ────────────────────────────────────────────────────────────────

export function emptyDocument(byteOrder: ByteOrder = 'MM'): MetadataDocument {
  return {
    byteOrder,
    sections: { primary: new Map(), capture: new Map(), location: new Map(), interop: new Map() },
  };
}

export function isEmptyDocument(doc: MetadataDocument): boolean {
  return Object.values(doc.sections).every(section => section.size === 0);
}

export function tagCount(doc: MetadataDocument): number {
  return Object.values(doc.sections).reduce((n, section) => n + section.size, 0);
}

// ─── Decoding ─────────────────────────────────────────────────────────────────

interface DecodedIfd {
  values: Map<number, MetadataValue>;
  pointers: Map<number, number>;
}

function readValue(
  tiff: Uint8Array,
  type: FieldTypeCode,
  count: number,
  offset: number,
  order: ByteOrder,
): MetadataValue {
  const size = FIELD_TYPES[type].size;
  const at = (i: number) => offset + i * size;
  const list = <T>(read: (i: number) => T): T[] => Array.from({ length: count }, (_, i) => read(i));

  switch (type) {
    case 2: {
      // Only the terminator goes; inner NULs separate the strings of a multi-string field
      const end = count > 0 && tiff[offset + count - 1] === 0 ? count - 1 : count;
      return { kind: 'text', bytes: tiff.slice(offset, offset + end) };
    }
    case 1:
      return { kind: 'integer', type: 'byte', values: list(i => bytes.readUint8(tiff, at(i))) };
    case 6:
      return { kind: 'integer', type: 'sbyte', values: list(i => bytes.readInt8(tiff, at(i))) };
    case 3:
      return { kind: 'integer', type: 'short', values: list(i => bytes.readUint16(tiff, at(i), order)) };
    case 8:
      return { kind: 'integer', type: 'sshort', values: list(i => bytes.readInt16(tiff, at(i), order)) };
    case 4:
      return { kind: 'integer', type: 'long', values: list(i => bytes.readUint32(tiff, at(i), order)) };
    case 9:
      return { kind: 'integer', type: 'slong', values: list(i => bytes.readInt32(tiff, at(i), order)) };
    case 5:
      return {
        kind: 'rational',
        signed: false,
        values: list((i): Rational => [
          bytes.readUint32(tiff, at(i), order),
          bytes.readUint32(tiff, at(i) + 4, order),
        ]),
      };
    case 10:
      return {
        kind: 'rational',
        signed: true,
        values: list((i): Rational => [
          bytes.readInt32(tiff, at(i), order),
          bytes.readInt32(tiff, at(i) + 4, order),
        ]),
      };
    case 7:
      return { kind: 'bytes', type: 'undefined', bytes: tiff.slice(offset, offset + count) };
    case 11:
      return { kind: 'bytes', type: 'float', bytes: tiff.slice(offset, offset + count * 4) };
    case 12:
      return { kind: 'bytes', type: 'double', bytes: tiff.slice(offset, offset + count * 8) };
    case 13:
      return { kind: 'bytes', type: 'ifd', bytes: tiff.slice(offset, offset + count * 4) };
    case 129:
      return { kind: 'bytes', type: 'utf8', bytes: tiff.slice(offset, offset + count) };
  }
}

function readIfd(tiff: Uint8Array, offset: number, order: ByteOrder, visited: Set<number>): DecodedIfd {
  if (visited.has(offset)) {
    throw new MetadataDecodeError('IFD loop detected', offset);
  }
  visited.add(offset);

  if (offset < 8 || offset + 2 > tiff.length) {
    throw new MetadataDecodeError('IFD offset out of range', offset);
  }
  const count = bytes.readUint16(tiff, offset, order);
  if (count > MAX_IFD_ENTRIES) {
    throw new MetadataDecodeError(`Implausible IFD entry count ${count}`, offset);
  }
  if (offset + 2 + count * 12 > tiff.length) {
    throw new MetadataDecodeError('IFD entries extend beyond block', offset);
  }

  const values = new Map<number, MetadataValue>();
  const pointers = new Map<number, number>();

  for (let i = 0; i < count; i++) {
    const pos = offset + 2 + i * 12;
    const tag = bytes.readUint16(tiff, pos, order);
    const type = bytes.readUint16(tiff, pos + 2, order);
    const n = bytes.readUint32(tiff, pos + 4, order);

    if (tag === PointerTag.Exif || tag === PointerTag.Gps || tag === PointerTag.Interop) {
      pointers.set(tag, bytes.readUint32(tiff, pos + 8, order));
      continue;
    }
    // Unknown types cannot be sized, so they cannot be carried either
    if (!isFieldTypeCode(type)) continue;

    const size = FIELD_TYPES[type].size * n;
    const dataOffset = size <= 4 ? pos + 8 : bytes.readUint32(tiff, pos + 8, order);
    if (dataOffset + size > tiff.length) {
      throw new MetadataDecodeError(`Value of tag 0x${tag.toString(16)} extends beyond block`, pos);
    }
    values.set(tag, readValue(tiff, type, n, dataOffset, order));
  }

  return { values, pointers };
}

function decodeBlock(block: Uint8Array): MetadataDocument {
  const tiff = bytes.matchesAt(block, 0, EXIF_HEADER) ? block.subarray(EXIF_HEADER.length) : block;
  if (tiff.length < 8) {
    throw new MetadataDecodeError(`EXIF block too short (${tiff.length} bytes)`);
  }

  let order: ByteOrder;
  if (tiff[0] === 0x49 && tiff[1] === 0x49) order = 'II';
  else if (tiff[0] === 0x4d && tiff[1] === 0x4d) order = 'MM';
  else throw new MetadataDecodeError('Missing byte-order mark', 0);

  if (bytes.readUint16(tiff, 2, order) !== TIFF_MAGIC) {
    throw new MetadataDecodeError('Bad TIFF magic', 2);
  }

  const visited = new Set<number>();
  const ifd0 = readIfd(tiff, bytes.readUint32(tiff, 4, order), order, visited);

  const follow = (ifd: DecodedIfd | undefined, tag: number): DecodedIfd | undefined => {
    const ptr = ifd?.pointers.get(tag);
    return ptr === undefined ? undefined : readIfd(tiff, ptr, order, visited);
  };

  const exif = follow(ifd0, PointerTag.Exif);
  const gps = follow(ifd0, PointerTag.Gps);
  const interop = follow(exif, PointerTag.Interop);

  return {
    byteOrder: order,
    sections: {
      primary: ifd0.values,
      capture: exif?.values ?? new Map(),
      location: gps?.values ?? new Map(),
      interop: interop?.values ?? new Map(),
    },
  };
}

/**
 * Decode an EXIF block, reporting why it could not be read
 */
export function tryDecodeMetadata(block: Uint8Array): Outcome<MetadataDocument, MetadataDecodeError> {
  try {
    return { ok: true, value: decodeBlock(block) };
  } catch (err) {
    if (err instanceof MetadataDecodeError) return { ok: false, error: err };
    if (err instanceof BufferOverflowError) {
      return { ok: false, error: new MetadataDecodeError(`Truncated EXIF block (${err.message})`) };
    }
    throw err;
  }
}

/**
 * Decode an EXIF block; anything unreadable yields an empty document.
 * A missing block (`undefined`) is treated the same way.
 */
export function decodeMetadata(block: Uint8Array | undefined): MetadataDocument {
  if (!block || block.length === 0) return emptyDocument();
  const outcome = tryDecodeMetadata(block);
  return outcome.ok ? outcome.value : emptyDocument();
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

interface Field {
  tag: number;
  type: FieldTypeCode;
  count: number;
  payload: Uint8Array;
}

function tagLabel(tag: number): string {
  return `0x${tag.toString(16).padStart(4, '0')}`;
}

function checkInteger(tag: number, value: number, [min, max]: readonly [number, number]): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new MetadataEncodeError(`Value ${value} of tag ${tagLabel(tag)} outside ${min}..${max}`);
  }
}

function encodeValue(tag: number, value: MetadataValue, order: ByteOrder): Field {
  switch (value.kind) {
    case 'text': {
      const payload = bytes.concat(value.bytes, new Uint8Array(1));
      return { tag, type: 2, count: payload.length, payload };
    }
    case 'integer': {
      const intType = value.type;
      const type = INTEGER_CODES[intType];
      const size = FIELD_TYPES[type].size;
      const payload = new Uint8Array(value.values.length * size);
      value.values.forEach((v, i) => {
        checkInteger(tag, v, INTEGER_RANGES[intType]);
        const at = i * size;
        switch (intType) {
          case 'byte': bytes.writeUint8(payload, at, v); break;
          case 'sbyte': bytes.writeInt8(payload, at, v); break;
          case 'short': bytes.writeUint16(payload, at, v, order); break;
          case 'sshort': bytes.writeInt16(payload, at, v, order); break;
          case 'long': bytes.writeUint32(payload, at, v, order); break;
          case 'slong': bytes.writeInt32(payload, at, v, order); break;
        }
      });
      return { tag, type, count: value.values.length, payload };
    }
    case 'rational': {
      const range = value.signed ? INTEGER_RANGES.slong : INTEGER_RANGES.long;
      const write = value.signed ? bytes.writeInt32 : bytes.writeUint32;
      const payload = new Uint8Array(value.values.length * 8);
      value.values.forEach(([num, den], i) => {
        checkInteger(tag, num, range);
        checkInteger(tag, den, range);
        write(payload, i * 8, num, order);
        write(payload, i * 8 + 4, den, order);
      });
      return { tag, type: value.signed ? 10 : 5, count: value.values.length, payload };
    }
    case 'bytes': {
      const type = OPAQUE_CODES[value.type];
      const size = FIELD_TYPES[type].size;
      if (value.bytes.length % size !== 0) {
        throw new MetadataEncodeError(
          `Tag ${tagLabel(tag)} holds ${value.bytes.length} bytes, not a multiple of ${size}`,
        );
      }
      return { tag, type, count: value.bytes.length / size, payload: value.bytes };
    }
  }
}

function encodeSection(section: MetadataSection, order: ByteOrder): Field[] {
  return [...section].map(([tag, value]) => encodeValue(tag, value, order));
}

function pointerField(tag: number): Field {
  return { tag, type: 4, count: 1, payload: new Uint8Array(4) };
}

function paddedLength(field: Field): number {
  return field.payload.length <= 4 ? 0 : field.payload.length + (field.payload.length % 2);
}

function ifdLength(fields: Field[]): number {
  return 2 + fields.length * 12 + 4 + fields.reduce((n, f) => n + paddedLength(f), 0);
}

function writeIfd(out: Uint8Array, offset: number, fields: Field[], order: ByteOrder): void {
  const sorted = [...fields].sort((a, b) => a.tag - b.tag);
  bytes.writeUint16(out, offset, sorted.length, order);

  let dataPos = offset + 2 + sorted.length * 12 + 4;
  sorted.forEach((field, i) => {
    const pos = offset + 2 + i * 12;
    bytes.writeUint16(out, pos, field.tag, order);
    bytes.writeUint16(out, pos + 2, field.type, order);
    bytes.writeUint32(out, pos + 4, field.count, order);
    if (field.payload.length <= 4) {
      out.set(field.payload, pos + 8);
    } else {
      bytes.writeUint32(out, pos + 8, dataPos, order);
      out.set(field.payload, dataPos);
      dataPos += paddedLength(field);
    }
  });
  // next-IFD link stays 0: no thumbnail IFD is written
}

function encodeDocument(doc: MetadataDocument): Uint8Array {
  const order = doc.byteOrder;
  const primary = encodeSection(doc.sections.primary, order);
  const capture = encodeSection(doc.sections.capture, order);
  const location = encodeSection(doc.sections.location, order);
  const interop = encodeSection(doc.sections.interop, order);

  const ifds: Field[][] = [primary];
  const links: { from: Field; to: Field[] }[] = [];

  if (capture.length > 0 || interop.length > 0) {
    const link = pointerField(PointerTag.Exif);
    primary.push(link);
    links.push({ from: link, to: capture });
    ifds.push(capture);
  }
  if (location.length > 0) {
    const link = pointerField(PointerTag.Gps);
    primary.push(link);
    links.push({ from: link, to: location });
    ifds.push(location);
  }
  if (interop.length > 0) {
    const link = pointerField(PointerTag.Interop);
    capture.push(link);
    links.push({ from: link, to: interop });
    ifds.push(interop);
  }

  const offsets = new Map<Field[], number>();
  let total = 8;
  for (const ifd of ifds) {
    offsets.set(ifd, total);
    total += ifdLength(ifd);
  }
  if (total > MAX_EXIF_LENGTH) {
    throw new MetadataEncodeError(`EXIF block of ${total} bytes exceeds ${MAX_EXIF_LENGTH}`);
  }

  for (const { from, to } of links) {
    bytes.writeUint32(from.payload, 0, offsets.get(to) ?? 0, order);
  }

  const out = new Uint8Array(total);
  out.set(bytes.fromAscii(order), 0);
  bytes.writeUint16(out, 2, TIFF_MAGIC, order);
  bytes.writeUint32(out, 4, 8, order);
  for (const ifd of ifds) {
    writeIfd(out, offsets.get(ifd) ?? 0, ifd, order);
  }
  return out;
}

/**
 * Serialize a document into a raw TIFF block (no `Exif\0\0` prefix)
 */
export function tryEncodeMetadata(doc: MetadataDocument): Outcome<Uint8Array, MetadataEncodeError> {
  try {
    return { ok: true, value: encodeDocument(doc) };
  } catch (err) {
    if (err instanceof MetadataEncodeError) return { ok: false, error: err };
    throw err;
  }
}
