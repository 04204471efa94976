/**
 * EXIF tag numbers referenced by name in the pipeline.
 * Any other tag is carried through by number only.
 */

/** IFD0 */
export const PrimaryTag = {
  Make: 0x010f,
  Model: 0x0110,
  Orientation: 0x0112,
  Software: 0x0131,
  DateTime: 0x0132,
  CameraOwnerName: 0xa430,
} as const;

/** EXIF sub-IFD */
export const CaptureTag = {
  DateTimeOriginal: 0x9003,
  BodySerialNumber: 0xa431,
  LensModel: 0xa434,
  LensSerialNumber: 0xa435,
} as const;

/**
 * Sub-IFD pointers. The codec rebuilds these on encode, so they are
 * never stored in a document section.
 */
export const PointerTag = {
  Exif: 0x8769,
  Gps: 0x8825,
  Interop: 0xa005,
} as const;

/** Field type codes and element sizes: TIFF 6.0 plus the EXIF 3.0 IFD and UTF-8 types */
export const FIELD_TYPES = {
  1: { name: 'byte', size: 1 },
  2: { name: 'ascii', size: 1 },
  3: { name: 'short', size: 2 },
  4: { name: 'long', size: 4 },
  5: { name: 'rational', size: 8 },
  6: { name: 'sbyte', size: 1 },
  7: { name: 'undefined', size: 1 },
  8: { name: 'sshort', size: 2 },
  9: { name: 'slong', size: 4 },
  10: { name: 'srational', size: 8 },
  11: { name: 'float', size: 4 },
  12: { name: 'double', size: 8 },
  13: { name: 'ifd', size: 4 },
  129: { name: 'utf8', size: 1 },
} as const;

export type FieldTypeCode = keyof typeof FIELD_TYPES;

export function isFieldTypeCode(code: number): code is FieldTypeCode {
  return Object.prototype.hasOwnProperty.call(FIELD_TYPES, code);
}
