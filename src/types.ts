/**
 * Output formats the batch can re-encode into
 */
export type OutputFormat = 'jpg' | 'png' | 'webp';

/**
 * Format label written into report rows
 */
export type OutputFormatLabel = 'JPEG' | 'PNG' | 'WEBP';

/**
 * Axis that drives the target dimensions
 */
export type ResizeMode = 'Percent' | 'Width' | 'Height';

/**
 * An uploaded image: raw bytes plus the name it was uploaded under
 */
export interface ImageAsset {
  readonly data: Uint8Array;
  readonly name: string;
}

// ─── Metadata model ───────────────────────────────────────────────────────────

/** TIFF byte-order mark: 'II' = little-endian, 'MM' = big-endian */
export type ByteOrder = 'II' | 'MM';

export type IntegerType = 'byte' | 'short' | 'long' | 'sbyte' | 'sshort' | 'slong';

export type OpaqueType = 'undefined' | 'float' | 'double' | 'ifd' | 'utf8';

/** numerator / denominator */
export type Rational = readonly [number, number];

/**
 * A single tag value. ASCII fields stay as raw bytes until the summarizer
 * decodes them for display.
 */
export type MetadataValue =
  | { readonly kind: 'text'; readonly bytes: Uint8Array }
  | { readonly kind: 'integer'; readonly type: IntegerType; readonly values: readonly number[] }
  | { readonly kind: 'rational'; readonly signed: boolean; readonly values: readonly Rational[] }
  | { readonly kind: 'bytes'; readonly type: OpaqueType; readonly bytes: Uint8Array };

/**
 * IFDs carried by a metadata document.
 * primary = IFD0, capture = EXIF sub-IFD, location = GPS sub-IFD,
 * interop = Interoperability sub-IFD.
 */
export type SectionName = 'primary' | 'capture' | 'location' | 'interop';

export type MetadataSection = ReadonlyMap<number, MetadataValue>;

export interface MetadataDocument {
  readonly byteOrder: ByteOrder;
  readonly sections: Readonly<Record<SectionName, MetadataSection>>;
}

/**
 * Display projection of a metadata document
 */
export interface MetadataSummary {
  cameraMake?: string;
  cameraModel?: string;
  software?: string;
  dateTime?: string;
  lens?: string;
  gpsPresent: boolean;
}

/**
 * Fail-soft step result: either a value or the error that replaced it
 */
export type Outcome<T, E extends Error = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// ─── Request contract ─────────────────────────────────────────────────────────

export interface ResizeSpec {
  mode: ResizeMode;
  /** Percentage for Percent mode, pixels otherwise */
  value: number;
}

export interface OutputPolicy {
  format: OutputFormat;
  /** 1–100, used by JPEG and WebP only */
  quality: number;
  stripGps: boolean;
  stripSerials: boolean;
  /** Tokens: {index}, {name}, {date} */
  namePattern: string;
}

/**
 * What happens when one image in the batch cannot be processed.
 * - `fail-fast`: abort the whole batch, no archive is produced
 * - `isolate`: record the failure and continue with the next image
 */
export type FailurePolicy = 'fail-fast' | 'isolate';

export interface Dimensions {
  width: number;
  height: number;
}

// ─── Results ──────────────────────────────────────────────────────────────────

/**
 * One row per processed image, in input order
 */
export interface ReportRow {
  original: string;
  newName: string;
  width: number;
  height: number;
  format: OutputFormatLabel;
  /** Identifying tags (GPS, serials, owner) were present before and are absent from the output */
  metadataRemoved: boolean;
  gpsPresentBefore: 'Yes' | 'No';
}

/**
 * An image skipped under the `isolate` failure policy
 */
export interface BatchFailure {
  /** 1-based position in the input list */
  index: number;
  original: string;
  error: string;
}

export interface BatchResult {
  /** Finalized ZIP archive */
  archive: Uint8Array;
  report: ReportRow[];
  failures: BatchFailure[];
}

export type PreviewRow =
  | {
      file: string;
      width: number;
      height: number;
      camera: string;
      date: string;
      gps: 'Yes' | 'No';
    }
  | { file: string; error: string };

// ─── Progress events ──────────────────────────────────────────────────────────

export type BatchEvent =
  | { type: 'start'; total: number }
  | { type: 'processed'; index: number; row: ReportRow }
  | { type: 'metadata-dropped'; index: number; original: string; reason: string }
  | { type: 'failed'; index: number; original: string; error: string }
  | { type: 'done'; processed: number; failed: number };

export interface BatchOptions {
  onError?: FailurePolicy;
  onEvent?: (event: BatchEvent) => void;
}
