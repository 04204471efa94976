/**
 * photo-batcher - batch photo resizing with EXIF redaction
 *
 * Resize, re-encode and rename a set of images, removing GPS and serial-number
 * EXIF tags, and pack the results into a ZIP archive with a processing report.
 *
 * @packageDocumentation
 */

// Main API
export { processBatch } from './operations/batch.js';
export { peek } from './operations/peek.js';
export { formatReportCsv, formatReportTable, reportRecords, REPORT_COLUMNS } from './operations/report.js';

// Configuration
export {
  resolveResizeSpec,
  resolveOutputPolicy,
  resolveFailurePolicy,
  DEFAULT_RESIZE,
  DEFAULT_POLICY,
  DEFAULT_FAILURE_POLICY,
  MAX_RESIZE_VALUE,
} from './options.js';
export type { ResizeSpecInput, OutputPolicyInput } from './options.js';

// Building blocks
export { decodeMetadata, tryDecodeMetadata, tryEncodeMetadata, emptyDocument } from './exif/codec.js';
export { sanitizeMetadata, hasIdentifyingMetadata } from './exif/sanitize.js';
export { summarizeMetadata, cameraLabel } from './exif/summarize.js';
export { computeTargetSize } from './image/geometry.js';
export { buildName, compileTemplate } from './naming/template.js';
export { parseDateToken } from './naming/date.js';
export { ActivityLog, describeEvent } from './activity-log.js';

// Types
export type {
  ImageAsset,
  ResizeSpec,
  ResizeMode,
  OutputPolicy,
  OutputFormat,
  FailurePolicy,
  MetadataDocument,
  MetadataValue,
  MetadataSummary,
  ReportRow,
  BatchFailure,
  BatchResult,
  BatchOptions,
  BatchEvent,
  PreviewRow,
  Outcome,
} from './types.js';

// Error classes
export {
  PhotoBatcherError,
  BufferOverflowError,
  CorruptedFileError,
  MetadataDecodeError,
  MetadataEncodeError,
  DateParseError,
  FilenameTemplateError,
  UnsupportedTokenError,
  TemplateSyntaxError,
  ImageDecodeError,
  ImageEncodeError,
  InvalidOptionsError,
  BatchProcessingError,
} from './errors.js';

// Container helpers for advanced usage
export { jpeg } from './formats/jpeg.js';

import { processBatch } from './operations/batch.js';
export default processBatch;
