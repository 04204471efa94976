/**
 * Batch processing: orient, redact, resize, rename and re-encode a list of
 * uploaded images, packing the outputs into a ZIP archive with a report.
 *
 * Images are handled strictly one after another; each one's sharp pipeline
 * is created, consumed and dropped before the next image is opened.
 */

import { BatchProcessingError, describeError } from '../errors.js';
import type { MetadataEncodeError } from '../errors.js';
import { decodeMetadata, isEmptyDocument, tryEncodeMetadata } from '../exif/codec.js';
import { hasIdentifyingMetadata, sanitizeMetadata, withoutTags } from '../exif/sanitize.js';
import { summarizeMetadata } from '../exif/summarize.js';
import { PrimaryTag } from '../exif/tags.js';
import { jpeg } from '../formats/jpeg.js';
import { resizeImage } from '../image/geometry.js';
import { OUTPUT_FORMATS, applyOrientation, decodeImage, encodeImage } from '../image/pipeline.js';
import { compileTemplate } from '../naming/template.js';
import type { CompiledTemplate } from '../naming/template.js';
import {
  resolveFailurePolicy,
  resolveOutputPolicy,
  resolveResizeSpec,
} from '../options.js';
import type { OutputPolicyInput, ResizeSpecInput } from '../options.js';
import type {
  BatchEvent,
  BatchFailure,
  BatchOptions,
  BatchResult,
  ImageAsset,
  MetadataDocument,
  OutputPolicy,
  Outcome,
  ReportRow,
  ResizeSpec,
} from '../types.js';
import { ArchiveWriter } from './archive.js';

interface BatchContext {
  spec: ResizeSpec;
  policy: OutputPolicy;
  template: CompiledTemplate;
  emit: (event: BatchEvent) => void;
}

interface ProcessedItem {
  baseName: string;
  data: Uint8Array;
  width: number;
  height: number;
  metadataRemoved: boolean;
  gpsPresentBefore: boolean;
}

/**
 * Encode the sanitized document and splice it into the JPEG output
 */
function embedMetadata(
  output: Uint8Array,
  doc: MetadataDocument,
): Outcome<Uint8Array, MetadataEncodeError> {
  const encoded = tryEncodeMetadata(doc);
  if (!encoded.ok) return encoded;
  return { ok: true, value: jpeg.embedExif(output, encoded.value) };
}

/**
 * Output names must not create directories inside the archive
 */
function flattenName(name: string): string {
  return name.replace(/[\\/]/g, '_');
}

async function processItem(asset: ImageAsset, index: number, ctx: BatchContext): Promise<ProcessedItem> {
  const { spec, policy, template } = ctx;

  // 1. decode + 2. orientation; the tag is consumed by the transpose
  const source = await decodeImage(asset);
  const oriented = applyOrientation(source);
  const metadata = withoutTags(decodeMetadata(source.exif), [['primary', PrimaryTag.Orientation]]);

  // 3. summarize, 4. sanitize
  const summary = summarizeMetadata(metadata);
  const sanitized = sanitizeMetadata(metadata, policy);

  // 5. resize
  const resized = resizeImage(oriented, spec);

  // 6. name
  const baseName = flattenName(template.render({ index, originalName: asset.name, dateTime: summary.dateTime }));

  // 7. encode, EXIF for JPEG only
  let data = await encodeImage(resized, asset.name, policy);
  if (policy.format === 'jpg' && !isEmptyDocument(sanitized)) {
    const embedded = embedMetadata(data, sanitized);
    if (embedded.ok) {
      data = embedded.value;
    } else {
      ctx.emit({ type: 'metadata-dropped', index, original: asset.name, reason: embedded.error.message });
    }
  }

  // Judge removal from what was actually written
  const written = policy.format === 'jpg' ? decodeMetadata(jpeg.extractExif(data)) : undefined;
  const metadataRemoved =
    hasIdentifyingMetadata(metadata) && (written === undefined || !hasIdentifyingMetadata(written));

  return {
    baseName,
    data,
    width: resized.width,
    height: resized.height,
    metadataRemoved,
    gpsPresentBefore: summary.gpsPresent,
  };
}

/**
 * Process a batch of images into a ZIP archive and a per-image report.
 *
 * With the default `fail-fast` policy the first image that cannot be
 * processed aborts the batch with a BatchProcessingError and no archive.
 * With `isolate` the image is listed in `failures` and skipped.
 * Invalid options and naming patterns are rejected before any image is read.
 *
 * @param assets        Uploaded images, in output order
 * @param resizeSpec    Resize mode and value (defaults: Percent 50)
 * @param outputPolicy  Output format, quality, redaction flags, naming pattern
 */
export async function processBatch(
  assets: readonly ImageAsset[],
  resizeSpec: ResizeSpecInput = {},
  outputPolicy: OutputPolicyInput = {},
  options: BatchOptions = {},
): Promise<BatchResult> {
  const policy = resolveOutputPolicy(outputPolicy);
  const ctx: BatchContext = {
    spec: resolveResizeSpec(resizeSpec),
    policy,
    template: compileTemplate(policy.namePattern),
    emit: options.onEvent ?? (() => undefined),
  };
  const onError = resolveFailurePolicy(options.onError);
  const { extension, label } = OUTPUT_FORMATS[policy.format];

  const archive = new ArchiveWriter();
  const report: ReportRow[] = [];
  const failures: BatchFailure[] = [];

  ctx.emit({ type: 'start', total: assets.length });

  for (const [i, asset] of assets.entries()) {
    const index = i + 1;
    try {
      const item = await processItem(asset, index, ctx);
      const newName = archive.add(`${item.baseName}.${extension}`, item.data);
      const row: ReportRow = {
        original: asset.name,
        newName,
        width: item.width,
        height: item.height,
        format: label,
        metadataRemoved: item.metadataRemoved,
        gpsPresentBefore: item.gpsPresentBefore ? 'Yes' : 'No',
      };
      report.push(row);
      ctx.emit({ type: 'processed', index, row });
    } catch (err) {
      if (onError === 'fail-fast') {
        throw new BatchProcessingError(index, asset.name, err);
      }
      const failure: BatchFailure = { index, original: asset.name, error: describeError(err) };
      failures.push(failure);
      ctx.emit({ type: 'failed', ...failure });
    }
  }

  ctx.emit({ type: 'done', processed: report.length, failed: failures.length });
  return { archive: archive.finalize(), report, failures };
}
