/**
 * peek(): quick look at a set of uploads before processing.
 *
 * One row per asset, in input order. An asset that cannot be read becomes a
 * `{ file, error }` row and does not affect the others.
 */

import { describeError } from '../errors.js';
import { decodeMetadata } from '../exif/codec.js';
import { cameraLabel, summarizeMetadata } from '../exif/summarize.js';
import { applyOrientation, decodeImage } from '../image/pipeline.js';
import type { ImageAsset, PreviewRow } from '../types.js';

async function previewOne(asset: ImageAsset): Promise<PreviewRow> {
  const source = await decodeImage(asset);
  const { width, height } = applyOrientation(source);
  const summary = summarizeMetadata(decodeMetadata(source.exif));

  return {
    file: asset.name,
    width,
    height,
    camera: cameraLabel(summary),
    date: summary.dateTime ?? '',
    gps: summary.gpsPresent ? 'Yes' : 'No',
  };
}

export async function peek(assets: readonly ImageAsset[]): Promise<PreviewRow[]> {
  const rows: PreviewRow[] = [];
  for (const asset of assets) {
    try {
      rows.push(await previewOne(asset));
    } catch (err) {
      rows.push({ file: asset.name, error: describeError(err) });
    }
  }
  return rows;
}
