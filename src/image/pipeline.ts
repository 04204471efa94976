/**
 * Pixel-level steps backed by sharp: decode, orientation, re-encode.
 *
 * Every step opens its own sharp instance over the immutable source bytes,
 * so nothing here mutates an earlier stage.
 */

import sharp from 'sharp';
import { ImageDecodeError, ImageEncodeError, describeError } from '../errors.js';
import type { Dimensions, ImageAsset, OutputFormat, OutputFormatLabel, OutputPolicy } from '../types.js';
import type { ResizedImage } from './geometry.js';

/**
 * Header-level view of an uploaded image
 */
export interface SourceImage extends Dimensions {
  readonly name: string;
  readonly data: Uint8Array;
  /** Input format as reported by libvips, e.g. 'jpeg' */
  readonly format: string;
  /** EXIF orientation 1–8, 1 when absent */
  readonly orientation: number;
  /** Raw EXIF block, when the container carries one */
  readonly exif: Uint8Array | undefined;
}

/**
 * An image whose dimensions already reflect its EXIF orientation
 */
export interface OrientedImage extends Dimensions {
  readonly name: string;
  /** New pipeline that rotates/flips the pixels upright */
  open(): sharp.Sharp;
}

export const OUTPUT_FORMATS: Record<OutputFormat, { label: OutputFormatLabel; extension: string }> = {
  jpg: { label: 'JPEG', extension: 'jpg' },
  png: { label: 'PNG', extension: 'png' },
  webp: { label: 'WEBP', extension: 'webp' },
};

/**
 * Read dimensions, orientation and the EXIF block without decoding pixels
 */
export async function decodeImage(asset: ImageAsset): Promise<SourceImage> {
  let meta: sharp.Metadata;
  try {
    meta = await sharp(asset.data).metadata();
  } catch (err) {
    throw new ImageDecodeError(asset.name, describeError(err));
  }

  if (!meta.width || !meta.height) {
    throw new ImageDecodeError(asset.name, 'image has no dimensions');
  }

  return {
    name: asset.name,
    data: asset.data,
    format: meta.format ?? 'unknown',
    width: meta.width,
    height: meta.height,
    orientation: meta.orientation ?? 1,
    exif: meta.exif ? new Uint8Array(meta.exif) : undefined,
  };
}

/**
 * Orientations 5–8 transpose the image, swapping width and height
 */
export function applyOrientation(image: SourceImage): OrientedImage {
  const transposed = image.orientation >= 5 && image.orientation <= 8;
  return {
    name: image.name,
    width: transposed ? image.height : image.width,
    height: transposed ? image.width : image.height,
    // rotate() without an angle auto-orients from the EXIF tag
    open: () => sharp(image.data).rotate(),
  };
}

/**
 * Encode the resampled pixels. Output never carries metadata from sharp;
 * EXIF is spliced in afterwards for JPEG.
 */
export async function encodeImage(
  image: ResizedImage,
  name: string,
  policy: Pick<OutputPolicy, 'format' | 'quality'>,
): Promise<Uint8Array> {
  let pipeline = image.pipeline;
  switch (policy.format) {
    case 'jpg':
      // JPEG has no alpha channel
      pipeline = pipeline
        .flatten({ background: '#ffffff' })
        .jpeg({ quality: policy.quality, progressive: true, optimizeCoding: true });
      break;
    case 'png':
      pipeline = pipeline.png();
      break;
    case 'webp':
      pipeline = pipeline.webp({ quality: policy.quality });
      break;
  }

  try {
    return new Uint8Array(await pipeline.toBuffer());
  } catch (err) {
    throw new ImageEncodeError(name, describeError(err));
  }
}
