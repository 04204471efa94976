import sharp from 'sharp';
import type { Dimensions, ResizeSpec } from '../types.js';
import type { OrientedImage } from './pipeline.js';

/**
 * Aspect-preserving target size. The driving axis takes the requested value,
 * the derived axis is rounded down and never drops below one pixel.
 */
export function computeTargetSize(source: Dimensions, spec: ResizeSpec): Dimensions {
  const { width, height } = source;

  switch (spec.mode) {
    case 'Width': {
      const w = spec.value;
      return { width: w, height: Math.max(1, Math.floor((height * w) / width)) };
    }
    case 'Height': {
      const h = spec.value;
      return { width: Math.max(1, Math.floor((width * h) / height)), height: h };
    }
    case 'Percent': {
      const pct = Math.max(1, spec.value);
      return {
        width: Math.max(1, Math.floor((width * pct) / 100)),
        height: Math.max(1, Math.floor((height * pct) / 100)),
      };
    }
  }
}

/**
 * A resampled image, not yet encoded
 */
export interface ResizedImage extends Dimensions {
  readonly pipeline: sharp.Sharp;
}

/**
 * Build a fresh pipeline that applies EXIF orientation and resamples with
 * Lanczos-3 to the exact target size. `image` is not modified.
 */
export function resizeImage(image: OrientedImage, spec: ResizeSpec): ResizedImage {
  const target = computeTargetSize(image, spec);
  const pipeline = image
    .open()
    .resize(target.width, target.height, { fit: 'fill', kernel: sharp.kernel.lanczos3 });
  return { ...target, pipeline };
}
