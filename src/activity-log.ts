import type { BatchEvent } from './types.js';

export const DEFAULT_LOG_CAPACITY = 50;

/**
 * Fixed-capacity, append-only log owned by the calling shell.
 * Once full, each append evicts the oldest entry.
 */
export class ActivityLog {
  private readonly items: string[] = [];

  constructor(public readonly capacity = DEFAULT_LOG_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ActivityLog capacity must be a positive integer, got ${capacity}`);
    }
  }

  append(message: string): void {
    this.items.push(message);
    if (this.items.length > this.capacity) {
      this.items.splice(0, this.items.length - this.capacity);
    }
  }

  /** Oldest first */
  entries(): readonly string[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Event sink for `processBatch({ onEvent })`
   */
  readonly record = (event: BatchEvent): void => {
    this.append(describeEvent(event));
  };
}

/**
 * One-line rendering of a batch event
 */
export function describeEvent(event: BatchEvent): string {
  switch (event.type) {
    case 'start':
      return `Processing ${event.total} image${event.total === 1 ? '' : 's'}`;
    case 'processed':
      return `${event.row.original} → ${event.row.newName} (${event.row.width}×${event.row.height})`;
    case 'metadata-dropped':
      return `${event.original}: written without EXIF (${event.reason})`;
    case 'failed':
      return `${event.original}: ${event.error}`;
    case 'done':
      return `Processed ${event.processed} image${event.processed === 1 ? '' : 's'}, ${event.failed} failed`;
  }
}
