import { BufferOverflowError } from '../errors.js';
import type { ByteOrder } from '../types.js';

function ensure(data: Uint8Array, offset: number, size: number): void {
  if (offset < 0 || offset + size > data.length) {
    throw new BufferOverflowError(offset + size, data.length);
  }
}

function view(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

// ─── Reads ────────────────────────────────────────────────────────────────────

export function readUint8(data: Uint8Array, offset: number): number {
  ensure(data, offset, 1);
  return view(data).getUint8(offset);
}

export function readInt8(data: Uint8Array, offset: number): number {
  ensure(data, offset, 1);
  return view(data).getInt8(offset);
}

export function readUint16(data: Uint8Array, offset: number, order: ByteOrder): number {
  ensure(data, offset, 2);
  return view(data).getUint16(offset, order === 'II');
}

export function readInt16(data: Uint8Array, offset: number, order: ByteOrder): number {
  ensure(data, offset, 2);
  return view(data).getInt16(offset, order === 'II');
}

export function readUint32(data: Uint8Array, offset: number, order: ByteOrder): number {
  ensure(data, offset, 4);
  return view(data).getUint32(offset, order === 'II');
}

export function readInt32(data: Uint8Array, offset: number, order: ByteOrder): number {
  ensure(data, offset, 4);
  return view(data).getInt32(offset, order === 'II');
}

// ─── Writes ───────────────────────────────────────────────────────────────────

export function writeUint8(data: Uint8Array, offset: number, value: number): void {
  ensure(data, offset, 1);
  view(data).setUint8(offset, value);
}

export function writeInt8(data: Uint8Array, offset: number, value: number): void {
  ensure(data, offset, 1);
  view(data).setInt8(offset, value);
}

export function writeUint16(data: Uint8Array, offset: number, value: number, order: ByteOrder): void {
  ensure(data, offset, 2);
  view(data).setUint16(offset, value, order === 'II');
}

export function writeInt16(data: Uint8Array, offset: number, value: number, order: ByteOrder): void {
  ensure(data, offset, 2);
  view(data).setInt16(offset, value, order === 'II');
}

export function writeUint32(data: Uint8Array, offset: number, value: number, order: ByteOrder): void {
  ensure(data, offset, 4);
  view(data).setUint32(offset, value, order === 'II');
}

export function writeInt32(data: Uint8Array, offset: number, value: number, order: ByteOrder): void {
  ensure(data, offset, 4);
  view(data).setInt32(offset, value, order === 'II');
}

// ─── Byte strings ─────────────────────────────────────────────────────────────

/**
 * Concatenate byte arrays into a fresh one
 */
export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((n, p) => n + p.length, 0));
  let pos = 0;
  for (const part of parts) {
    out.set(part, pos);
    pos += part.length;
  }
  return out;
}

/**
 * True when `pattern` occurs in `data` at `offset`
 */
export function matchesAt(data: Uint8Array, offset: number, pattern: Uint8Array): boolean {
  if (offset < 0 || offset + pattern.length > data.length) return false;
  return pattern.every((byte, i) => data[offset + i] === byte);
}

/**
 * Latin-1 encode; characters above 0xFF are truncated to their low byte
 */
export function fromAscii(text: string): Uint8Array {
  return Uint8Array.from(text, ch => ch.charCodeAt(0) & 0xff);
}
