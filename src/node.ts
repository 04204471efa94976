import { readFile, readdir, writeFile, mkdir, stat } from 'node:fs/promises';
import { resolve, dirname, basename, extname, join } from 'node:path';
import { formatReportCsv, reportRecords } from './operations/report.js';
import type { BatchResult, ImageAsset } from './types.js';

/** Extensions picked up when a directory is given */
export const IMAGE_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg', '.png', '.webp'];

export interface WrittenBatch {
  zipPath: string;
  reportPath?: string;
}

/**
 * Image files directly inside `dir` (not recursive), sorted by name
 */
export async function collectImageFiles(dir: string): Promise<string[]> {
  const absDir = resolve(dir);
  const entries = await readdir(absDir, { withFileTypes: true });
  return entries
    .filter(e => e.isFile() && IMAGE_EXTENSIONS.includes(extname(e.name).toLowerCase()))
    .map(e => join(absDir, e.name))
    .sort((a, b) => a.localeCompare(b));
}

/**
 * Expand directories and read every file into an ImageAsset named by its basename
 */
export async function loadAssets(paths: readonly string[]): Promise<ImageAsset[]> {
  const files: string[] = [];
  for (const p of paths) {
    const abs = resolve(p);
    const s = await stat(abs);
    if (s.isDirectory()) {
      files.push(...(await collectImageFiles(abs)));
    } else {
      files.push(abs);
    }
  }

  const assets: ImageAsset[] = [];
  for (const file of files) {
    assets.push({ name: basename(file), data: new Uint8Array(await readFile(file)) });
  }
  return assets;
}

/**
 * Write the archive and, optionally, the report. A `.json` report path gets
 * JSON records; anything else gets CSV.
 */
export async function writeBatchResult(
  result: BatchResult,
  zipPath: string,
  reportPath?: string,
): Promise<WrittenBatch> {
  const absZip = resolve(zipPath);
  await mkdir(dirname(absZip), { recursive: true });
  await writeFile(absZip, result.archive);

  if (reportPath === undefined) return { zipPath: absZip };

  const absReport = resolve(reportPath);
  const body = extname(absReport).toLowerCase() === '.json'
    ? JSON.stringify(reportRecords(result.report), null, 2) + '\n'
    : formatReportCsv(result.report);
  await mkdir(dirname(absReport), { recursive: true });
  await writeFile(absReport, body);
  return { zipPath: absZip, reportPath: absReport };
}
