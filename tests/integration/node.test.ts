import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { collectImageFiles, loadAssets, writeBatchResult } from '../../src/node.js';
import type { BatchResult } from '../../src/types.js';

describe('node helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'photo-batcher-node-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should list image files in name order without recursing', async () => {
    for (const name of ['c.WEBP', 'a.jpg', 'b.jpeg', 'd.png', 'readme.md']) {
      await writeFile(join(dir, name), 'x');
    }
    await mkdir(join(dir, 'nested'));
    await writeFile(join(dir, 'nested', 'e.jpg'), 'x');

    const files = await collectImageFiles(dir);
    expect(files).toEqual(['a.jpg', 'b.jpeg', 'c.WEBP', 'd.png'].map(name => join(dir, name)));
  });

  it('should load files and directories as named assets', async () => {
    await mkdir(join(dir, 'set'));
    await writeFile(join(dir, 'set', 'one.jpg'), Uint8Array.from([1, 2]));
    await writeFile(join(dir, 'single.png'), Uint8Array.from([3]));

    const assets = await loadAssets([join(dir, 'set'), join(dir, 'single.png')]);
    expect(assets.map(a => a.name)).toEqual(['one.jpg', 'single.png']);
    expect([...(assets[0]?.data ?? [])]).toEqual([1, 2]);
  });

  it('should fail for missing paths', async () => {
    await expect(loadAssets([join(dir, 'missing.jpg')])).rejects.toThrow(/ENOENT/);
  });

  it('should write the archive and report, creating directories', async () => {
    const result: BatchResult = {
      archive: Uint8Array.from([0x50, 0x4b]),
      report: [
        {
          original: 'a.jpg',
          newName: 'img_1_.jpg',
          width: 2,
          height: 1,
          format: 'JPEG',
          metadataRemoved: false,
          gpsPresentBefore: 'No',
        },
      ],
      failures: [],
    };

    const written = await writeBatchResult(result, join(dir, 'out', 'x.zip'), join(dir, 'out', 'report.csv'));

    expect(written).toEqual({ zipPath: join(dir, 'out', 'x.zip'), reportPath: join(dir, 'out', 'report.csv') });
    expect([...(await readFile(written.zipPath))]).toEqual([0x50, 0x4b]);
    expect(await readFile(join(dir, 'out', 'report.csv'), 'utf-8')).toBe(
      'original,new_name,width,height,format,exif_removed,gps_present_before\na.jpg,img_1_.jpg,2,1,JPEG,false,No\n',
    );
  });

  it('should skip the report when no path is given', async () => {
    const written = await writeBatchResult({ archive: new Uint8Array(0), report: [], failures: [] }, join(dir, 'y.zip'));
    expect(written).toEqual({ zipPath: join(dir, 'y.zip') });
  });
});
