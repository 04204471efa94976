import AdmZip from 'adm-zip';

/**
 * Growing ZIP archive for one batch. Entries are deflate-compressed and
 * their names are kept unique (case-insensitively, so the archive extracts
 * cleanly on any filesystem).
 */
export class ArchiveWriter {
  // adm-zip sorts entries by name on write unless told not to
  private readonly zip = new AdmZip(undefined, { noSort: true });
  private readonly taken = new Set<string>();

  /**
   * First free name: `photo.jpg`, then `photo_2.jpg`, `photo_3.jpg`, …
   */
  uniqueName(name: string): string {
    if (!this.taken.has(name.toLowerCase())) return name;

    const dot = name.lastIndexOf('.');
    const stem = dot > 0 ? name.slice(0, dot) : name;
    const ext = dot > 0 ? name.slice(dot) : '';
    for (let n = 2; ; n++) {
      const candidate = `${stem}_${n}${ext}`;
      if (!this.taken.has(candidate.toLowerCase())) return candidate;
    }
  }

  /**
   * Add an entry; returns the name it was stored under
   */
  add(name: string, data: Uint8Array): string {
    const entryName = this.uniqueName(name);
    this.taken.add(entryName.toLowerCase());
    this.zip.addFile(entryName, Buffer.from(data.buffer, data.byteOffset, data.byteLength));
    return entryName;
  }

  get count(): number {
    return this.taken.size;
  }

  /**
   * Serialize the central directory and return the complete archive
   */
  finalize(): Uint8Array {
    return new Uint8Array(this.zip.toBuffer());
  }
}
