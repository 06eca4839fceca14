/**
 * Bounded cache of decoded file content
 *
 * Keyed by resolved path; an entry is valid only while the file's mtime is
 * unchanged. Re-generating from the same apidoc.js (e.g. once per profile)
 * skips re-reading a multi-megabyte file.
 */

import fs from 'fs/promises';
import path from 'path';
import { DEFAULTS } from './constants.js';

interface CacheEntry {
  content: string;
  mtimeMs: number;
}

export interface FileCacheOptions {
  maxEntries?: number;
}

export class FileContentCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;

  constructor(options: FileCacheOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULTS.CACHE_MAX_ENTRIES);
  }

  /**
   * Return the UTF-8 content of a file, reading it only when missing or stale
   */
  async getOrLoad(filePath: string): Promise<string> {
    const key = path.resolve(filePath);
    const { mtimeMs } = await fs.stat(key);

    const cached = this.entries.get(key);
    if (cached && cached.mtimeMs === mtimeMs) {
      // Refresh recency
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached.content;
    }

    const content = await fs.readFile(key, 'utf-8');
    this.entries.delete(key);
    this.entries.set(key, { content, mtimeMs });
    this.evict();
    return content;
  }

  has(filePath: string): boolean {
    return this.entries.has(path.resolve(filePath));
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private evict(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
