/**
 * Storage Tool - Writes run outputs to the local filesystem
 *
 * Writes are wholesale: a crash mid-write can leave a truncated file.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { Logger } from '../utils';

export interface StorageTool {
  putJson(path: string, value: unknown): Promise<string>;
  getJson(path: string): Promise<unknown>;
}

export class LocalStorageTool implements StorageTool {
  constructor(private baseDir: string = process.cwd()) {}

  resolvePath(path: string): string {
    return resolve(this.baseDir, path);
  }

  async putJson(path: string, value: unknown): Promise<string> {
    const fullPath = this.resolvePath(path);
    const content = JSON.stringify(value, null, 2);

    Logger.debug('Storage put', { path: fullPath, size: content.length });

    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content, 'utf-8');
    return fullPath;
  }

  async getJson(path: string): Promise<unknown> {
    const fullPath = this.resolvePath(path);
    Logger.debug('Storage get', { path: fullPath });

    const content = await readFile(fullPath, 'utf-8');
    return JSON.parse(content);
  }
}
