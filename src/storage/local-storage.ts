/**
 * Filesystem-backed Storage.
 *
 * Layout under `basePath`:
 *   <uploadsDir>/<uploadId>/<fileName>        evidence files
 *   <resultsDir>/<analysisId>/<resultType>.json
 */

import { createReadStream } from 'node:fs';
import { mkdir, readdir, readFile, rm, stat, unlink, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Readable } from 'node:stream';
import type { Storage } from '../types/collaborators.js';
import type { StorageConfig } from '../types/config.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('storage');

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  basePath: './storage',
  uploadsDir: 'uploads',
  resultsDir: 'results',
};

export class LocalStorage implements Storage {
  private readonly config: StorageConfig;

  constructor(config: Partial<StorageConfig> = {}) {
    this.config = { ...DEFAULT_STORAGE_CONFIG, ...config };
  }

  // -----------------------------------------------------------------------
  // Evidence files
  // -----------------------------------------------------------------------

  /**
   * Store an evidence file and return the path it was written to.
   */
  async saveFile(uploadId: string, fileName: string, data: Buffer | string): Promise<string> {
    const directory = this.uploadDirectory(uploadId);
    await mkdir(directory, { recursive: true });

    const filePath = join(directory, safeFileName(fileName));
    await writeFile(filePath, data);
    logger.debug(`Saved ${filePath}`);
    return filePath;
  }

  async listFiles(uploadId: string): Promise<string[]> {
    const directory = this.uploadDirectory(uploadId);
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  async openFile(uploadId: string, fileName: string): Promise<Readable> {
    const filePath = join(this.uploadDirectory(uploadId), safeFileName(fileName));
    // Surface a missing file here rather than on the first read.
    await stat(filePath);
    return createReadStream(filePath);
  }

  // -----------------------------------------------------------------------
  // Results
  // -----------------------------------------------------------------------

  async saveResult(analysisId: string, resultType: string, data: unknown): Promise<void> {
    const directory = this.resultDirectory(analysisId);
    await mkdir(directory, { recursive: true });
    await writeFile(this.resultPath(analysisId, resultType), JSON.stringify(data, null, 2), 'utf-8');
    logger.debug(`Saved ${resultType} result for ${analysisId}`);
  }

  async getResult(analysisId: string, resultType: string): Promise<unknown> {
    try {
      const raw = await readFile(this.resultPath(analysisId, resultType), 'utf-8');
      return JSON.parse(raw);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async deleteResult(analysisId: string, resultType: string): Promise<boolean> {
    try {
      await unlink(this.resultPath(analysisId, resultType));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  async deleteAnalysisDirectory(analysisId: string): Promise<boolean> {
    const directory = this.resultDirectory(analysisId);
    try {
      await stat(directory);
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
    await rm(directory, { recursive: true, force: true });
    return true;
  }

  // -----------------------------------------------------------------------
  // Paths
  // -----------------------------------------------------------------------

  private uploadDirectory(uploadId: string): string {
    return join(this.config.basePath, this.config.uploadsDir, safeId(uploadId));
  }

  private resultDirectory(analysisId: string): string {
    return join(this.config.basePath, this.config.resultsDir, safeId(analysisId));
  }

  private resultPath(analysisId: string, resultType: string): string {
    return join(this.resultDirectory(analysisId), `${safeId(resultType)}.json`);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function safeId(id: string): string {
  if (!ID_PATTERN.test(id)) {
    throw new Error(`Invalid storage key: ${JSON.stringify(id)}`);
  }
  return id;
}

function safeFileName(fileName: string): string {
  const name = basename(fileName);
  if (name === '' || name === '.' || name === '..') {
    throw new Error(`Invalid file name: ${JSON.stringify(fileName)}`);
  }
  return name;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
