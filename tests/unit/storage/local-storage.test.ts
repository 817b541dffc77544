import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocalStorage } from '@/storage/local-storage.js';
import { readAndHash } from '@/utils/hash.js';

let basePath: string;
let storage: LocalStorage;

beforeEach(async () => {
  basePath = await mkdtemp(join(tmpdir(), 'threatline-storage-'));
  storage = new LocalStorage({ basePath });
});

afterEach(async () => {
  await rm(basePath, { recursive: true, force: true });
});

describe('LocalStorage', () => {
  describe('evidence files', () => {
    it('should save files under the upload directory and list them sorted', async () => {
      const path = await storage.saveFile('upload-1', 'b.log', 'second');
      await storage.saveFile('upload-1', 'a.log', 'first');

      expect(path).toBe(join(basePath, 'uploads', 'upload-1', 'b.log'));
      await expect(storage.listFiles('upload-1')).resolves.toEqual(['a.log', 'b.log']);
    });

    it('should list nothing for an unknown upload', async () => {
      await expect(storage.listFiles('nobody')).resolves.toEqual([]);
    });

    it('should stream a stored file back', async () => {
      await storage.saveFile('upload-1', 'a.log', 'hello');

      const { content, size } = await readAndHash(await storage.openFile('upload-1', 'a.log'));

      expect(content.toString('utf-8')).toBe('hello');
      expect(size).toBe(5);
    });

    it('should reject opening a missing file', async () => {
      await expect(storage.openFile('upload-1', 'missing.log')).rejects.toMatchObject({
        code: 'ENOENT',
      });
    });

    it('should keep only the base name of an uploaded file', async () => {
      const path = await storage.saveFile('upload-1', '../../escape.log', 'x');

      expect(path).toBe(join(basePath, 'uploads', 'upload-1', 'escape.log'));
    });

    it('should reject ids that could leave the storage directory', async () => {
      await expect(storage.listFiles('../etc')).rejects.toThrow('Invalid storage key: "../etc"');
    });
  });

  describe('results', () => {
    it('should write results as pretty JSON and read them back', async () => {
      await storage.saveResult('analysis-1', 'analysis', { score: 42 });

      const raw = await readFile(join(basePath, 'results', 'analysis-1', 'analysis.json'), 'utf-8');
      expect(raw).toBe('{\n  "score": 42\n}');
      await expect(storage.getResult('analysis-1', 'analysis')).resolves.toEqual({ score: 42 });
    });

    it('should return null for a missing result', async () => {
      await expect(storage.getResult('analysis-1', 'analysis')).resolves.toBeNull();
    });

    it('should report whether a result was deleted', async () => {
      await storage.saveResult('analysis-1', 'analysis', {});

      await expect(storage.deleteResult('analysis-1', 'analysis')).resolves.toBe(true);
      await expect(storage.deleteResult('analysis-1', 'analysis')).resolves.toBe(false);
    });

    it('should remove the analysis directory once', async () => {
      await storage.saveResult('analysis-1', 'analysis', {});

      await expect(storage.deleteAnalysisDirectory('analysis-1')).resolves.toBe(true);
      await expect(storage.getResult('analysis-1', 'analysis')).resolves.toBeNull();
      await expect(storage.deleteAnalysisDirectory('analysis-1')).resolves.toBe(false);
    });
  });
});
