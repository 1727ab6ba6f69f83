import { FileUtils } from '../utils/fileUtils';
import fs from 'fs-extra';
import path from 'path';
import { TestPaths } from './test-config';

describe('FileUtils', () => {
  const testDir = TestPaths.unit.fileUtils;

  beforeEach(async () => {
    await fs.ensureDir(testDir);
  });

  afterEach(async () => {
    await fs.remove(testDir);
  });

  describe('ensureDir', () => {
    it('should create directory if it does not exist', async () => {
      const dirPath = path.join(testDir, 'new-dir', 'nested');
      await FileUtils.ensureDir(dirPath);

      const exists = await fs.pathExists(dirPath);
      expect(exists).toBe(true);
    });

    it('should not throw error if directory already exists', async () => {
      const dirPath = path.join(testDir, 'existing-dir');
      await fs.ensureDir(dirPath);

      await expect(FileUtils.ensureDir(dirPath)).resolves.toBeUndefined();
    });
  });

  describe('readJSON', () => {
    it('should read JSON data', async () => {
      const filePath = path.join(testDir, 'test.json');
      const testData = { outputDir: '/books', transfer: { skipExisting: true } };

      await fs.writeJson(filePath, testData);
      const readData = await FileUtils.readJSON(filePath);

      expect(readData).toEqual(testData);
    });

    it('should return null for non-existent file', async () => {
      const filePath = path.join(testDir, 'nonexistent.json');
      const result = await FileUtils.readJSON(filePath);

      expect(result).toBeNull();
    });
  });

  describe('deleteFile', () => {
    it('should delete an existing file and ignore a missing one', async () => {
      const filePath = path.join(testDir, 'delete-me.txt');
      await fs.writeFile(filePath, 'content');

      await FileUtils.deleteFile(filePath);
      await FileUtils.deleteFile(filePath);

      expect(await fs.pathExists(filePath)).toBe(false);
    });
  });

  describe('getFileSize', () => {
    it('should return the file size in bytes', async () => {
      const filePath = path.join(testDir, 'sized.bin');
      await fs.writeFile(filePath, Buffer.alloc(1234));

      expect(await FileUtils.getFileSize(filePath)).toBe(1234);
    });

    it('should return 0 for a missing file', async () => {
      expect(await FileUtils.getFileSize(path.join(testDir, 'missing.bin'))).toBe(0);
    });
  });

  describe('readHead', () => {
    it('should read only the leading bytes', async () => {
      const filePath = path.join(testDir, 'doc.pdf');
      await fs.writeFile(filePath, '%PDF-1.7 rest of the document');

      expect((await FileUtils.readHead(filePath, 5)).toString('ascii')).toBe('%PDF-');
    });

    it('should return fewer bytes for a short file', async () => {
      const filePath = path.join(testDir, 'short.txt');
      await fs.writeFile(filePath, 'ab');

      expect((await FileUtils.readHead(filePath, 5)).toString('ascii')).toBe('ab');
    });
  });

  describe('sanitizeFilename', () => {
    it('should replace characters that file systems reject', () => {
      expect(FileUtils.sanitizeFilename('a<b>c:d"e/f\\g|h?i*j')).toBe('a_b_c_d_e_f_g_h_i_j');
      expect(FileUtils.sanitizeFilename('tab\there')).toBe('tab_here');
    });

    it('should keep spaces and CJK characters', () => {
      expect(FileUtils.sanitizeFilename('人教版 语文 一年级')).toBe('人教版 语文 一年级');
    });

    it('should collapse runs of underscores and strip leading dots', () => {
      expect(FileUtils.sanitizeFilename('a//b')).toBe('a_b');
      expect(FileUtils.sanitizeFilename('..hidden')).toBe('hidden');
    });

    it('should fall back to a placeholder for empty names', () => {
      expect(FileUtils.sanitizeFilename('   ')).toBe('untitled');
      expect(FileUtils.sanitizeFilename('...')).toBe('untitled');
    });
  });

  describe('documentFileName', () => {
    it('should join publisher and title', () => {
      expect(FileUtils.documentFileName('人教版', '数学 / 二年级')).toBe('人教版数学 _ 二年级.pdf');
      expect(FileUtils.documentFileName('', 'Atlas')).toBe('Atlas.pdf');
    });
  });

  describe('temporaryPathFor', () => {
    it('should place a unique partial file beside the destination', () => {
      const destination = path.join(testDir, 'book.pdf');
      const first = FileUtils.temporaryPathFor(destination);
      const second = FileUtils.temporaryPathFor(destination);

      expect(path.dirname(first)).toBe(testDir);
      expect(path.basename(first)).toMatch(/^book\.pdf\.[0-9a-f-]{36}\.part$/);
      expect(first).not.toBe(second);
    });
  });
});
