import fs from 'fs-extra';
import path from 'path';
import crypto from 'crypto';
import { logger } from './logger';

const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

export class FileUtils {
  static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      logger.error(`Failed to create directory: ${dirPath}`, error);
      throw error;
    }
  }

  static async readJSON(filePath: string): Promise<unknown> {
    if (!(await fs.pathExists(filePath))) {
      return null;
    }
    return fs.readJson(filePath);
  }

  static async fileExists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  static async deleteFile(filePath: string): Promise<void> {
    try {
      if (await fs.pathExists(filePath)) {
        await fs.remove(filePath);
      }
    } catch (error) {
      logger.error(`Failed to delete file: ${filePath}`, error);
      throw error;
    }
  }

  static async getFileSize(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error) {
      logger.debug(`Failed to get file size: ${filePath}`, error);
      return 0;
    }
  }

  /** Reads at most `length` bytes from the start of a file. */
  static async readHead(filePath: string, length: number): Promise<Buffer> {
    const handle = await fs.promises.open(filePath, 'r');
    try {
      const buffer = Buffer.alloc(length);
      const { bytesRead } = await handle.read(buffer, 0, length, 0);
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  /**
   * Replaces characters that are not allowed in file names. Unlike a slug,
   * spaces and non-Latin scripts are kept so titles stay readable.
   */
  static sanitizeFilename(filename: string): string {
    const cleaned = filename
      .replace(UNSAFE_FILENAME_CHARS, '_')
      .replace(/_{2,}/g, '_')
      .trim()
      .replace(/^\.+/, '');
    return cleaned.length > 0 ? cleaned : 'untitled';
  }

  /** `${publisher}${title}.pdf`, made safe for the file system. */
  static documentFileName(publisher: string, title: string): string {
    return `${FileUtils.sanitizeFilename(`${publisher}${title}`)}.pdf`;
  }

  static generateUniqueId(): string {
    return crypto.randomUUID();
  }

  static temporaryPathFor(destination: string): string {
    return path.join(
      path.dirname(destination),
      `${path.basename(destination)}.${FileUtils.generateUniqueId()}.part`
    );
  }
}
