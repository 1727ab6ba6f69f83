import fs from 'fs-extra';
import path from 'path';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { EventEmitter } from 'events';
import {
  FileTransfer,
  MirrorAttempt,
  MirrorEndpoint,
  TransferProgress,
  TransferResult,
  TransferStatus,
} from '../types';
import { describeError, NetworkError, ServiceError, ValidationError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';
import { httpGet } from '../utils/http';
import { logger } from '../utils/logger';

export const PDF_MAGIC = Buffer.from('%PDF-', 'ascii');

export interface TransferEngineOptions {
  mirrors: MirrorEndpoint[];
  requestTimeout: number;
  minDocumentBytes: number;
  headers: Record<string, string>;
}

export interface MirrorCandidate {
  mirror: MirrorEndpoint;
  url: string;
}

interface DocumentCheck {
  bytesWritten: number;
  contentType: string;
  contentLength: number | null;
}

/**
 * Throws a ValidationError unless the file at `filePath` looks like a real
 * PDF rather than an error page or placeholder.
 */
export async function validateDocument(
  filePath: string,
  check: DocumentCheck,
  minDocumentBytes: number
): Promise<void> {
  if (/text\/html/i.test(check.contentType)) {
    throw new ValidationError(`Received an HTML page (${check.bytesWritten} bytes)`);
  }

  if (check.contentLength !== null && check.contentLength !== check.bytesWritten) {
    throw new ValidationError(
      `Truncated body: expected ${check.contentLength} bytes, got ${check.bytesWritten}`
    );
  }

  if (check.bytesWritten <= minDocumentBytes) {
    throw new ValidationError(
      `Body too small for a document: ${check.bytesWritten} bytes (minimum ${minDocumentBytes})`
    );
  }

  const head = await FileUtils.readHead(filePath, PDF_MAGIC.length);
  if (!head.equals(PDF_MAGIC)) {
    throw new ValidationError('Body does not start with a PDF signature');
  }
}

export function formatBytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Downloads a resolved path fragment from the first mirror that serves a
 * valid document. Bytes land in a temporary file beside the destination and
 * are renamed into place only after validation, so the destination either
 * keeps its previous content or holds a complete document.
 */
export class MirrorTransferEngine extends EventEmitter implements FileTransfer {
  constructor(private options: TransferEngineOptions) {
    super();
  }

  buildCandidates(fragment: string): MirrorCandidate[] {
    const suffix = fragment.startsWith('/') ? fragment : `/${fragment}`;
    return this.options.mirrors.map(mirror => ({
      mirror,
      url: `${mirror.baseUrl.replace(/\/+$/, '')}${suffix}`,
    }));
  }

  async transfer(fragment: string, destination: string): Promise<TransferResult> {
    const attempts: MirrorAttempt[] = [];
    let lastError = 'No mirrors configured';

    await FileUtils.ensureDir(path.dirname(destination));

    for (const { mirror, url } of this.buildCandidates(fragment)) {
      try {
        const bytesWritten = await this.attempt(mirror, url, destination);
        const attempt: MirrorAttempt = { mirror: mirror.name, url, ok: true, bytesWritten };
        attempts.push(attempt);
        this.emit('attempt', attempt);

        logger.item(`Downloaded from ${mirror.name}: ${formatBytes(bytesWritten)}`, '💾');
        return {
          status: TransferStatus.SUCCESS,
          bytesWritten,
          mirrorUsed: mirror.name,
          attempts,
        };
      } catch (error) {
        lastError = `${mirror.name}: ${describeError(error)}`;
        const attempt: MirrorAttempt = {
          mirror: mirror.name,
          url,
          ok: false,
          bytesWritten: 0,
          errorDetail: describeError(error),
        };
        attempts.push(attempt);
        this.emit('attempt', attempt);
        logger.warn(`Mirror ${lastError}`);
      }
    }

    return {
      status: TransferStatus.FAILED,
      bytesWritten: 0,
      errorDetail: lastError,
      attempts,
    };
  }

  private async attempt(mirror: MirrorEndpoint, url: string, destination: string): Promise<number> {
    const response = await httpGet(url, {
      timeoutMs: this.options.requestTimeout,
      headers: this.options.headers,
    });

    if (!response.ok) {
      response.body.resume();
      throw new ServiceError(`HTTP ${response.status}: ${response.statusText}`, {
        status: response.status,
        url,
      });
    }

    const contentType = response.headers.get('content-type') ?? '';
    const lengthHeader = response.headers.get('content-length');
    const contentLength = lengthHeader !== null && /^\d+$/.test(lengthHeader) ? Number(lengthHeader) : null;
    const tempPath = FileUtils.temporaryPathFor(destination);

    try {
      const bytesWritten = await this.streamToFile(response.body, tempPath, mirror, contentLength);
      await validateDocument(
        tempPath,
        { bytesWritten, contentType, contentLength },
        this.options.minDocumentBytes
      );
      await fs.move(tempPath, destination, { overwrite: true });
      return bytesWritten;
    } catch (error) {
      await this.discard(tempPath);
      throw error;
    }
  }

  private async streamToFile(
    body: NodeJS.ReadableStream,
    tempPath: string,
    mirror: MirrorEndpoint,
    contentLength: number | null
  ): Promise<number> {
    const timeoutMs = this.options.requestTimeout;
    let bytesReceived = 0;
    let lastProgressUpdate = 0;
    let idleTimer: NodeJS.Timeout | undefined;

    const guard = new Transform({
      transform: (chunk: Buffer, _encoding, callback) => {
        armIdleTimer();
        bytesReceived += chunk.length;

        const now = Date.now();
        if (now - lastProgressUpdate > 250) {
          lastProgressUpdate = now;
          this.emitProgress(mirror, bytesReceived, contentLength);
        }
        callback(null, chunk);
      },
      flush: callback => {
        clearTimeout(idleTimer);
        callback();
      },
    });

    const armIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        guard.destroy(new NetworkError(`Transfer stalled for ${timeoutMs}ms`));
      }, timeoutMs);
    };

    armIdleTimer();
    try {
      await pipeline(body, guard, fs.createWriteStream(tempPath));
    } finally {
      clearTimeout(idleTimer);
    }

    this.emitProgress(mirror, bytesReceived, contentLength);
    return bytesReceived;
  }

  private emitProgress(mirror: MirrorEndpoint, bytesReceived: number, contentLength: number | null) {
    const progress: TransferProgress = {
      mirror: mirror.name,
      bytesReceived,
      totalBytes: contentLength ?? 0,
    };
    this.emit('progress', progress);
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await FileUtils.deleteFile(tempPath);
    } catch (error) {
      logger.warn(`Could not remove temporary file ${tempPath}: ${describeError(error)}`);
    }
  }
}
