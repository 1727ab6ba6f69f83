import path from 'path';
import { EventEmitter } from 'events';
import { CatalogPageFetcher } from '../catalog/CatalogPageFetcher';
import { CatalogWalker } from '../catalog/CatalogWalker';
import { MirrorTransferEngine, validateDocument } from '../download/MirrorTransferEngine';
import { SourceResolver } from '../resolver/SourceResolver';
import { planSelection, selectRecords } from '../selection/selectionController';
import {
  CatalogRecord,
  CatalogSource,
  DownloaderConfig,
  FileTransfer,
  RunSummary,
  SelectionMode,
  SourceLookup,
  TransferOutcome,
  TransferProgress,
  TransferStatus,
} from '../types';
import { describeError, DownloaderError, SelectionError, ValidationError } from '../utils/errors';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';
import { emptySummary, foldOutcome, resumeHint } from './runSummary';

export interface DownloaderDependencies {
  source?: CatalogSource;
  resolver?: SourceLookup;
  transfer?: FileTransfer;
}

/**
 * Runs one selection end to end: plan, walk, resolve, transfer. Records are
 * handled strictly one after another; a failure on one record is reported
 * and the run moves on, while a failure of the catalog walk ends the run.
 */
export class TextbookDownloader extends EventEmitter {
  private walker: CatalogWalker;
  private resolver: SourceLookup;
  private transferEngine: FileTransfer;

  constructor(
    private config: DownloaderConfig,
    dependencies: DownloaderDependencies = {}
  ) {
    super();

    const source =
      dependencies.source ??
      new CatalogPageFetcher({
        versionUrl: config.catalog.versionUrl,
        catalogUrls: config.catalog.catalogUrls,
        requestTimeout: config.catalog.requestTimeout,
        headers: config.headers,
      });
    this.walker = new CatalogWalker(source);

    this.resolver =
      dependencies.resolver ??
      new SourceResolver({
        detailsBaseUrl: config.resolver.detailsBaseUrl,
        requestTimeout: config.resolver.requestTimeout,
        headers: config.headers,
      });

    if (dependencies.transfer) {
      this.transferEngine = dependencies.transfer;
    } else {
      const engine = new MirrorTransferEngine({
        mirrors: config.transfer.mirrors,
        requestTimeout: config.transfer.requestTimeout,
        minDocumentBytes: config.transfer.minDocumentBytes,
        headers: config.headers,
      });
      engine.on('progress', (progress: TransferProgress) => this.emit('transferProgress', progress));
      this.transferEngine = engine;
    }
  }

  async run(mode: SelectionMode): Promise<RunSummary> {
    // Validation happens here, before any request is made
    const plan = planSelection(mode, { maxSequence: this.config.catalog.expectedTotal });
    logger.section(`Downloading ${plan.describe()}`);

    let summary = emptySummary();
    // True while a selected record is being processed
    let inRecord = false;

    try {
      for await (const record of selectRecords(this.walker, plan)) {
        inRecord = true;
        if (summary.selected > 0 && this.config.transfer.delayBetweenRecords > 0) {
          await new Promise(resolve => setTimeout(resolve, this.config.transfer.delayBetweenRecords));
        }

        this.emit('recordStarted', record);
        const outcome = await this.processRecord(record);
        summary = foldOutcome(summary, outcome);
        this.emit('recordFinished', outcome);
        inRecord = false;
      }
    } catch (error) {
      if (!inRecord && !(error instanceof SelectionError)) {
        const hint = resumeHint(summary);
        logger.error(`Catalog traversal failed: ${describeError(error)}`);
        if (hint) {
          logger.info(`Resume after the last processed record with: ${hint}`);
        }
      }
      throw error;
    }

    if (mode.kind === 'range') {
      const requested = mode.to - mode.from + 1;
      if (summary.selected < requested) {
        logger.warn(`Only ${summary.selected} of ${requested} requested records exist in the catalog`);
      }
    }

    return summary;
  }

  async processRecord(record: CatalogRecord): Promise<TransferOutcome> {
    const destination = path.join(
      this.config.outputDir,
      FileUtils.documentFileName(record.publisher, record.title)
    );
    logger.item(
      `#${record.globalSequence} ${record.publisher}${record.title} ` +
        `(catalog ${record.catalogIndex + 1}, position ${record.position + 1})`,
      '📖'
    );

    if (this.config.transfer.skipExisting && (await this.hasValidDocument(destination))) {
      logger.item(`Already downloaded: ${destination}`, '⏭');
      return {
        record,
        destination,
        status: TransferStatus.SKIPPED,
        bytesWritten: 0,
        attempts: [],
      };
    }

    let fragment: string;
    try {
      ({ fragment } = await this.resolver.resolve(record.id));
    } catch (error) {
      if (!(error instanceof DownloaderError)) throw error;
      logger.error(`Could not resolve ${record.id}: ${error.message}`);
      return {
        record,
        destination,
        status: TransferStatus.FAILED,
        bytesWritten: 0,
        errorDetail: error.message,
        attempts: [],
      };
    }

    const result = await this.transferEngine.transfer(fragment, destination);
    if (result.status === TransferStatus.SUCCESS) {
      logger.success(`Downloaded #${record.globalSequence}: ${path.basename(destination)}`);
    } else {
      logger.error(`All mirrors failed for #${record.globalSequence}: ${result.errorDetail}`);
    }
    return { ...result, record, destination };
  }

  private async hasValidDocument(destination: string): Promise<boolean> {
    if (!(await FileUtils.fileExists(destination))) {
      return false;
    }

    const size = await FileUtils.getFileSize(destination);
    try {
      await validateDocument(
        destination,
        { bytesWritten: size, contentType: '', contentLength: null },
        this.config.transfer.minDocumentBytes
      );
      return true;
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.debug(`Existing file will be replaced: ${error.message}`);
        return false;
      }
      throw error;
    }
  }
}
