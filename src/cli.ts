#!/usr/bin/env node
import dotenv from 'dotenv';
import ProgressBar from 'progress';
import path from 'path';
import { parseCliArgs, USAGE, CliOptions } from './cliArgs';
import { ConfigManager } from './config/configManager';
import { TextbookDownloader } from './pipeline/TextbookDownloader';
import { resolveSelection } from './selection/selectionController';
import { RunSummary, TransferProgress } from './types';
import { describeError, SelectionError, UsageError } from './utils/errors';
import { formatBytes } from './download/MirrorTransferEngine';
import { logger } from './utils/logger';

dotenv.config();

function attachProgressBar(downloader: TextbookDownloader): void {
  let bar: ProgressBar | null = null;
  let barMirror = '';

  downloader.on('recordStarted', () => {
    bar = null;
  });

  downloader.on('transferProgress', (progress: TransferProgress) => {
    // Progress bars only make sense when the size is announced
    if (progress.totalBytes <= 0 || !process.stderr.isTTY) return;

    if (!bar || barMirror !== progress.mirror) {
      barMirror = progress.mirror;
      bar = new ProgressBar(`    ${progress.mirror} [:bar] :percent :etas`, {
        total: progress.totalBytes,
        width: 30,
        incomplete: ' ',
      });
    }
    bar.update(Math.min(progress.bytesReceived / progress.totalBytes, 1));
  });
}

function reportSummary(summary: RunSummary): void {
  logger.section('Summary');
  logger.stats({
    Selected: summary.selected,
    Downloaded: summary.succeeded,
    Skipped: summary.skipped,
    Failed: summary.failed.length,
    'Bytes written': formatBytes(summary.bytesWritten),
  });

  if (summary.failed.length > 0) {
    logger.warn(`Failed ${summary.failed.length} books:`);
    for (const failure of summary.failed) {
      logger.item(`Sequence ${failure.globalSequence}: ${failure.title} - ${failure.reason}`);
    }
  }
}

async function main(options: CliOptions): Promise<number> {
  const configManager = new ConfigManager(options.configPath);
  await configManager.loadConfig();
  configManager.applyEnvironment(process.env);
  if (options.outputDir) configManager.setOutputDir(path.resolve(options.outputDir));
  if (options.skipExisting) configManager.updateConfig({ transfer: { skipExisting: true } });

  const config = configManager.getConfig();
  logger.setLogLevel(options.verbose ? 'debug' : config.logLevel);

  const validation = configManager.validateConfig();
  if (!validation.valid) {
    validation.errors.forEach(error => logger.error(error));
    return 1;
  }

  logger.header('Textbook Catalog Downloader');
  const mode = resolveSelection(options.selection);
  const downloader = new TextbookDownloader(config);
  attachProgressBar(downloader);

  const summary = await downloader.run(mode);
  reportSummary(summary);
  logger.info(`Files are in ${config.outputDir}`);

  return summary.failed.length > 0 ? 2 : 0;
}

async function run(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    logger.error(describeError(error));
    console.log(USAGE);
    process.exit(1);
  }

  if (options.help) {
    console.log(USAGE);
    return;
  }

  try {
    process.exitCode = await main(options);
  } catch (error) {
    if (error instanceof SelectionError || error instanceof UsageError) {
      logger.error(error.message);
    } else {
      logger.error('Download failed:', error);
    }
    process.exitCode = 1;
  }
}

// Handle unhandled rejections
process.on('unhandledRejection', error => {
  logger.error('Unhandled rejection:', error);
  process.exit(1);
});

run().catch(error => {
  logger.error('Unexpected failure:', error);
  process.exit(1);
});
