import { CatalogPageFetcher } from './catalog/CatalogPageFetcher';
import { CatalogWalker, CATALOG_START } from './catalog/CatalogWalker';
import { exportCatalogSnapshot } from './catalog/catalogExporter';
import { normalizeRecord } from './catalog/recordNormalizer';
import { ConfigManager } from './config/configManager';
import { defaultConfig } from './config/default';
import { MirrorTransferEngine, validateDocument } from './download/MirrorTransferEngine';
import { TextbookDownloader } from './pipeline/TextbookDownloader';
import { emptySummary, foldOutcome } from './pipeline/runSummary';
import { SourceResolver } from './resolver/SourceResolver';
import {
  planSelection,
  resolveSelection,
  selectRecords,
} from './selection/selectionController';
import { logger } from './utils/logger';

// Export the main classes for programmatic usage
export {
  CatalogPageFetcher,
  CatalogWalker,
  CATALOG_START,
  ConfigManager,
  defaultConfig,
  emptySummary,
  exportCatalogSnapshot,
  foldOutcome,
  MirrorTransferEngine,
  normalizeRecord,
  planSelection,
  resolveSelection,
  selectRecords,
  SourceResolver,
  TextbookDownloader,
  validateDocument,
  logger,
};

export * from './utils/errors';
export * from './types';
