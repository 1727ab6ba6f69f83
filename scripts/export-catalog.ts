import dotenv from 'dotenv';
import path from 'path';
import { CatalogPageFetcher } from '../src/catalog/CatalogPageFetcher';
import { CatalogWalker } from '../src/catalog/CatalogWalker';
import { exportCatalogSnapshot } from '../src/catalog/catalogExporter';
import { ConfigManager } from '../src/config/configManager';
import { logger } from '../src/utils/logger';

dotenv.config();

async function main() {
  const args = process.argv.slice(2);
  let targetPath: string | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--output' || arg === '-o') {
      targetPath = args[++i];
    } else if (arg === '--config' || arg === '-c') {
      configPath = args[++i];
    } else {
      logger.error(`Unknown option: ${arg}`);
      logger.info('Usage: export-catalog [--output FILE] [--config PATH]');
      process.exit(1);
    }
  }

  const configManager = new ConfigManager(configPath);
  await configManager.loadConfig();
  configManager.applyEnvironment(process.env);
  const config = configManager.getConfig();
  logger.setLogLevel(config.logLevel);

  logger.header('Textbook Catalog Snapshot');

  const fetcher = new CatalogPageFetcher({
    versionUrl: config.catalog.versionUrl,
    catalogUrls: config.catalog.catalogUrls,
    requestTimeout: config.catalog.requestTimeout,
    headers: config.headers,
  });

  try {
    const rows = await exportCatalogSnapshot(
      new CatalogWalker(fetcher),
      path.resolve(targetPath ?? config.exportPath)
    );
    logger.stats({ Records: rows });
    process.exit(0);
  } catch (error) {
    logger.error('Catalog export failed:', error);
    process.exit(1);
  }
}

// Handle unhandled rejections
process.on('unhandledRejection', error => {
  logger.error('Unhandled rejection:', error);
  process.exit(1);
});

// Run the script
main().catch(error => {
  logger.error('Unexpected failure:', error);
  process.exit(1);
});
