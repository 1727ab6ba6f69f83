import fs from 'fs-extra';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { CatalogRecord } from '../types';
import { FileUtils } from '../utils/fileUtils';
import { logger } from '../utils/logger';
import { CatalogWalker } from './CatalogWalker';

export const SNAPSHOT_COLUMNS = [
  'global_sequence',
  'catalog_index',
  'position',
  'id',
  'title',
  'publisher',
] as const;

// Spreadsheet tools need the BOM to read CJK titles as UTF-8
const UTF8_BOM = '\uFEFF';

export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function snapshotRow(record: CatalogRecord): string {
  return [
    record.globalSequence,
    record.catalogIndex,
    record.position,
    record.id,
    record.title,
    record.publisher,
  ]
    .map(csvField)
    .join(',');
}

async function* snapshotLines(
  walker: CatalogWalker,
  onRow: () => void
): AsyncGenerator<string, void, undefined> {
  yield `${UTF8_BOM}${SNAPSHOT_COLUMNS.join(',')}\r\n`;

  let currentCatalog = -1;
  for await (const record of walker.walk()) {
    if (record.catalogIndex !== currentCatalog) {
      currentCatalog = record.catalogIndex;
      logger.info(`Processing catalog ${currentCatalog + 1}`);
    }
    onRow();
    yield `${snapshotRow(record)}\r\n`;
  }
}

/**
 * Writes every catalog record as one CSV row, in global sequence order, for
 * offline lookup of sequence numbers and resume coordinates. The file is
 * written beside the target and renamed once complete.
 */
export async function exportCatalogSnapshot(
  walker: CatalogWalker,
  targetPath: string
): Promise<number> {
  await FileUtils.ensureDir(path.dirname(targetPath));
  const tempPath = FileUtils.temporaryPathFor(targetPath);
  let rows = 0;

  try {
    await pipeline(
      Readable.from(snapshotLines(walker, () => rows++)),
      fs.createWriteStream(tempPath, { encoding: 'utf8' })
    );
    await fs.move(tempPath, targetPath, { overwrite: true });
  } catch (error) {
    await FileUtils.deleteFile(tempPath);
    throw error;
  }

  logger.success(`Catalog snapshot with ${rows} records saved to ${targetPath}`);
  return rows;
}
