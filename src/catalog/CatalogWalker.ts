import { CatalogRecord, CatalogSource, WalkCursor } from '../types';
import { MalformedRecordError, SelectionError } from '../utils/errors';
import { logger } from '../utils/logger';
import { normalizeRecord } from './recordNormalizer';

export const CATALOG_START: WalkCursor = { catalogIndex: 0, position: 0 };

export interface WalkStep {
  record: CatalogRecord;
  /** 0-based descriptor slot counted from the start cursor, malformed slots included. */
  slotIndex: number;
}

/**
 * Lazily walks every catalog in index order, following each catalog's page
 * chain. Global sequence numbers count descriptor slots, so a malformed
 * descriptor keeps its number even though it is never yielded.
 */
export class CatalogWalker {
  constructor(private source: CatalogSource) {}

  async *walk(start: WalkCursor = CATALOG_START): AsyncGenerator<CatalogRecord, void, undefined> {
    for await (const { record } of this.walkSlots(start)) {
      yield record;
    }
  }

  async *walkSlots(start: WalkCursor = CATALOG_START): AsyncGenerator<WalkStep, void, undefined> {
    const catalogs = await this.source.listCatalogs();

    if (start.catalogIndex >= catalogs.length) {
      throw new SelectionError(
        `Catalog ${start.catalogIndex} does not exist (${catalogs.length} catalogs available, 0-based)`
      );
    }

    let sequence = 0;
    let skipped = 0;

    for (let catalogIndex = 0; catalogIndex < catalogs.length; catalogIndex++) {
      let pageToken: string | null = catalogs[catalogIndex];
      let position = 0;
      let pageNumber = 0;

      logger.debug(`Walking catalog ${catalogIndex + 1}/${catalogs.length}`);

      while (pageToken !== null) {
        const page = await this.source.fetchPage(catalogIndex, pageToken);
        pageNumber++;
        pageToken = page.nextPageToken;

        // Earlier catalogs only contribute to the sequence count
        if (catalogIndex < start.catalogIndex) {
          sequence += page.descriptors.length;
          skipped += page.descriptors.length;
          position += page.descriptors.length;
          continue;
        }

        logger.debug(
          `Catalog ${catalogIndex + 1} page ${pageNumber}: ${page.descriptors.length} descriptors`
        );

        for (const raw of page.descriptors) {
          sequence++;
          const current = position++;

          if (catalogIndex === start.catalogIndex && current < start.position) {
            skipped++;
            continue;
          }

          const record = this.normalize(raw, catalogIndex, current, sequence);
          if (record) {
            yield { record, slotIndex: sequence - skipped - 1 };
          }
        }
      }
    }
  }

  private normalize(
    raw: unknown,
    catalogIndex: number,
    position: number,
    globalSequence: number
  ): CatalogRecord | null {
    try {
      return normalizeRecord(raw, { catalogIndex, position, globalSequence });
    } catch (error) {
      if (error instanceof MalformedRecordError) {
        logger.warn(`Skipping record #${globalSequence}: ${error.message}`);
        return null;
      }
      throw error;
    }
  }
}
