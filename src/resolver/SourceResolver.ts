import { ResolvedSource, SourceLookup } from '../types';
import { ResolutionError, ServiceError } from '../utils/errors';
import { isObject, nonEmptyString } from '../utils/guards';
import { getJson } from '../utils/http';
import { logger } from '../utils/logger';

export interface SourceResolverOptions {
  detailsBaseUrl: string;
  requestTimeout: number;
  headers: Record<string, string>;
}

const SOURCE_FILE_FLAG = 'source';

/**
 * Storage entries are absolute URLs on a private origin. Only the path is
 * kept; the transfer engine pairs it with the public mirrors.
 */
export function storagePathFragment(storage: string): string | null {
  const trimmed = storage.trim();
  if (trimmed.startsWith('/')) {
    return trimmed;
  }
  try {
    const { pathname } = new URL(trimmed);
    return pathname.length > 1 ? pathname : null;
  } catch {
    return null;
  }
}

/**
 * Turns a record id into the storage path of its current PDF by reading the
 * per-record details document. File names embed a content hash, so nothing
 * here can be derived from the id alone.
 */
export class SourceResolver implements SourceLookup {
  constructor(private options: SourceResolverOptions) {}

  detailsUrl(recordId: string): string {
    const base = this.options.detailsBaseUrl.replace(/\/+$/, '');
    return `${base}/${encodeURIComponent(recordId)}.json`;
  }

  async resolve(recordId: string): Promise<ResolvedSource> {
    const url = this.detailsUrl(recordId);
    let details: unknown;

    try {
      details = await getJson(url, {
        timeoutMs: this.options.requestTimeout,
        headers: this.options.headers,
      });
    } catch (error) {
      if (error instanceof ServiceError && error.status === 404) {
        throw new ResolutionError(recordId, `No details for ${recordId} (withdrawn or restricted)`, {
          cause: error,
        });
      }
      throw error;
    }

    if (!isObject(details) || !Array.isArray(details.ti_items)) {
      throw new ResolutionError(recordId, `Details for ${recordId} carry no item list`);
    }

    for (const item of details.ti_items) {
      if (!isObject(item) || item.ti_file_flag !== SOURCE_FILE_FLAG) continue;
      if (!Array.isArray(item.ti_storages)) continue;

      for (const storage of item.ti_storages) {
        if (typeof storage !== 'string') continue;
        const fragment = storagePathFragment(storage);
        if (fragment) {
          logger.debug(`Resolved ${recordId} -> ${fragment}`);
          return { recordId, fragment, title: nonEmptyString(details.title) };
        }
      }
    }

    throw new ResolutionError(recordId, `No PDF source found for ${recordId}`);
  }
}
