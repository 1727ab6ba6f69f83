import { CatalogPage, CatalogSource } from '../types';
import { ServiceError } from '../utils/errors';
import { isObject } from '../utils/guards';
import { getJson } from '../utils/http';
import { logger } from '../utils/logger';

export interface CatalogFetcherOptions {
  versionUrl: string;
  catalogUrls?: string[];
  requestTimeout: number;
  headers: Record<string, string>;
}

/**
 * Reads the remote catalog set. The version document lists one URL per
 * catalog; each URL is the first page token of that catalog.
 */
export class CatalogPageFetcher implements CatalogSource {
  constructor(private options: CatalogFetcherOptions) {}

  async listCatalogs(): Promise<string[]> {
    if (this.options.catalogUrls && this.options.catalogUrls.length > 0) {
      return [...this.options.catalogUrls];
    }

    const url = this.options.versionUrl;
    logger.debug(`Fetching catalog list: ${url}`);
    const data = await getJson(url, this.requestOptions());

    if (!isObject(data) || typeof data.urls !== 'string') {
      throw new ServiceError('Catalog version document has no "urls" field', { url });
    }

    const urls = data.urls
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);

    if (urls.length === 0) {
      throw new ServiceError('Catalog version document lists no catalogs', { url });
    }
    return urls;
  }

  async fetchPage(catalogIndex: number, pageToken: string): Promise<CatalogPage> {
    logger.debug(`Fetching catalog ${catalogIndex + 1} page: ${pageToken}`);
    const data = await getJson(pageToken, this.requestOptions());

    // A bare array is a catalog served as a single page
    if (Array.isArray(data)) {
      return { descriptors: data, nextPageToken: null };
    }

    if (isObject(data) && Array.isArray(data.items)) {
      let nextPageToken: string | null = null;
      if (typeof data.next === 'string' && data.next.length > 0) {
        nextPageToken = new URL(data.next, pageToken).toString();
      }
      return { descriptors: data.items, nextPageToken };
    }

    throw new ServiceError(`Malformed page payload in catalog ${catalogIndex}`, {
      url: pageToken,
    });
  }

  private requestOptions() {
    return { timeoutMs: this.options.requestTimeout, headers: this.options.headers };
  }
}
