import { Readable } from 'stream';
import { Response } from 'node-fetch';
import { CatalogPage, CatalogSource } from '../types';
import { ServiceError } from '../utils/errors';

/** A buffer that passes the PDF signature check, padded to `size` bytes. */
export function pdfBuffer(size: number): Buffer {
  const buffer = Buffer.alloc(size, 0x20);
  buffer.write('%PDF-1.7\n', 0, 'ascii');
  return buffer;
}

export function binaryResponse(
  body: Buffer,
  headers: Record<string, string> = { 'content-type': 'application/pdf' },
  status = 200
): Response {
  return new Response(Readable.from([body], { objectMode: false }), { status, headers });
}

export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function descriptor(id: string, title: string, publisher = '人教版'): Record<string, unknown> {
  return {
    id,
    title,
    tag_list: [{ tag_name: '小学' }, { tag_name: publisher }, { tag_name: '语文' }],
  };
}

/**
 * Catalog contents for an in-memory source: one list of pages per catalog.
 * Record ids are `c<catalog>-<position>`.
 */
export function buildCatalogs(sizes: number[], pageSize = 50): unknown[][][] {
  return sizes.map((size, catalogIndex) => {
    const pages: unknown[][] = [];
    for (let start = 0; start < size; start += pageSize) {
      const page: unknown[] = [];
      for (let position = start; position < Math.min(size, start + pageSize); position++) {
        page.push(descriptor(`c${catalogIndex}-${position}`, `Book ${catalogIndex}-${position}`));
      }
      pages.push(page);
    }
    return pages.length > 0 ? pages : [[]];
  });
}

/** Serves catalogs from memory and records every page request. */
export class MemoryCatalogSource implements CatalogSource {
  readonly pageRequests: Array<{ catalogIndex: number; page: number }> = [];
  listCalls = 0;
  private failures = new Set<number>();

  constructor(private catalogs: unknown[][][]) {}

  /** Makes every page request for the catalog fail with an HTTP 500. */
  failCatalog(catalogIndex: number): this {
    this.failures.add(catalogIndex);
    return this;
  }

  async listCatalogs(): Promise<string[]> {
    this.listCalls++;
    return this.catalogs.map((_pages, catalogIndex) => this.token(catalogIndex, 0));
  }

  async fetchPage(catalogIndex: number, pageToken: string): Promise<CatalogPage> {
    const page = Number(pageToken.slice(pageToken.lastIndexOf('/') + 1));
    this.pageRequests.push({ catalogIndex, page });

    if (this.failures.has(catalogIndex)) {
      throw new ServiceError('HTTP 500: Internal Server Error', { status: 500, url: pageToken });
    }

    const pages = this.catalogs[catalogIndex];
    return {
      descriptors: pages[page],
      nextPageToken: page + 1 < pages.length ? this.token(catalogIndex, page + 1) : null,
    };
  }

  private token(catalogIndex: number, page: number): string {
    return `memory://catalog/${catalogIndex}/${page}`;
  }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
