/**
 * Zotero Web API client
 */

import type {
  ZoteroConfig,
  ZoteroItem,
  ZoteroCollection,
  ZoteroResponseHeaders,
  ZoteroWriteResponse,
  ZoteroItemData,
  SearchParams,
  ExportFormat,
  CreateItemsResult,
} from './types.js';
import { RateLimitError, ZoteroApiError } from './errors.js';
import { getLogger } from './logger.js';

const ZOTERO_API_BASE = 'https://api.zotero.org';

// Default delay between requests (ms)
const DEFAULT_REQUEST_INTERVAL = 1000;

// API limits
const PAGE_SIZE = 100;
const WRITE_BATCH_SIZE = 50;
const ITEM_KEY_LIMIT = 50;

function parseIntHeader(headers: Headers, name: string): number | undefined {
  const value = headers.get(name);
  if (value === null) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export class ZoteroClient {
  private config: ZoteroConfig;
  private libraryVersion: number | null = null;
  private lastRequestTime: number = 0;
  private backoffUntil: number = 0;
  private requestInterval: number;
  private log = getLogger('zotero');

  constructor(config: ZoteroConfig) {
    if (!config.groupId && !config.userId) {
      throw new Error('Either userId or groupId is required');
    }
    this.config = config;
    this.requestInterval = config.requestInterval ?? DEFAULT_REQUEST_INTERVAL;
  }

  /**
   * Wait until the next request may be sent
   */
  private async throttle(): Promise<void> {
    const now = Date.now();

    // Server asked us to back off
    if (now < this.backoffUntil) {
      await this.sleep(this.backoffUntil - now);
    }

    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.requestInterval) {
      await this.sleep(this.requestInterval - elapsed);
    }

    this.lastRequestTime = Date.now();
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  /**
   * Base path of the configured library
   */
  getLibraryPath(): string {
    if (this.config.groupId) {
      return `/groups/${this.config.groupId}`;
    }
    return `/users/${this.config.userId}`;
  }

  private parseHeaders(headers: Headers): ZoteroResponseHeaders {
    return {
      totalResults: parseIntHeader(headers, 'Total-Results'),
      lastModifiedVersion: parseIntHeader(headers, 'Last-Modified-Version'),
      backoff: parseIntHeader(headers, 'Backoff'),
      retryAfter: parseIntHeader(headers, 'Retry-After'),
    };
  }

  /**
   * Send an API request
   */
  private async request<T>(
    path: string,
    options: {
      method?: string;
      params?: Record<string, string | number | undefined>;
      body?: unknown;
      requireVersion?: boolean;
      parse?: 'json' | 'text';
    } = {}
  ): Promise<{ data: T; headers: ZoteroResponseHeaders }> {
    const { method = 'GET', params, body, requireVersion = false, parse = 'json' } = options;

    const url = new URL(`${ZOTERO_API_BASE}${path}`);
    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    const headers: Record<string, string> = {
      'Zotero-API-Key': this.config.apiKey,
      'Zotero-API-Version': '3',
    };

    if (body) {
      headers['Content-Type'] = 'application/json';
    }

    if (requireVersion && this.libraryVersion !== null) {
      headers['If-Unmodified-Since-Version'] = String(this.libraryVersion);
    }

    await this.throttle();

    this.log.debug({ method, path }, 'Zotero request');
    const response = await fetch(url.toString(), {
      method,
      headers,
      body: body ? JSON.stringify(body) : undefined,
    });

    const responseHeaders = this.parseHeaders(response.headers);

    if (responseHeaders.lastModifiedVersion !== undefined) {
      this.libraryVersion = responseHeaders.lastModifiedVersion;
    }

    if (responseHeaders.backoff) {
      this.log.warn({ seconds: responseHeaders.backoff }, 'Server requested backoff');
      this.backoffUntil = Date.now() + responseHeaders.backoff * 1000;
    }

    if (response.status === 429) {
      const waitTime = responseHeaders.retryAfter || responseHeaders.backoff || 5;
      this.backoffUntil = Date.now() + waitTime * 1000;
      throw new RateLimitError(waitTime);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new ZoteroApiError(response.status, errorText);
    }

    // Typed at the call site: responses follow the Zotero API v3 schema
    let data: T;
    if (parse === 'json') {
      data = (await response.json()) as T;
    } else {
      data = (await response.text()) as T;
    }

    return { data, headers: responseHeaders };
  }

  /**
   * Search top-level items
   */
  async searchItems(params: SearchParams = {}): Promise<{
    items: ZoteroItem[];
    totalResults: number;
  }> {
    const path = params.collectionKey
      ? `${this.getLibraryPath()}/collections/${params.collectionKey}/items/top`
      : `${this.getLibraryPath()}/items/top`;

    const { data, headers } = await this.request<ZoteroItem[]>(path, {
      params: {
        q: params.query,
        qmode: params.qmode,
        itemType: params.itemType,
        tag: params.tag,
        limit: params.limit || 25,
        start: params.start || 0,
        sort: params.sort || 'dateModified',
        direction: params.direction || 'desc',
      },
    });

    return {
      items: data,
      totalResults: headers.totalResults ?? data.length,
    };
  }

  /**
   * Every top-level item of the library, page by page
   */
  async listAllItems(params: Omit<SearchParams, 'limit' | 'start'> = {}): Promise<ZoteroItem[]> {
    const items: ZoteroItem[] = [];
    let start = 0;

    for (;;) {
      const page = await this.searchItems({ ...params, limit: PAGE_SIZE, start });
      items.push(...page.items);

      if (page.items.length < PAGE_SIZE || items.length >= page.totalResults) {
        return items;
      }
      start += PAGE_SIZE;
    }
  }

  async getItem(itemKey: string): Promise<ZoteroItem> {
    const path = `${this.getLibraryPath()}/items/${itemKey}`;
    const { data } = await this.request<ZoteroItem>(path);
    return data;
  }

  /**
   * All collections (or sub-collections of parentKey), page by page
   */
  async getCollections(parentKey?: string): Promise<ZoteroCollection[]> {
    const path = parentKey
      ? `${this.getLibraryPath()}/collections/${parentKey}/collections`
      : `${this.getLibraryPath()}/collections`;

    const collections: ZoteroCollection[] = [];
    let start = 0;

    for (;;) {
      const { data, headers } = await this.request<ZoteroCollection[]>(path, {
        params: { limit: PAGE_SIZE, start },
      });
      collections.push(...data);

      const total = headers.totalResults ?? collections.length;
      if (data.length < PAGE_SIZE || collections.length >= total) {
        return collections;
      }
      start += PAGE_SIZE;
    }
  }

  async createCollection(name: string, parentCollection?: string): Promise<string> {
    await this.getLibraryVersion();

    const path = `${this.getLibraryPath()}/collections`;
    const collectionData: { name: string; parentCollection?: string } = { name };
    if (parentCollection) {
      collectionData.parentCollection = parentCollection;
    }

    const { data } = await this.request<ZoteroWriteResponse>(path, {
      method: 'POST',
      body: [collectionData],
      requireVersion: true,
    });

    const key = data.success['0'];
    if (key) {
      return key;
    }

    const failure = data.failed['0'];
    if (failure) {
      throw new Error(`Failed to create collection: ${failure.message}`);
    }

    throw new Error('Unknown error creating collection');
  }

  /**
   * Create items in batches of 50
   */
  async createItems(items: ZoteroItemData[]): Promise<CreateItemsResult> {
    const result: CreateItemsResult = { created: new Map(), failed: new Map() };
    if (items.length === 0) {
      return result;
    }

    await this.getLibraryVersion();
    const path = `${this.getLibraryPath()}/items`;

    for (let offset = 0; offset < items.length; offset += WRITE_BATCH_SIZE) {
      const batch = items.slice(offset, offset + WRITE_BATCH_SIZE);
      const { data } = await this.request<ZoteroWriteResponse>(path, {
        method: 'POST',
        body: batch,
        requireVersion: true,
      });

      for (const [index, key] of Object.entries(data.success)) {
        result.created.set(offset + Number(index), key);
      }
      for (const [index, failure] of Object.entries(data.failed)) {
        result.failed.set(offset + Number(index), failure.message);
      }
    }

    return result;
  }

  async createItem(itemData: ZoteroItemData): Promise<string> {
    const { created, failed } = await this.createItems([itemData]);

    const key = created.get(0);
    if (key) {
      return key;
    }

    const message = failed.get(0);
    if (message) {
      throw new Error(`Failed to create item: ${message}`);
    }

    throw new Error('Unknown error creating item');
  }

  private async getLibraryVersion(): Promise<number> {
    if (this.libraryVersion !== null) {
      return this.libraryVersion;
    }

    const path = `${this.getLibraryPath()}/items`;
    const { headers } = await this.request<ZoteroItem[]>(path, {
      params: { limit: 1 },
    });

    this.libraryVersion = headers.lastModifiedVersion || 0;
    return this.libraryVersion;
  }

  /**
   * Export items in a citation data format (itemKey takes at most 50 keys)
   */
  async exportItems(itemKeys: string[], format: ExportFormat): Promise<string> {
    const path = `${this.getLibraryPath()}/items`;
    const chunks: string[] = [];

    for (let offset = 0; offset < itemKeys.length; offset += ITEM_KEY_LIMIT) {
      const keys = itemKeys.slice(offset, offset + ITEM_KEY_LIMIT);
      const { data } = await this.request<string>(path, {
        params: { itemKey: keys.join(','), format, limit: keys.length },
        parse: 'text',
      });
      chunks.push(data.trim());
    }

    return chunks.join('\n\n');
  }
}
