/**
 * Zotero translation-server client
 * Resolves DOI / PMID / arXiv identifiers to Zotero item data
 */

import type { ZoteroItemData } from './types.js';
import { TranslationError } from './errors.js';
import { getLogger } from './logger.js';

const DEFAULT_TRANSLATION_SERVER_URL = 'http://localhost:1969';

export class TranslationClient {
  private baseUrl: string;
  private log = getLogger('translation');

  constructor(baseUrl?: string) {
    this.baseUrl = (baseUrl || DEFAULT_TRANSLATION_SERVER_URL).replace(/\/+$/, '');
  }

  /**
   * Look up item metadata for an identifier
   */
  async search(identifier: string): Promise<ZoteroItemData[]> {
    const url = `${this.baseUrl}/search`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/plain',
        },
        body: identifier,
      });
    } catch (error) {
      this.log.error({ err: error, url }, 'Translation server unreachable');
      throw new TranslationError(
        `Cannot connect to Translation Server at ${this.baseUrl}. ` +
          `Please ensure it is running: docker run -d -p 1969:1969 zotero/translation-server`
      );
    }

    if (response.status === 501) {
      throw new TranslationError(`No translator found for identifier: ${identifier}`);
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new TranslationError(`Translation server error (${response.status}): ${errorText}`);
    }

    const data: unknown = await response.json();
    if (!Array.isArray(data)) {
      throw new TranslationError(`Unexpected translation server response for: ${identifier}`);
    }
    return data.filter(isItemData);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const response = await fetch(this.baseUrl, {
        method: 'GET',
      });
      return response.ok || response.status === 404;
    } catch (error) {
      this.log.debug({ err: error }, 'Translation server not available');
      return false;
    }
  }
}

function isItemData(value: unknown): value is ZoteroItemData {
  return typeof value === 'object' && value !== null && 'itemType' in value && typeof value.itemType === 'string';
}
