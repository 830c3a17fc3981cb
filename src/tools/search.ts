/**
 * Search and lookup tools
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZoteroClient } from '../zotero-client.js';
import { formatItemSummary, jsonContent } from './format.js';

export function registerSearchTools(server: McpServer, zoteroClient: ZoteroClient): void {
  // search_items - keyword search
  server.registerTool(
    'search_items',
    {
      title: 'Search Items',
      description: `Search items in the Zotero library.
- Use 'query' for keyword search (title, creator, year)
- Use 'qmode=everything' to also search all fields and full-text content
- Returns: list of items with key, title, itemType, creators, date`,
      inputSchema: {
        query: z.string().describe('Search keywords (e.g., "FHIR terminology")'),
        itemType: z.string().optional().describe('Filter by item type: journalArticle, book, etc.'),
        tag: z.string().optional().describe('Filter by tag name'),
        limit: z.number().min(1).max(100).optional().describe('Number of results (default 50, max 100)'),
        start: z.number().min(0).optional().describe('Pagination offset'),
        qmode: z.enum(['titleCreatorYear', 'everything']).optional().describe('Search mode (default titleCreatorYear)'),
      },
    },
    async ({ query, itemType, tag, limit, start, qmode }) => {
      const result = await zoteroClient.searchItems({
        query, itemType, tag, limit: limit || 50, start, qmode,
      });

      const items = result.items.map(formatItemSummary);
      return jsonContent({ totalResults: result.totalResults, returned: items.length, items });
    }
  );

  // get_item - full metadata
  server.registerTool(
    'get_item',
    {
      title: 'Get Item Metadata',
      description: `Get complete metadata of a single item by its key.
Returns all fields: title, creators, abstract, DOI, URL, tags, collections, etc.`,
      inputSchema: {
        itemKey: z.string().describe('The unique key of the item (e.g., "ABC12345")'),
      },
    },
    async ({ itemKey }) => {
      const item = await zoteroClient.getItem(itemKey);
      return jsonContent(item.data);
    }
  );
}
