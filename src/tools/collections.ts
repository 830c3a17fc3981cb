/**
 * Collection tools
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZoteroClient } from '../zotero-client.js';
import type { CollectionSummary } from '../types.js';
import { formatItemSummary, jsonContent } from './format.js';

export function registerCollectionTools(server: McpServer, zoteroClient: ZoteroClient): void {
  // list_collections
  server.registerTool(
    'list_collections',
    {
      title: 'List Collections',
      description: `List all collections (folders) in the Zotero library.
Use parentKey to list sub-collections of a specific collection.`,
      inputSchema: {
        parentKey: z.string().optional().describe('Parent collection key to list only sub-collections'),
      },
    },
    async ({ parentKey }) => {
      const collections = await zoteroClient.getCollections(parentKey);

      const result: CollectionSummary[] = collections.map((c) => ({
        key: c.key,
        name: c.data.name,
        parentCollection: c.data.parentCollection,
      }));

      return jsonContent(result);
    }
  );

  // get_collection_items
  server.registerTool(
    'get_collection_items',
    {
      title: 'Get Collection Items',
      description: `Get the items in a specific collection.
Returns items directly in the collection (not in sub-collections).`,
      inputSchema: {
        collectionKey: z.string().describe('The collection key'),
        limit: z.number().min(1).max(100).optional().describe('Number of results (default 25, max 100)'),
      },
    },
    async ({ collectionKey, limit }) => {
      const result = await zoteroClient.searchItems({ collectionKey, limit });
      const items = result.items.map(formatItemSummary);
      return jsonContent({ totalResults: result.totalResults, returned: items.length, items });
    }
  );
}
