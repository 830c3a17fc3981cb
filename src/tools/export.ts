/**
 * Export tools
 */

import { z } from 'zod';
import { writeFile, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZoteroClient } from '../zotero-client.js';
import { errorMessage } from '../errors.js';
import { jsonContent } from './format.js';

const FORMAT_EXTENSIONS = {
  bibtex: '.bib',
  ris: '.ris',
  csljson: '.json',
} as const;

export function formatFileSize(bytes: number): string {
  if (bytes > 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
  }
  if (bytes > 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${bytes} B`;
}

export function registerExportTools(server: McpServer, zoteroClient: ZoteroClient): void {
  // export_bibtex - export citation data to a file
  server.registerTool(
    'export_bibtex',
    {
      title: 'Export BibTeX',
      description: `Export items as BibTeX (or RIS / CSL JSON) through the Zotero API.

**Selection (use ONE):**
- itemKeys: specific items
- collectionKey: every item in a collection
- tag: every item with a tag

**Output:** the export is saved to a file to keep large exports out of the conversation. Returns file path and summary.`,
      inputSchema: {
        itemKeys: z.array(z.string()).optional().describe('Specific item keys to export'),
        collectionKey: z.string().optional().describe('Export all items in this collection'),
        tag: z.string().optional().describe('Export all items with this tag'),
        format: z.enum(['bibtex', 'ris', 'csljson']).optional().describe('Export format (default bibtex)'),
        outputPath: z.string().optional().describe('File path to save the export. Defaults to a file in the system temp directory'),
      },
    },
    async ({ itemKeys, collectionKey, tag, format = 'bibtex', outputPath }) => {
      try {
        let keys: string[];
        if (itemKeys && itemKeys.length > 0) {
          keys = itemKeys;
        } else if (collectionKey || tag) {
          const items = await zoteroClient.listAllItems({ collectionKey, tag });
          keys = items.map((item) => item.key);
        } else {
          return jsonContent({ success: false, error: 'Please provide one of: itemKeys, collectionKey, tag' });
        }

        if (keys.length === 0) {
          return jsonContent({ success: false, error: 'No items found matching the criteria' });
        }

        const result = await zoteroClient.exportItems(keys, format);

        const filePath = outputPath || join(tmpdir(), `zotero-export-${Date.now()}${FORMAT_EXTENSIONS[format]}`);
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(filePath, result, 'utf-8');

        return jsonContent({
          success: true,
          filePath,
          itemCount: keys.length,
          format,
          fileSize: formatFileSize(Buffer.byteLength(result, 'utf-8')),
        });
      } catch (error) {
        return jsonContent({ success: false, error: errorMessage(error) });
      }
    }
  );
}
