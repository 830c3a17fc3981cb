/**
 * Smart workflow tools
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZoteroWorkflows } from '../workflows.js';
import { errorMessage } from '../errors.js';
import { jsonContent } from './format.js';

export function registerWorkflowTools(server: McpServer, workflows: ZoteroWorkflows): void {
  // build_reading_list
  server.registerTool(
    'build_reading_list',
    {
      title: 'Build Reading List',
      description: `Build a reading list for a research topic from the library.
Searches the library, keeps papers from minYear on and suggests a collection for the topic.`,
      inputSchema: {
        topic: z.string().describe('Research topic (e.g., "FHIR terminology services")'),
        maxPapers: z.number().min(1).max(100).optional().describe('Maximum papers to include (default 20)'),
        minYear: z.number().int().optional().describe('Only include papers from this year or later'),
      },
    },
    async ({ topic, maxPapers, minYear }) => {
      const result = await workflows.buildReadingList(topic, { maxPapers, minYear });
      return jsonContent(result);
    }
  );

  // smart_add_paper
  server.registerTool(
    'smart_add_paper',
    {
      title: 'Smart Add Paper',
      description: `Add a paper by DOI with duplicate detection.
- Validates the DOI and checks the library for an item with the same DOI
- With create=true, resolves metadata through the Translation Server and creates the item
- Returns status: duplicate, ready, created or error`,
      inputSchema: {
        doi: z.string().describe('DOI, doi: prefix or https://doi.org/ URL'),
        checkDuplicates: z.boolean().optional().describe('Check the library for the DOI first (default true)'),
        suggestCollection: z.boolean().optional().describe('Suggest a collection name (default true)'),
        create: z.boolean().optional().describe('Create the item when no duplicate exists (default false)'),
        collectionKey: z.string().optional().describe('Collection to add a created item to'),
      },
    },
    async ({ doi, checkDuplicates, suggestCollection, create, collectionKey }) => {
      const result = await workflows.smartAddPaper(doi, { checkDuplicates, suggestCollection, create, collectionKey });
      return jsonContent(result);
    }
  );

  // export_bibliography
  server.registerTool(
    'export_bibliography',
    {
      title: 'Export Bibliography',
      description: `Export a collection (by name) or a tag as BibTeX.
Returns the bibliography text and the number of entries.`,
      inputSchema: {
        collectionName: z.string().optional().describe('Name of the collection to export'),
        tag: z.string().optional().describe('Export items with this tag instead'),
      },
    },
    async ({ collectionName, tag }) => {
      const result = await workflows.exportBibliography({ collectionName, tag, format: 'bibtex' });
      return jsonContent(result);
    }
  );

  // find_related_papers
  server.registerTool(
    'find_related_papers',
    {
      title: 'Find Related Papers',
      description: `Find library papers related to a given paper.
Searches the library for the significant terms of the paper's title and first abstract sentence
and ranks hits by the share of terms they match. The paper itself is excluded.`,
      inputSchema: {
        itemKey: z.string().describe('Zotero key of the source paper'),
        limit: z.number().int().min(1).max(50).optional().describe('Maximum related papers (default 10)'),
      },
    },
    async ({ itemKey, limit }) => {
      const result = await workflows.findRelatedPapers(itemKey, { limit });
      return jsonContent(result);
    }
  );

  // search_pubmed_to_collection
  server.registerTool(
    'search_pubmed_to_collection',
    {
      title: 'Search PubMed to Collection',
      description: `Search PubMed and add the results to a Zotero collection.
- Supports PubMed query syntax; minDate/maxDate as YYYY/MM/DD
- The collection is found by name and created when missing unless createCollection=false`,
      inputSchema: {
        query: z.string().describe('PubMed search query (e.g., "FHIR terminology server")'),
        collectionName: z.string().describe('Target collection name'),
        maxResults: z.number().int().min(1).max(200).optional().describe('Maximum papers to add (default 50)'),
        createCollection: z.boolean().optional().describe('Create the collection if missing (default true)'),
        minDate: z.string().optional().describe('Earliest publication date, YYYY/MM/DD'),
        maxDate: z.string().optional().describe('Latest publication date, YYYY/MM/DD'),
      },
    },
    async ({ query, collectionName, maxResults, createCollection, minDate, maxDate }) => {
      try {
        const result = await workflows.searchPubMedToCollection(query, collectionName, {
          maxResults,
          createCollection,
          minDate,
          maxDate,
        });
        return jsonContent(result);
      } catch (error) {
        return jsonContent({ success: false, error: errorMessage(error) });
      }
    }
  );
}
