/**
 * Team publication tools
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { TeamConfig } from '../config.js';
import type { PublicationRecord } from '../types.js';
import { searchTeamPublications, syncTeamPublications, type TeamSyncDeps } from '../sync/team-sync.js';
import { errorMessage } from '../errors.js';
import { jsonContent } from './format.js';

function publicationSummary(record: PublicationRecord) {
  return {
    title: record.title,
    doi: record.doi ?? null,
    year: record.year ?? null,
    journal: record.journal ?? null,
    authors: record.authors,
    teamAuthors: [...record.provenance],
  };
}

export function registerTeamTools(server: McpServer, deps: TeamSyncDeps, config: TeamConfig): void {
  // get_team_roster
  server.registerTool(
    'get_team_roster',
    {
      title: 'Get Team Roster',
      description: `List the configured team members.
Members without a research database token are not fetched directly; their work appears through co-authors.`,
      inputSchema: {},
    },
    async () => {
      const members = config.members.map((m) => ({
        id: m.id,
        name: m.name,
        orcid: m.orcid ?? null,
        profileUrl: m.profileUrl ?? null,
        hasApiToken: Boolean(m.token),
        exclusionTopics: config.exclusions[m.id] ?? [],
      }));
      return jsonContent({ count: members.length, members });
    }
  );

  // search_team_publications
  server.registerTool(
    'search_team_publications',
    {
      title: 'Search Team Publications',
      description: `Search the team's publications in the research database by title.
Fetches every member with a token (sequentially), merges duplicates and matches the query against titles.`,
      inputSchema: {
        query: z.string().describe('Text to look for in publication titles'),
        maxResults: z.number().min(1).max(500).optional().describe('Maximum results (default 100)'),
      },
    },
    async ({ query, maxResults }) => {
      try {
        const records = await searchTeamPublications(deps.researchDb, config, query, maxResults);
        return jsonContent({ count: records.length, publications: records.map(publicationSummary) });
      } catch (error) {
        return jsonContent({ success: false, error: errorMessage(error) });
      }
    }
  );

  // sync_team_publications
  server.registerTool(
    'sync_team_publications',
    {
      title: 'Sync Team Publications',
      description: `Sync the team's publications into the Zotero library, one collection per publication year.
- Fetches, deduplicates, enriches from PubMed and filters by the configured affiliation rules
- Items already in the library (same DOI or title) are skipped
- Use dryRun=true to see the plan without writing anything
- Flagged publications (no matching keyword) are reported, not synced, unless includeFlagged=true`,
      inputSchema: {
        dryRun: z.boolean().optional().describe('Plan only, do not write (default false)'),
        includeFlagged: z.boolean().optional().describe('Also sync publications flagged for review'),
      },
    },
    async ({ dryRun, includeFlagged }) => {
      try {
        const result = await syncTeamPublications(deps, config, { dryRun, includeFlagged });
        if (!result.ok) {
          return jsonContent({ success: false, error: result.error.message });
        }
        return jsonContent({ success: true, ...result.value });
      } catch (error) {
        return jsonContent({ success: false, error: errorMessage(error) });
      }
    }
  );
}
