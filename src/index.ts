#!/usr/bin/env node

/**
 * Zotero Comfort MCP Server
 * Zotero tools, research workflows and team publication sync
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadEnv, loadTeamConfig, type EnvConfig } from './config.js';
import { initLogger } from './logger.js';
import { ZoteroClient } from './zotero-client.js';
import { TranslationClient } from './translation-client.js';
import { ResearchDatabaseClient } from './sources/research-db-client.js';
import { PubMedClient } from './sources/pubmed-client.js';
import { ZoteroWorkflows } from './workflows.js';
import { registerSearchTools } from './tools/search.js';
import { registerCollectionTools } from './tools/collections.js';
import { registerExportTools } from './tools/export.js';
import { registerWorkflowTools } from './tools/workflows.js';
import { registerTeamTools } from './tools/team.js';

let env: EnvConfig;
try {
  env = loadEnv();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}

const log = initLogger({ level: env.LOG_LEVEL });

const zoteroClient = new ZoteroClient({
  apiKey: env.ZOTERO_API_KEY,
  userId: env.ZOTERO_USER_ID,
  groupId: env.ZOTERO_GROUP_ID,
});
const translationClient = new TranslationClient(env.TRANSLATION_SERVER_URL);
const pubmed = new PubMedClient({ email: env.PUBMED_EMAIL, apiKey: env.PUBMED_API_KEY });
const workflows = new ZoteroWorkflows({ zotero: zoteroClient, translation: translationClient, pubmed });

const server = new McpServer({
  name: 'zotero-comfort',
  version: '0.3.0',
});

registerSearchTools(server, zoteroClient);
registerCollectionTools(server, zoteroClient);
registerExportTools(server, zoteroClient);
registerWorkflowTools(server, workflows);

async function main() {
  const teamConfig = await loadTeamConfig();
  if (teamConfig) {
    const researchDb = new ResearchDatabaseClient({
      baseUrl: env.RESEARCH_DB_URL,
      memberDelay: env.TEAM_FETCH_DELAY_MS,
    });
    registerTeamTools(server, { zotero: zoteroClient, researchDb, pubmed }, teamConfig);
    log.info({ members: teamConfig.members.length }, 'Team tools enabled');
  }

  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ library: zoteroClient.getLibraryPath() }, 'Zotero Comfort MCP server running on stdio');
}

main().catch((error) => {
  log.fatal({ err: error }, 'Failed to start Zotero Comfort MCP server');
  process.exit(1);
});
