/**
 * Configuration tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadEnv, loadTeamConfig, parseTeamConfig } from '../src/config.js';

const minimalTeam = {
  members: [
    { id: 'Doe', name: 'Jane Doe', token: 'test-token' },
    { id: 'Roe', name: 'Richard Roe' },
  ],
  years: { from: 2022, to: 2024 },
};

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({ ZOTERO_API_KEY: 'test-key', ZOTERO_GROUP_ID: '42', TEAM_FETCH_DELAY_MS: '0' });

    expect(env.ZOTERO_GROUP_ID).toBe('42');
    expect(env.ZOTERO_USER_ID).toBeUndefined();
    expect(env.LOG_LEVEL).toBe('info');
    expect(env.TEAM_FETCH_DELAY_MS).toBe(0);
  });

  it('requires the API key', () => {
    expect(() => loadEnv({ ZOTERO_USER_ID: '123' })).toThrow(/ZOTERO_API_KEY environment variable is required/);
  });

  it('requires a user or group id', () => {
    expect(() => loadEnv({ ZOTERO_API_KEY: 'test-key', ZOTERO_USER_ID: '  ' })).toThrow(
      'Invalid configuration: ZOTERO_USER_ID or ZOTERO_GROUP_ID environment variable is required'
    );
  });
});

describe('parseTeamConfig', () => {
  it('fills defaults', () => {
    const config = parseTeamConfig(minimalTeam);

    expect(config.exclusions).toEqual({});
    expect(config.keywords).toEqual([]);
    expect(config.unknownYearCollection).toBe('Unknown year');
    expect(config.parentCollection).toBeUndefined();
  });

  it('rejects exclusions for unknown members', () => {
    expect(() => parseTeamConfig({ ...minimalTeam, exclusions: { Nobody: ['Topic'] } })).toThrow(
      'Invalid team config: exclusions.Nobody: Exclusion rules reference unknown member "Nobody"'
    );
  });

  it('rejects an inverted year range', () => {
    expect(() => parseTeamConfig({ ...minimalTeam, years: { from: 2025, to: 2020 } })).toThrow(
      'years: years.from must not be after years.to'
    );
  });

  it('rejects an empty roster', () => {
    expect(() => parseTeamConfig({ ...minimalTeam, members: [] })).toThrow(/^Invalid team config: members: /);
  });
});

describe('loadTeamConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'zotero-comfort-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads and validates the config file', async () => {
    await writeFile(
      join(dir, 'zotero-comfort.config.json'),
      JSON.stringify({ ...minimalTeam, keywords: ['FHIR'] }),
      'utf-8'
    );

    const config = await loadTeamConfig(dir);

    expect(config?.members.map((m) => m.id)).toEqual(['Doe', 'Roe']);
    expect(config?.keywords).toEqual(['FHIR']);
  });

  it('returns null when no file exists', async () => {
    expect(await loadTeamConfig(dir)).toBeNull();
  });

  it('throws for an invalid file', async () => {
    await writeFile(join(dir, '.zotero-comfortrc.json'), JSON.stringify({ members: [] }), 'utf-8');

    await expect(loadTeamConfig(dir)).rejects.toThrow(/^Invalid team config/);
  });
});
