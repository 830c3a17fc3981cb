/**
 * Configuration: environment variables and the team config file
 */

import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { getLogger } from './logger.js';

const MODULE_NAME = 'zotero-comfort';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

export const envSchema = z
  .object({
    ZOTERO_API_KEY: z.string({ required_error: 'ZOTERO_API_KEY environment variable is required' }).min(1),
    ZOTERO_USER_ID: optionalString,
    ZOTERO_GROUP_ID: optionalString,
    TRANSLATION_SERVER_URL: optionalString,
    RESEARCH_DB_URL: optionalString,
    PUBMED_EMAIL: optionalString,
    PUBMED_API_KEY: optionalString,
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    TEAM_FETCH_DELAY_MS: z.coerce.number().int().min(0).default(300),
  })
  .refine((env) => env.ZOTERO_USER_ID || env.ZOTERO_GROUP_ID, {
    message: 'ZOTERO_USER_ID or ZOTERO_GROUP_ID environment variable is required',
    path: ['ZOTERO_USER_ID'],
  });

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate the process environment. Throws with every problem listed.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => issue.message).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return result.data;
}

const memberSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  token: z.string().min(1).optional(),
  orcid: z.string().optional(),
  profileUrl: z.string().url().optional(),
});

export const teamConfigSchema = z
  .object({
    members: z.array(memberSchema).min(1),
    exclusions: z.record(z.array(z.string())).default({}),
    keywords: z.array(z.string()).default([]),
    years: z
      .object({
        from: z.number().int(),
        to: z.number().int(),
      })
      .refine((years) => years.from <= years.to, { message: 'years.from must not be after years.to' }),
    unknownYearCollection: z.string().min(1).default('Unknown year'),
    /** Name of the collection that holds the year collections; top level when absent */
    parentCollection: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    const ids = new Set(config.members.map((m) => m.id));
    for (const member of Object.keys(config.exclusions)) {
      if (!ids.has(member)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['exclusions', member],
          message: `Exclusion rules reference unknown member "${member}"`,
        });
      }
    }
  });

export type TeamConfig = z.infer<typeof teamConfigSchema>;

export function parseTeamConfig(raw: unknown): TeamConfig {
  const result = teamConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid team config: ${problems}`);
  }
  return result.data;
}

/**
 * Find and load zotero-comfort.config.json (or .zotero-comfortrc.json).
 * Returns null when no file exists; a file that does not validate throws.
 */
export async function loadTeamConfig(searchFrom?: string): Promise<TeamConfig | null> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: [`${MODULE_NAME}.config.json`, `.${MODULE_NAME}rc.json`, `.${MODULE_NAME}rc`],
  });

  const result = await explorer.search(searchFrom);
  if (!result || result.isEmpty) {
    getLogger('config').info('No team config file found, team tools are disabled');
    return null;
  }

  getLogger('config').debug({ path: result.filepath }, 'Loaded team config');
  return parseTeamConfig(result.config);
}
