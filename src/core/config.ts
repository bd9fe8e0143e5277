import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_PLACEHOLDER_URL } from '../translators/agentfacts.js';
import { DEFAULT_OASF_REGISTRY_ID } from '../translators/oasf.js';
import { ConfigurationError } from './errors.js';

/** The AgentFacts schema shipped with the package. */
export const DEFAULT_SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'schemas', 'agentfacts.schema.json');

export interface BridgeConfig {
  /** Root of the OASF taxonomy catalog; `null` runs without a taxonomy. */
  taxonomyDir: string | null;
  schemaPath: string;
  /** Fail instead of warning when the catalog is absent. */
  requireTaxonomy: boolean;
  placeholderUrl: string;
  registryId: string;
}

export type EnvSource = Record<string, string | undefined>;

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  OASF_SCHEMA_DIR: z.string().trim().min(1).optional(),
  AGENTFACTS_SCHEMA_PATH: z.string().trim().min(1).optional(),
  OASF_TAXONOMY_REQUIRED: booleanFlag.optional(),
  AGENTFACTS_PLACEHOLDER_URL: z.string().trim().url().optional(),
  OASF_REGISTRY_ID: z
    .string()
    .trim()
    .regex(/^[^\s:@]+$/, 'must not contain whitespace, ":" or "@"')
    .optional(),
});

const CONFIG_KEYS = Object.keys(envSchema.shape);

// Blank variables count as unset.
const presentValues = (env: EnvSource): Record<string, string> => {
  const values: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[key];
    if (value !== undefined && value.trim().length > 0) {
      values[key] = value;
    }
  }
  return values;
};

/**
 * Build the bridge configuration from environment variables. Overrides win
 * over the environment.
 *
 * @throws ConfigurationError naming every invalid variable
 */
export function resolveBridgeConfig(
  env: EnvSource = process.env,
  overrides: Partial<BridgeConfig> = {}
): BridgeConfig {
  const parsed = envSchema.safeParse(presentValues(env));
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid bridge configuration: ${details}`, variables);
  }

  const values = parsed.data;
  // An override left undefined keeps the environment value; `null` clears the taxonomy.
  return {
    taxonomyDir:
      overrides.taxonomyDir !== undefined
        ? overrides.taxonomyDir
        : values.OASF_SCHEMA_DIR
          ? path.resolve(values.OASF_SCHEMA_DIR)
          : null,
    schemaPath:
      overrides.schemaPath ??
      (values.AGENTFACTS_SCHEMA_PATH ? path.resolve(values.AGENTFACTS_SCHEMA_PATH) : DEFAULT_SCHEMA_PATH),
    requireTaxonomy: overrides.requireTaxonomy ?? values.OASF_TAXONOMY_REQUIRED ?? false,
    placeholderUrl: overrides.placeholderUrl ?? values.AGENTFACTS_PLACEHOLDER_URL ?? DEFAULT_PLACEHOLDER_URL,
    registryId: overrides.registryId ?? values.OASF_REGISTRY_ID ?? DEFAULT_OASF_REGISTRY_ID,
  };
}

export interface LoadBridgeConfigOptions {
  /** Path of a `.env` file; a missing file is ignored. Defaults to `.env` in the working directory. */
  envFile?: string;
  env?: EnvSource;
  overrides?: Partial<BridgeConfig>;
}

/**
 * Like {@link resolveBridgeConfig}, reading a `.env` file first. Variables
 * already present in `env` are not replaced by the file.
 */
export function loadBridgeConfig(options: LoadBridgeConfigOptions = {}): BridgeConfig {
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(options.env ?? process.env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  loadDotenv({ path: options.envFile ?? path.resolve(process.cwd(), '.env'), processEnv: merged });
  return resolveBridgeConfig(merged, options.overrides);
}
