import fs from 'node:fs/promises';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import YAML from 'yaml';
import { z } from 'zod';
import { configPath, DEFAULT_API_URL, ensureHttps } from './paths';

const HcpstatConfigSchema = z.object({
  url: z.string().min(1).optional(),
  token: z.string().min(1).optional(),
  keepSessions: z.number().int().min(0).optional(),
});

export type HcpstatConfig = z.infer<typeof HcpstatConfigSchema>;

export type ConfigError = { message: string; path: string };

export type CliOverrides = { url?: string; token?: string };

export type Settings = {
  baseUrl: string;
  token?: string;
  keepSessions?: number;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read the YAML config file. A missing file yields an empty config; a file
 * that cannot be read or does not match the schema is an error.
 */
export function readConfig(file: string = configPath()): ResultAsync<HcpstatConfig, ConfigError> {
  return ResultAsync.fromPromise(fs.readFile(file, 'utf8'), (error) => error)
    .orElse((error) => isMissingFile(error)
      ? okAsync('')
      : errAsync<string, ConfigError>({
          message: error instanceof Error ? error.message : String(error),
          path: file,
        }))
    .andThen((txt) => {
      let raw: unknown;
      try {
        raw = YAML.parse(txt);
      } catch (error) {
        return errAsync<HcpstatConfig, ConfigError>({
          message: `invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
          path: file,
        });
      }
      const parsed = HcpstatConfigSchema.safeParse(raw ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return errAsync<HcpstatConfig, ConfigError>({
          message: `${issue?.path.join('.') || 'config'}: ${issue?.message ?? 'invalid value'}`,
          path: file,
        });
      }
      return okAsync<HcpstatConfig, ConfigError>(parsed.data);
    });
}

// Flags win over the environment, which wins over the config file.
export function resolveSettings(
  overrides: CliOverrides,
  config: HcpstatConfig,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const url = overrides.url || env.OCM_URL || config.url || DEFAULT_API_URL;
  return {
    baseUrl: ensureHttps(url),
    token: overrides.token || env.OCM_TOKEN || config.token,
    keepSessions: config.keepSessions,
  };
}
