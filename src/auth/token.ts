import { execa } from 'execa';
import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import { log } from '../services/logger';

export type TokenError = { message: string };

const LOGIN_HINT = "no access token found: set OCM_TOKEN, add `token` to the config file, or run 'ocm login'";

// Ask the ocm CLI for a fresh access token.
export function tokenFromOcmCli(): ResultAsync<string, TokenError> {
  return ResultAsync.fromPromise(
    execa('ocm', ['token'], { reject: true, timeout: 30_000 }),
    (error) => {
      log.debug('ocm token failed', 'auth', { error: error instanceof Error ? error.message : String(error) });
      return { message: LOGIN_HINT };
    },
  ).andThen(({ stdout }) => {
    const token = stdout.trim();
    return token ? okAsync(token) : errAsync({ message: LOGIN_HINT });
  });
}

export function resolveToken(configured?: string): ResultAsync<string, TokenError> {
  if (configured) return okAsync(configured);
  return tokenFromOcmCli();
}
