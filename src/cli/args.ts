import { err, ok, type Result } from 'neverthrow';

export type CliArgs =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'status'; clusterId: string; url?: string; token?: string };

export type ArgsError = { message: string };

const VALUE_FLAGS: Record<string, 'clusterId' | 'url' | 'token'> = {
  '--cluster-id': 'clusterId',
  '-C': 'clusterId',
  '--url': 'url',
  '--token': 'token',
};

/**
 * Parse argv (without the node and script entries). Accepts `--flag value`
 * and `--flag=value`.
 */
export function parseArgs(argv: readonly string[]): Result<CliArgs, ArgsError> {
  if (argv.includes('--help') || argv.includes('-h')) return ok({ command: 'help' });
  if (argv.includes('--version') || argv.includes('-v')) return ok({ command: 'version' });

  const values: Partial<Record<'clusterId' | 'url' | 'token', string>> = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf('=');
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const key = Object.hasOwn(VALUE_FLAGS, flag) ? VALUE_FLAGS[flag] : undefined;
    if (!key) {
      return err({ message: `unknown argument: ${arg}` });
    }
    const value = eq > 0 ? arg.slice(eq + 1) : argv[++i];
    if (value === undefined || value === '') {
      return err({ message: `flag ${flag} needs a value` });
    }
    values[key] = value;
  }

  if (!values.clusterId) {
    return err({ message: 'required flag --cluster-id not set' });
  }
  return ok({ command: 'status', clusterId: values.clusterId, url: values.url, token: values.token });
}
