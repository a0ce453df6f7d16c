import os from 'node:os';
import path from 'node:path';

export const DEFAULT_API_URL = 'https://api.openshift.com';

export function configPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.HCPSTAT_CONFIG ??
    path.join(env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config'), 'hcpstat', 'config');
}

export function ensureHttps(base: string): string {
  const trimmed = base.replace(/\/+$/, '');
  if (trimmed.startsWith('http://') || trimmed.startsWith('https://')) return trimmed;
  return `https://${trimmed}`;
}
