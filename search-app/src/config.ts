import { ConfigError } from './errors.js';

export interface AppConfig {
  /** Repository API root, e.g. https://my-repo.example.com/api/v2 */
  apiUrl: string;
  ref: string;
  accessToken?: string;
  /** When set, search results are cached in Postgres instead of in memory. */
  databaseUrl?: string;
  port: number;
}

type Env = Readonly<Record<string, string | undefined>>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`${name} environment variable is required`);
  }
  return value;
}

export function loadConfig(env: Env): AppConfig {
  const apiUrl = required(env, 'FORMS_API_URL');
  try {
    new URL(apiUrl);
  } catch {
    throw new ConfigError(`FORMS_API_URL is not a valid URL: ${apiUrl}`);
  }

  const port = parseInt(env['PORT'] ?? '3000', 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`PORT must be a valid port number, got "${env['PORT']}"`);
  }

  const accessToken = env['FORMS_ACCESS_TOKEN'];
  const databaseUrl = env['DATABASE_URL'];
  return {
    apiUrl: apiUrl.replace(/\/+$/, ''),
    ref: required(env, 'FORMS_REF'),
    port,
    ...(accessToken ? { accessToken } : {}),
    ...(databaseUrl ? { databaseUrl } : {}),
  };
}
