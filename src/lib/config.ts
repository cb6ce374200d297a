import fs from 'node:fs/promises';
import { ConfigError, errorCode, errorMessage } from './errors';
import { SPOTIFY_CLIENT_ID, SPOTIFY_CLIENT_SECRET } from './env';

export const DEFAULT_CONFIG_PATH = 'config.json';
export const PLACEHOLDER_CLIENT_ID = 'YOUR_CLIENT_ID';
export const PLACEHOLDER_CLIENT_SECRET = 'YOUR_CLIENT_SECRET';

export type Credentials = { clientId: string; clientSecret: string };

const CONFIG_TEMPLATE = `{
  "client_id": "${PLACEHOLDER_CLIENT_ID}",
  "client_secret": "${PLACEHOLDER_CLIENT_SECRET}"
}`;

async function readConfigFile(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw new ConfigError(`Error loading ${file}: ${errorMessage(err)}`);
  }
}

export function parseConfig(raw: string, file = DEFAULT_CONFIG_PATH): Credentials {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Error loading ${file}: ${errorMessage(err)}`);
  }
  if (typeof json !== 'object' || json === null) {
    throw new ConfigError(`${file} must contain a JSON object`);
  }
  const { client_id: clientId, client_secret: clientSecret }: { client_id?: unknown; client_secret?: unknown } =
    json;
  if (typeof clientId !== 'string' || typeof clientSecret !== 'string' || !clientId || !clientSecret) {
    throw new ConfigError(
      `${file} must define "client_id" and "client_secret":\n${CONFIG_TEMPLATE}`,
    );
  }
  if (clientId === PLACEHOLDER_CLIENT_ID || clientSecret === PLACEHOLDER_CLIENT_SECRET) {
    throw new ConfigError(`Please update ${file} with your actual Spotify API credentials`);
  }
  return { clientId, clientSecret };
}

/**
 * Spotify credentials from `config.json` when it exists, otherwise from
 * SPOTIFY_CLIENT_ID / SPOTIFY_CLIENT_SECRET (a `.env` file is honoured).
 */
export async function loadCredentials({
  configPath = DEFAULT_CONFIG_PATH,
  env = { clientId: SPOTIFY_CLIENT_ID, clientSecret: SPOTIFY_CLIENT_SECRET },
}: { configPath?: string; env?: Partial<Credentials> } = {}): Promise<Credentials> {
  const raw = await readConfigFile(configPath);
  if (raw !== null) return parseConfig(raw, configPath);

  const clientId = (env.clientId ?? '').trim();
  const clientSecret = (env.clientSecret ?? '').trim();
  if (!clientId || !clientSecret) {
    throw new ConfigError(
      `Spotify credentials not found. Create ${configPath}:\n${CONFIG_TEMPLATE}\n` +
        'or set SPOTIFY_CLIENT_ID and SPOTIFY_CLIENT_SECRET environment variables.',
    );
  }
  return { clientId, clientSecret };
}
