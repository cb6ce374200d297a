// Load environment variables from .env (via dotenv) before anything reads process.env.
import { config as dotenvConfig } from 'dotenv';
dotenvConfig();

export const SPOTIFY_CLIENT_ID = process.env.SPOTIFY_CLIENT_ID ?? '';
export const SPOTIFY_CLIENT_SECRET = process.env.SPOTIFY_CLIENT_SECRET ?? '';
export const SPOTIFY_MARKET = (process.env.SPOTIFY_MARKET ?? '').trim().toUpperCase();

/** Pause between search requests; falls back to 100ms when unset or not a number. */
export const LOOKUP_DELAY_MS = (() => {
  const v = (process.env.ISRC_LOOKUP_DELAY_MS || '').trim();
  if (!v) return 100;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? n : 100;
})();
