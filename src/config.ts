import fs from 'fs';
import path from 'path';

function loadDotEnvIfExists(): void {
  const envPath = path.resolve(process.cwd(), '.env');
  if (!fs.existsSync(envPath)) {
    return;
  }

  const content = fs.readFileSync(envPath, 'utf8');
  const lines = content.split(/\r?\n/);

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const normalized = trimmed.startsWith('export ') ? trimmed.slice('export '.length) : trimmed;
    const separatorIndex = normalized.indexOf('=');
    if (separatorIndex <= 0) {
      continue;
    }

    const key = normalized.slice(0, separatorIndex).trim();
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      continue;
    }

    if (process.env[key] !== undefined) {
      continue;
    }

    let rawValue = normalized.slice(separatorIndex + 1).trim();
    if (
      (rawValue.startsWith('"') && rawValue.endsWith('"')) ||
      (rawValue.startsWith("'") && rawValue.endsWith("'"))
    ) {
      rawValue = rawValue.slice(1, -1);
    }

    process.env[key] = rawValue;
  }
}

loadDotEnvIfExists();

export function readPositiveIntFromEnv(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

export function readBooleanFromEnv(name: string, fallback: boolean): boolean {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }

  return /^(1|true|yes)$/i.test(value.trim());
}

function readStringFromEnv(name: string, fallback = ''): string {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }
  return value.trim();
}

export const ROOT_DIR = process.cwd();

function readDirFromEnv(name: string, fallbackRelativePath: string): string {
  const raw = process.env[name];
  if (!raw || !raw.trim()) {
    return path.resolve(ROOT_DIR, fallbackRelativePath);
  }
  return path.resolve(ROOT_DIR, raw.trim());
}

// The sniff deadline guards "open but silent" connections and never exceeds 5s.
export const SNIFF_TIMEOUT_CEILING_MS = 5_000;

export const DATA_DIR = readDirFromEnv('DATA_DIR', 'data');
export const RECORDINGS_DIR = readDirFromEnv('RECORDINGS_DIR', 'recordings');
export const DB_PATH = (() => {
  const override = process.env.DB_PATH;
  if (override && override.trim()) {
    return path.resolve(ROOT_DIR, override.trim());
  }
  return path.resolve(DATA_DIR, 'stationcheck.db');
})();

export const REQUEST_TIMEOUT_MS = readPositiveIntFromEnv('REQUEST_TIMEOUT_MS', 10_000);
export const MAX_REDIRECTS = readPositiveIntFromEnv('MAX_REDIRECTS', 5);
export const MIN_SNIFF_BYTES = readPositiveIntFromEnv('MIN_SNIFF_BYTES', 1024);
export const SNIFF_TIMEOUT_MS = Math.min(
  readPositiveIntFromEnv('SNIFF_TIMEOUT_MS', SNIFF_TIMEOUT_CEILING_MS),
  SNIFF_TIMEOUT_CEILING_MS
);
export const CONCURRENT_PROBE_LIMIT = readPositiveIntFromEnv('CONCURRENT_PROBE_LIMIT', 5);
export const BLOCK_PRIVATE_NETWORKS = readBooleanFromEnv('BLOCK_PRIVATE_NETWORKS', false);
export const DIRECTORY_BASE_URL = readStringFromEnv('DIRECTORY_BASE_URL');
export const MAX_BATCH_URLS = readPositiveIntFromEnv('MAX_BATCH_URLS', 100);

export const PROBE_USER_AGENT = 'Mozilla/5.0 (compatible; StreamChecker/1.0)';
export const DIRECTORY_USER_AGENT = 'RadioBrowserPlayer/1.0';
export const RECORDER_USER_AGENT = DIRECTORY_USER_AGENT;
