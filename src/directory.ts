import dns from 'dns/promises';
import { DIRECTORY_BASE_URL, DIRECTORY_USER_AGENT } from './config';
import continents from './data/continents.json';
import { FetchLike, errorMessage, fetchWithRedirects } from './security';

const DIRECTORY_LOOKUP_HOST = 'all.api.radio-browser.info';
const DIRECTORY_TIMEOUT_MS = 10_000;

export interface Station {
  name: string;
  url: string;
  country: string;
  countryCode: string;
  state: string;
  language: string;
  tags: string;
  favicon: string;
  bitrate: number;
  codec: string;
  geoLat: number | null;
  geoLong: number | null;
  location: string;
}

export interface StationSearch {
  name?: string;
  country?: string;
  language?: string;
  offset?: number;
  limit?: number;
}

export type ServerResolver = () => Promise<string[]>;

export interface RadioDirectoryClientOptions {
  baseUrl?: string;
  fetch?: FetchLike;
  resolveServers?: ServerResolver;
  random?: () => number;
}

function readString(record: Record<string, unknown>, key: string, fallback = ''): string {
  const value = record[key];
  return typeof value === 'string' && value.trim() ? value : fallback;
}

function readNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function buildLocation(state: string, country: string): string {
  const parts: string[] = [];
  if (state && state !== 'Unknown') {
    parts.push(state);
  }
  if (country && country !== 'Unknown') {
    parts.push(country);
  }
  return parts.length > 0 ? parts.join(', ') : 'Unknown';
}

/** Maps a directory station record onto a Station; null when it has no playable URL. */
export function toStation(value: unknown): Station | null {
  if (!value || typeof value !== 'object') {
    return null;
  }

  const record = value as Record<string, unknown>;
  const url = readString(record, 'url_resolved') || readString(record, 'url');
  if (!url) {
    return null;
  }

  const country = readString(record, 'country', 'Unknown');
  const state = readString(record, 'state');

  return {
    name: readString(record, 'name', 'Unknown'),
    url,
    country,
    countryCode: readString(record, 'countrycode'),
    state,
    language: readString(record, 'language', 'Unknown'),
    tags: readString(record, 'tags'),
    favicon: readString(record, 'favicon'),
    bitrate: readNumber(record, 'bitrate') ?? 0,
    codec: readString(record, 'codec', 'Unknown'),
    geoLat: readNumber(record, 'geo_lat'),
    geoLong: readNumber(record, 'geo_long'),
    location: buildLocation(state, country)
  };
}

/** Keeps one station per name: the one with the highest bitrate, in first-seen order. */
export function dedupeByHighestBitrate(stations: Station[]): Station[] {
  const best = new Map<string, Station>();
  for (const station of stations) {
    const current = best.get(station.name);
    if (!current || station.bitrate > current.bitrate) {
      best.set(station.name, station);
    }
  }
  return Array.from(best.values());
}

const continentCountries: Record<string, string[]> = continents;

export function listContinents(): string[] {
  return Object.keys(continentCountries);
}

export function continentOf(countryCode: string): string | null {
  const code = countryCode.trim().toUpperCase();
  for (const [continent, codes] of Object.entries(continentCountries)) {
    if (codes.includes(code)) {
      return continent;
    }
  }
  return null;
}

export const resolveDirectoryServers: ServerResolver = async () => {
  const records = await dns.lookup(DIRECTORY_LOOKUP_HOST, { all: true });
  const hosts = new Set<string>();

  for (const record of records) {
    try {
      const names = await dns.reverse(record.address);
      if (names[0]) {
        hosts.add(names[0]);
      }
    } catch (error) {
      console.warn(`[directory] reverse lookup failed for ${record.address}: ${errorMessage(error)}`);
    }
  }

  return Array.from(hosts)
    .sort()
    .map((host) => `https://${host}`);
};

function collectNames(data: unknown): string[] {
  if (!Array.isArray(data)) {
    return [];
  }

  const names: string[] = [];
  for (const entry of data) {
    if (entry && typeof entry === 'object') {
      const name = readString(entry as Record<string, unknown>, 'name');
      if (name) {
        names.push(name);
      }
    }
  }
  return names.sort();
}

export class RadioDirectoryClient {
  private baseUrl: Promise<string> | null;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly resolveServers: ServerResolver;
  private readonly random: () => number;

  constructor(options: RadioDirectoryClientOptions = {}) {
    const fixed = options.baseUrl || DIRECTORY_BASE_URL;
    this.baseUrl = fixed ? Promise.resolve(fixed) : null;
    this.fetchImpl = options.fetch;
    this.resolveServers = options.resolveServers ?? resolveDirectoryServers;
    this.random = options.random ?? Math.random;
  }

  /** Concurrent first calls share one server pick; a failed pick is retried on the next call. */
  getBaseUrl(): Promise<string> {
    if (this.baseUrl) {
      return this.baseUrl;
    }

    const pending = this.pickServer();
    this.baseUrl = pending;
    pending.catch(() => {
      if (this.baseUrl === pending) {
        this.baseUrl = null;
      }
    });
    return pending;
  }

  private async pickServer(): Promise<string> {
    const servers = await this.resolveServers();
    if (servers.length === 0) {
      throw new Error('No station directory servers are available.');
    }

    const picked = servers[Math.floor(this.random() * servers.length)];
    console.log(`[directory] using server ${picked}`);
    return picked;
  }

  private async request(pathname: string, params?: URLSearchParams): Promise<unknown> {
    let url: URL;
    try {
      url = new URL(pathname, await this.getBaseUrl());
    } catch (error) {
      console.error(`[directory] cannot resolve server: ${errorMessage(error)}`);
      return null;
    }

    if (params) {
      url.search = params.toString();
    }

    try {
      const { response } = await fetchWithRedirects(
        url,
        {
          method: 'GET',
          headers: {
            'User-Agent': DIRECTORY_USER_AGENT,
            'Content-Type': 'application/json'
          }
        },
        { fetch: this.fetchImpl, timeoutMs: DIRECTORY_TIMEOUT_MS }
      );

      if (response.status !== 200) {
        await response.body?.cancel();
        console.error(`[directory] ${url.toString()} answered HTTP ${response.status}`);
        return null;
      }

      const data: unknown = await response.json();
      return data;
    } catch (error) {
      console.error(`[directory] request to ${url.toString()} failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private toStations(data: unknown): Station[] {
    if (!Array.isArray(data)) {
      return [];
    }

    const stations: Station[] = [];
    for (const entry of data) {
      const station = toStation(entry);
      if (station) {
        stations.push(station);
      }
    }
    return dedupeByHighestBitrate(stations);
  }

  async topStations(limit = 1000): Promise<Station[]> {
    return this.toStations(await this.request(`/json/stations/topvote/${limit}`));
  }

  async search(query: StationSearch = {}): Promise<Station[]> {
    const params = new URLSearchParams({
      offset: String(query.offset ?? 0),
      limit: String(query.limit ?? 1000),
      order: 'votes',
      reverse: 'true'
    });

    if (query.name) params.set('name', query.name);
    if (query.country) params.set('country', query.country);
    if (query.language) params.set('language', query.language);

    return this.toStations(await this.request('/json/stations/search', params));
  }

  async listCountries(): Promise<string[]> {
    return collectNames(await this.request('/json/countries'));
  }

  async listLanguages(): Promise<string[]> {
    return collectNames(await this.request('/json/languages'));
  }

  listContinents(): string[] {
    return listContinents();
  }
}
