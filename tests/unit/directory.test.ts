import test from 'node:test';
import assert from 'node:assert';
import {
  RadioDirectoryClient,
  Station,
  buildLocation,
  continentOf,
  dedupeByHighestBitrate,
  listContinents,
  toStation
} from '../../src/directory';
import { fakeFetch } from './helpers';

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

function station(name: string, bitrate: number): Station {
  return {
    name,
    url: `https://${name.toLowerCase().replace(/\s+/g, '-')}.example/${bitrate}`,
    country: 'Unknown',
    countryCode: '',
    state: '',
    language: 'Unknown',
    tags: '',
    favicon: '',
    bitrate,
    codec: 'MP3',
    geoLat: null,
    geoLong: null,
    location: 'Unknown'
  };
}

test('toStation: maps a full directory record', () => {
  const mapped = toStation({
    name: 'Jazz FM',
    url: 'http://jazz.example/playlist.pls',
    url_resolved: 'https://jazz.example/live',
    country: 'France',
    countrycode: 'FR',
    state: 'Brittany',
    language: 'french',
    tags: 'jazz,smooth',
    favicon: 'https://jazz.example/icon.png',
    bitrate: 128,
    codec: 'MP3',
    geo_lat: 48.1,
    geo_long: '-1.68'
  });

  assert.deepStrictEqual(mapped, {
    name: 'Jazz FM',
    url: 'https://jazz.example/live',
    country: 'France',
    countryCode: 'FR',
    state: 'Brittany',
    language: 'french',
    tags: 'jazz,smooth',
    favicon: 'https://jazz.example/icon.png',
    bitrate: 128,
    codec: 'MP3',
    geoLat: 48.1,
    geoLong: -1.68,
    location: 'Brittany, France'
  });
});

test('toStation: fills defaults for sparse records', () => {
  const mapped = toStation({ url: 'http://sparse.example/stream', name: '   ', bitrate: 'n/a' });

  assert.strictEqual(mapped?.name, 'Unknown');
  assert.strictEqual(mapped?.url, 'http://sparse.example/stream');
  assert.strictEqual(mapped?.country, 'Unknown');
  assert.strictEqual(mapped?.language, 'Unknown');
  assert.strictEqual(mapped?.codec, 'Unknown');
  assert.strictEqual(mapped?.bitrate, 0);
  assert.strictEqual(mapped?.geoLat, null);
  assert.strictEqual(mapped?.location, 'Unknown');
});

test('toStation: records without a URL are skipped', () => {
  assert.strictEqual(toStation({ name: 'No URL' }), null);
  assert.strictEqual(toStation(null), null);
  assert.strictEqual(toStation('https://radio.example/'), null);
});

test('buildLocation: drops unknown parts', () => {
  assert.strictEqual(buildLocation('Bavaria', 'Germany'), 'Bavaria, Germany');
  assert.strictEqual(buildLocation('', 'Germany'), 'Germany');
  assert.strictEqual(buildLocation('Unknown', 'Unknown'), 'Unknown');
});

test('dedupeByHighestBitrate: keeps the best copy of each name in first-seen order', () => {
  const result = dedupeByHighestBitrate([station('Alpha', 64), station('Beta', 128), station('Alpha', 192)]);

  assert.deepStrictEqual(
    result.map((entry) => [entry.name, entry.bitrate]),
    [
      ['Alpha', 192],
      ['Beta', 128]
    ]
  );
});

test('continents: lookup by country code', () => {
  assert.deepStrictEqual(listContinents(), [
    'Africa',
    'Asia',
    'Europe',
    'North America',
    'South America',
    'Oceania',
    'Antarctica'
  ]);
  assert.strictEqual(continentOf('fr'), 'Europe');
  assert.strictEqual(continentOf('XX'), null);
});

test('RadioDirectoryClient.search: sends votes-ordered search parameters', async () => {
  const { fetch, calls } = fakeFetch(() =>
    json([
      { name: 'Jazz FM', url_resolved: 'https://jazz.example/64', bitrate: 64 },
      { name: 'Jazz FM', url_resolved: 'https://jazz.example/128', bitrate: 128 },
      { name: 'Broken' }
    ])
  );
  const client = new RadioDirectoryClient({ baseUrl: 'https://dir.example', fetch });

  const stations = await client.search({ name: 'jazz', country: 'France', limit: 50 });

  assert.strictEqual(
    calls[0].url,
    'https://dir.example/json/stations/search?offset=0&limit=50&order=votes&reverse=true&name=jazz&country=France'
  );
  assert.strictEqual(calls[0].headers.get('user-agent'), 'RadioBrowserPlayer/1.0');
  assert.deepStrictEqual(
    stations.map((entry) => entry.url),
    ['https://jazz.example/128']
  );
});

test('RadioDirectoryClient.topStations: requests the top-voted list', async () => {
  const { fetch, calls } = fakeFetch(() => json([]));
  const client = new RadioDirectoryClient({ baseUrl: 'https://dir.example', fetch });

  assert.deepStrictEqual(await client.topStations(10), []);
  assert.strictEqual(calls[0].url, 'https://dir.example/json/stations/topvote/10');
});

test('RadioDirectoryClient: picks one resolved server and keeps it', async () => {
  let resolutions = 0;
  const { fetch, calls } = fakeFetch(() => json([{ name: 'Germany' }, { name: 'Austria' }, { name: '' }]));
  const client = new RadioDirectoryClient({
    fetch,
    resolveServers: async () => {
      resolutions += 1;
      return ['https://a.dir.example', 'https://b.dir.example'];
    },
    random: () => 0.99
  });

  assert.deepStrictEqual(await client.listCountries(), ['Austria', 'Germany']);
  await client.listLanguages();

  assert.strictEqual(resolutions, 1);
  assert.deepStrictEqual(
    calls.map((call) => call.url),
    ['https://b.dir.example/json/countries', 'https://b.dir.example/json/languages']
  );
});

test('RadioDirectoryClient: concurrent first calls share one server pick', async () => {
  let resolutions = 0;
  const draws = [0, 0.99];
  const client = new RadioDirectoryClient({
    fetch: fakeFetch(() => json([])).fetch,
    resolveServers: async () => {
      resolutions += 1;
      return ['https://a.dir.example', 'https://b.dir.example'];
    },
    random: () => draws.shift() ?? 0
  });

  const picked = await Promise.all([client.getBaseUrl(), client.getBaseUrl()]);

  assert.strictEqual(resolutions, 1);
  assert.deepStrictEqual(picked, ['https://a.dir.example', 'https://a.dir.example']);
});

test('RadioDirectoryClient: a failed server pick is retried on the next call', async () => {
  let resolutions = 0;
  const client = new RadioDirectoryClient({
    fetch: fakeFetch(() => json([])).fetch,
    resolveServers: async () => {
      resolutions += 1;
      if (resolutions === 1) {
        throw new Error('lookup failed');
      }
      return ['https://a.dir.example'];
    }
  });

  await assert.rejects(client.getBaseUrl(), { message: 'lookup failed' });
  assert.strictEqual(await client.getBaseUrl(), 'https://a.dir.example');
  assert.strictEqual(resolutions, 2);
});

test('RadioDirectoryClient: failures degrade to empty lists', async () => {
  const down = fakeFetch(() => json({ error: 'maintenance' }, 503));
  const refused = fakeFetch(() => {
    throw new TypeError('fetch failed');
  });

  assert.deepStrictEqual(await new RadioDirectoryClient({ baseUrl: 'https://dir.example', fetch: down.fetch }).topStations(), []);
  assert.deepStrictEqual(await new RadioDirectoryClient({ baseUrl: 'https://dir.example', fetch: refused.fetch }).listCountries(), []);
  assert.deepStrictEqual(
    await new RadioDirectoryClient({ fetch: down.fetch, resolveServers: async () => [] }).listLanguages(),
    []
  );
  assert.strictEqual(down.calls.length, 1);
});
