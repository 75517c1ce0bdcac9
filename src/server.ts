import express from 'express';
import rateLimit from 'express-rate-limit';
import { DB_PATH, MAX_BATCH_URLS } from './config';
import { FavoriteDirection, FavoritesStore, createFavoritesStore } from './db';
import { RadioDirectoryClient, Station, StationSearch, buildLocation, toStation } from './directory';
import { StreamProbe } from './probe';
import { StreamRecorder } from './recorder';
import { UserInputError, errorMessage, isSafeItemId, validateHttpUrl } from './security';

export interface AppDependencies {
  probe: StreamProbe;
  directory: RadioDirectoryClient;
  favorites: FavoritesStore;
  recorder: StreamRecorder;
  /** Requests per minute per client on probe and recording routes. */
  rateLimitPerMinute?: number;
}

function readOptionalInt(value: unknown, fallback: number, max: number): number {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return fallback;
  }
  return Math.min(Number.parseInt(value, 10), max);
}

function readQueryString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function readCheckPlayability(body: unknown): boolean {
  if (body && typeof body === 'object' && 'checkPlayability' in body) {
    return body.checkPlayability !== false;
  }
  return true;
}

function readBodyField(body: unknown, key: string): unknown {
  if (!body || typeof body !== 'object') {
    return undefined;
  }
  return (body as Record<string, unknown>)[key];
}

export function customStationName(name: string): string {
  const trimmed = name.trim();
  return trimmed ? `Custom station: ${trimmed}` : 'Custom Station';
}

function customStation(url: string, name: string): Station {
  return {
    name: customStationName(name),
    url,
    country: 'Unknown',
    countryCode: '',
    state: '',
    language: 'Unknown',
    tags: '',
    favicon: '',
    bitrate: 0,
    codec: 'Unknown',
    geoLat: null,
    geoLong: null,
    location: buildLocation('', 'Unknown')
  };
}

export function createApp(deps: AppDependencies): express.Express {
  const { probe, directory, favorites, recorder } = deps;
  const app = express();

  app.set('trust proxy', 1);
  app.use(express.json({ limit: '256kb' }));

  const probeLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: deps.rateLimitPerMinute ?? 30,
    standardHeaders: true,
    legacyHeaders: false,
    validate: false,
    keyGenerator: (req) => req.ip || 'unknown',
    message: {
      error: 'Too many requests. Try again in a minute.'
    }
  });

  app.post('/api/probe', probeLimiter, async (req, res) => {
    const url = readBodyField(req.body, 'url');
    if (typeof url !== 'string' || !url.trim()) {
      res.status(400).json({ error: 'Request body must contain { url }.' });
      return;
    }

    const result = await probe.probe(url.trim(), { checkPlayability: readCheckPlayability(req.body) });
    res.json(result);
  });

  app.post('/api/probe/batch', probeLimiter, async (req, res) => {
    const urls = readBodyField(req.body, 'urls');
    if (!Array.isArray(urls) || urls.length === 0 || !urls.every((url) => typeof url === 'string')) {
      res.status(400).json({ error: 'Request body must contain a non-empty { urls } string array.' });
      return;
    }

    if (urls.length > MAX_BATCH_URLS) {
      res.status(400).json({ error: `At most ${MAX_BATCH_URLS} URLs can be checked at once.` });
      return;
    }

    const results = await probe.probeMany(urls, { checkPlayability: readCheckPlayability(req.body) });
    res.json(results);
  });

  app.get('/api/stations/search', async (req, res) => {
    const query: StationSearch = {
      name: readQueryString(req.query.name),
      country: readQueryString(req.query.country),
      language: readQueryString(req.query.language),
      offset: readOptionalInt(req.query.offset, 0, Number.MAX_SAFE_INTEGER),
      limit: readOptionalInt(req.query.limit, 1000, 1000)
    };
    res.json(await directory.search(query));
  });

  app.get('/api/stations/top', async (req, res) => {
    res.json(await directory.topStations(readOptionalInt(req.query.limit, 1000, 1000)));
  });

  app.get('/api/countries', async (_req, res) => {
    res.json(await directory.listCountries());
  });

  app.get('/api/languages', async (_req, res) => {
    res.json(await directory.listLanguages());
  });

  app.get('/api/continents', (_req, res) => {
    res.json(directory.listContinents());
  });

  app.get('/api/favorites', (_req, res) => {
    res.json(favorites.listFavorites());
  });

  app.post('/api/favorites', (req, res) => {
    const station = toStation(readBodyField(req.body, 'station'));
    if (!station) {
      res.status(400).json({ error: 'Request body must contain a { station } with a url.' });
      return;
    }

    validateHttpUrl(station.url);
    const favorite = favorites.addFavorite(station);
    console.log(`[favorites] added ${favorite.name}`);
    res.status(201).json(favorite);
  });

  app.post('/api/favorites/custom', probeLimiter, async (req, res) => {
    const url = readBodyField(req.body, 'url');
    const name = readBodyField(req.body, 'name');
    if (typeof url !== 'string' || !url.trim()) {
      res.status(400).json({ error: 'Request body must contain { url }.' });
      return;
    }

    const result = await probe.probe(url.trim());
    if (!result.valid) {
      res.status(422).json({ error: 'Stream is not valid. Check the URL and try again.', probe: result });
      return;
    }

    try {
      const favorite = favorites.addFavorite(customStation(url.trim(), typeof name === 'string' ? name : ''));
      console.log(`[favorites] added custom station ${favorite.url}`);
      res.status(201).json({ favorite, probe: result });
    } catch (error) {
      const status = error instanceof UserInputError ? error.statusCode : 500;
      res.status(status).json({ error: errorMessage(error) });
    }
  });

  app.delete('/api/favorites/:id', (req, res) => {
    const { id } = req.params;
    if (!isSafeItemId(id)) {
      res.status(400).json({ error: 'Invalid favorite id.' });
      return;
    }

    if (!favorites.removeFavorite(id)) {
      res.status(404).json({ error: 'Favorite not found.' });
      return;
    }

    res.status(204).send();
  });

  const sendAdjacent = (direction: FavoriteDirection) => (req: express.Request, res: express.Response) => {
    const { id } = req.params;
    if (!isSafeItemId(id)) {
      res.status(400).json({ error: 'Invalid favorite id.' });
      return;
    }

    const favorite = favorites.adjacentFavorite(id, direction);
    if (!favorite) {
      res.status(404).json({ error: 'No favorites added yet.' });
      return;
    }

    res.json(favorite);
  };

  app.get('/api/favorites/:id/next', sendAdjacent('next'));
  app.get('/api/favorites/:id/prev', sendAdjacent('prev'));

  app.post('/api/recordings', probeLimiter, async (req, res) => {
    const url = readBodyField(req.body, 'url');
    const name = readBodyField(req.body, 'name');
    if (typeof url !== 'string' || !url.trim()) {
      res.status(400).json({ error: 'Request body must contain { url }.' });
      return;
    }

    try {
      const recording = await recorder.start(url, typeof name === 'string' ? name : '');
      res.status(recording.status === 'error' ? 502 : 202).json(recording);
    } catch (error) {
      const status = error instanceof UserInputError ? error.statusCode : 500;
      res.status(status).json({ error: errorMessage(error) });
    }
  });

  app.get('/api/recordings', (_req, res) => {
    res.json(recorder.list());
  });

  app.delete('/api/recordings/:id', async (req, res) => {
    const { id } = req.params;
    if (!isSafeItemId(id)) {
      res.status(400).json({ error: 'Invalid recording id.' });
      return;
    }

    const recording = await recorder.stop(id);
    if (!recording) {
      res.status(404).json({ error: 'Recording not found.' });
      return;
    }

    res.json(recording);
  });

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const statusCode = err instanceof UserInputError ? err.statusCode : 500;
    if (statusCode >= 500) {
      console.error('Unhandled request error:', err);
    }
    res.status(statusCode).json({ error: errorMessage(err) });
  });

  return app;
}

export function startServer(): void {
  const favorites = createFavoritesStore(DB_PATH);
  const recorder = new StreamRecorder();
  const app = createApp({
    probe: new StreamProbe(),
    directory: new RadioDirectoryClient(),
    favorites,
    recorder
  });

  const port = Number.parseInt(process.env.PORT ?? '3000', 10);
  const host = process.env.HOST ?? '0.0.0.0';

  const server = app.listen(port, host, () => {
    console.log(`stationcheck listening on http://localhost:${port} (host: ${host})`);
  });

  const shutdown = (): void => {
    server.close();
    recorder
      .stopAll()
      .catch((error: unknown) => {
        console.error('Failed to stop recordings:', error);
      })
      .finally(() => {
        favorites.close();
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (require.main === module) {
  startServer();
}
