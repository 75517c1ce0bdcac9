import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { Station } from './directory';
import { UserInputError } from './security';

export interface Favorite extends Station {
  id: string;
  position: number;
  createdAt: number;
  updatedAt: number;
}

export type FavoriteDirection = 'next' | 'prev';

interface FavoriteRow {
  id: string;
  position: number;
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
  createdAt: number;
  updatedAt: number;
}

const FAVORITES_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS favorites (
    id TEXT PRIMARY KEY,
    position INTEGER NOT NULL,
    name TEXT NOT NULL,
    url TEXT NOT NULL UNIQUE,
    country TEXT NOT NULL DEFAULT 'Unknown',
    countryCode TEXT NOT NULL DEFAULT '',
    state TEXT NOT NULL DEFAULT '',
    language TEXT NOT NULL DEFAULT 'Unknown',
    tags TEXT NOT NULL DEFAULT '',
    favicon TEXT NOT NULL DEFAULT '',
    bitrate INTEGER NOT NULL DEFAULT 0,
    codec TEXT NOT NULL DEFAULT 'Unknown',
    geoLat REAL,
    geoLong REAL,
    location TEXT NOT NULL DEFAULT 'Unknown',
    createdAt INTEGER NOT NULL,
    updatedAt INTEGER NOT NULL
  )
`;

export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(FAVORITES_TABLE_SQL);
  db.exec('CREATE INDEX IF NOT EXISTS idx_favorites_position ON favorites (position)');
  return db;
}

export class FavoritesStore {
  private readonly insertStmt: Database.Statement<[Favorite]>;
  private readonly getStmt: Database.Statement<[string], FavoriteRow>;
  private readonly getByUrlStmt: Database.Statement<[string], { id: string }>;
  private readonly listStmt: Database.Statement<[], FavoriteRow>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly maxPositionStmt: Database.Statement<[], { maxPosition: number | null }>;

  constructor(private readonly db: Database.Database) {
    this.insertStmt = db.prepare<[Favorite]>(`
      INSERT INTO favorites (
        id, position, name, url, country, countryCode, state, language, tags, favicon,
        bitrate, codec, geoLat, geoLong, location, createdAt, updatedAt
      ) VALUES (
        @id, @position, @name, @url, @country, @countryCode, @state, @language, @tags, @favicon,
        @bitrate, @codec, @geoLat, @geoLong, @location, @createdAt, @updatedAt
      )
    `);
    this.getStmt = db.prepare<[string], FavoriteRow>('SELECT * FROM favorites WHERE id = ?');
    this.getByUrlStmt = db.prepare<[string], { id: string }>('SELECT id FROM favorites WHERE url = ?');
    this.listStmt = db.prepare<[], FavoriteRow>('SELECT * FROM favorites ORDER BY position ASC');
    this.deleteStmt = db.prepare<[string]>('DELETE FROM favorites WHERE id = ?');
    this.maxPositionStmt = db.prepare<[], { maxPosition: number | null }>(
      'SELECT MAX(position) AS maxPosition FROM favorites'
    );
  }

  addFavorite(station: Station): Favorite {
    const add = this.db.transaction((input: Station): Favorite => {
      if (this.getByUrlStmt.get(input.url)) {
        throw new UserInputError('Station already in favorites.', 409);
      }

      const maxPosition = this.maxPositionStmt.get()?.maxPosition ?? null;
      const now = Date.now();
      const record: Favorite = {
        ...input,
        id: crypto.randomUUID(),
        position: (maxPosition ?? -1) + 1,
        createdAt: now,
        updatedAt: now
      };

      this.insertStmt.run(record);
      return record;
    });

    return add(station);
  }

  getFavorite(id: string): Favorite | null {
    return this.getStmt.get(id) ?? null;
  }

  listFavorites(): Favorite[] {
    return this.listStmt.all();
  }

  removeFavorite(id: string): boolean {
    const result = this.deleteStmt.run(id);
    return result.changes > 0;
  }

  /**
   * Steps through favorites with wrap-around. Without a current id, `next`
   * starts at the first favorite and `prev` at the last.
   */
  adjacentFavorite(currentId: string | null, direction: FavoriteDirection): Favorite | null {
    const favorites = this.listFavorites();
    if (favorites.length === 0) {
      return null;
    }

    const currentIndex = currentId ? favorites.findIndex((favorite) => favorite.id === currentId) : -1;
    const step = direction === 'next' ? 1 : -1;
    const start = currentIndex < 0 ? (direction === 'next' ? -1 : favorites.length) : currentIndex;
    const index = (((start + step) % favorites.length) + favorites.length) % favorites.length;
    return favorites[index];
  }

  close(): void {
    this.db.close();
  }
}

export function createFavoritesStore(dbPath: string): FavoritesStore {
  return new FavoritesStore(openDatabase(dbPath));
}
