// Database client (drizzle-orm + better-sqlite3)
import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close: () => void;
}

// Pass ':memory:' for an in-process database
export function openDatabase(filename: string): DatabaseHandle {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const sqlite = new Database(filename);
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(schema.INTERACTIONS_DDL);

  const db = drizzle(sqlite, { schema });

  return {
    db,
    close: () => {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
}
