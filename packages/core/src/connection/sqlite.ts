import sqlite3 from 'sqlite3';

import type { ConnectionConfig } from '../config';
import type { QueryRunner } from '../discovery/types';
import { connecting, toRows } from './shared';

function openReadOnly(path: string): Promise<sqlite3.Database> {
  return new Promise((resolve, reject) => {
    const db = new sqlite3.Database(path, sqlite3.OPEN_READONLY, (err) => {
      if (err) reject(err);
      else resolve(db);
    });
  });
}

export async function openSqlite(config: ConnectionConfig): Promise<QueryRunner> {
  const path = config.path ?? config.database;
  const db = await connecting('sqlite', () => openReadOnly(path));

  return {
    dialect: 'sqlite',
    query(sql, params = []) {
      return new Promise((resolve, reject) => {
        db.all(sql, [...params], (err, rows: unknown[]) => {
          if (err) reject(err);
          else resolve(toRows(rows));
        });
      });
    },
    close() {
      return new Promise((resolve, reject) => {
        db.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}
