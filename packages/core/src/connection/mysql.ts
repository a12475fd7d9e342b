import mariadb from 'mariadb';

import type { ConnectionConfig } from '../config';
import type { QueryRunner } from '../discovery/types';
import { connecting, toRows } from './shared';

/** The MariaDB connector only accepts its own URL scheme. */
export function toConnectorUrl(connectionString: string): string {
  return connectionString.replace(/^mysql:\/\//i, 'mariadb://');
}

export async function openMysql(config: ConnectionConfig): Promise<QueryRunner> {
  const connection = await connecting('mysql', () =>
    config.connectionString
      ? mariadb.createConnection(toConnectorUrl(config.connectionString))
      : mariadb.createConnection({
          host: config.host,
          port: config.port ?? undefined,
          database: config.database,
          user: config.user,
          password: config.password,
        }),
  );

  return {
    dialect: 'mysql',
    async query(sql, params = []) {
      const result: unknown = await connection.query(sql, [...params]);
      return toRows(result);
    },
    close: () => connection.end(),
  };
}
