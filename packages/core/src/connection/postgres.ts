import { Client } from 'pg';

import type { ConnectionConfig } from '../config';
import type { QueryRunner, Row } from '../discovery/types';
import { connecting } from './shared';

export async function openPostgres(config: ConnectionConfig): Promise<QueryRunner> {
  const client = config.connectionString
    ? new Client({ connectionString: config.connectionString })
    : new Client({
        host: config.host,
        port: config.port ?? undefined,
        database: config.database,
        user: config.user,
        password: config.password,
      });

  await connecting('postgres', () => client.connect());

  return {
    dialect: 'postgres',
    async query(sql, params = []) {
      const result = await client.query<Row>(sql, [...params]);
      return result.rows;
    },
    close: () => client.end(),
  };
}
