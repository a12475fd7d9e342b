import oracledb from 'oracledb';

import type { ConnectionConfig } from '../config';
import type { QueryRunner } from '../discovery/types';
import { connecting, toRows } from './shared';

export function oracleConnectString(config: ConnectionConfig): string {
  const port = config.port ?? 1521;
  if (config.serviceName) return `${config.host}:${port}/${config.serviceName}`;
  return `(DESCRIPTION=(ADDRESS=(PROTOCOL=TCP)(HOST=${config.host})(PORT=${port}))(CONNECT_DATA=(SID=${config.sid ?? ''})))`;
}

export async function openOracle(config: ConnectionConfig): Promise<QueryRunner> {
  // thin mode: no Instant Client needed
  const connection = await connecting('oracle', () =>
    oracledb.getConnection({
      user: config.user,
      password: config.password,
      connectString: oracleConnectString(config),
    }),
  );

  return {
    dialect: 'oracle',
    async query(sql, params = []) {
      const result = await connection.execute(sql, [...params], { outFormat: oracledb.OUT_FORMAT_OBJECT });
      return toRows(result.rows);
    },
    close: () => connection.close(),
  };
}
