import type { ConnectionConfig } from '../config';
import type { QueryRunner } from '../discovery/types';
import { openMssql } from './mssql';
import { openMysql } from './mysql';
import { openOracle } from './oracle';
import { openPostgres } from './postgres';
import { openSqlite } from './sqlite';

/** Opens one connection for the configured engine; failures surface as `ConnectionError`. */
export function openConnection(config: ConnectionConfig): Promise<QueryRunner> {
  switch (config.dialect) {
    case 'postgres':
      return openPostgres(config);
    case 'mysql':
      return openMysql(config);
    case 'mssql':
      return openMssql(config);
    case 'oracle':
      return openOracle(config);
    case 'sqlite':
      return openSqlite(config);
  }
}

export { parseAdoConnectionString } from './mssql';
export { toConnectorUrl } from './mysql';
export { oracleConnectString } from './oracle';
