import { Connection, Request, TYPES } from 'tedious';
import { z } from 'zod';

import type { ConnectionConfig } from '../config';
import type { QueryRunner, Row } from '../discovery/types';
import { connecting } from './shared';

type TediousConfiguration = ConstructorParameters<typeof Connection>[0];

const rowColumns = z.array(
  z.object({
    metadata: z.object({ colName: z.string() }),
    value: z.unknown(),
  }),
);

export interface AdoSettings {
  server?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
  trusted: boolean;
}

/** Reads an ADO.NET-style `Server=host,1433;Database=db;User Id=...;Password=...` string. */
export function parseAdoConnectionString(value: string): AdoSettings {
  const settings: AdoSettings = { trusted: false };
  for (const part of value.split(';')) {
    const separator = part.indexOf('=');
    if (separator < 0) continue;
    const key = part.slice(0, separator).trim().toLowerCase().replace(/\s+/g, ' ');
    const setting = part.slice(separator + 1).trim();
    switch (key) {
      case 'server':
      case 'data source':
      case 'address': {
        const [host = '', port] = setting.replace(/^tcp:/i, '').split(',');
        settings.server = host.trim();
        if (port) settings.port = Number(port.trim());
        break;
      }
      case 'database':
      case 'initial catalog':
        settings.database = setting;
        break;
      case 'user id':
      case 'uid':
      case 'user':
        settings.user = setting;
        break;
      case 'password':
      case 'pwd':
        settings.password = setting;
        break;
      case 'trusted_connection':
      case 'integrated security':
        settings.trusted = ['true', 'yes', 'sspi'].includes(setting.toLowerCase());
        break;
    }
  }
  return settings;
}

function authentication(user: string | undefined, password: string | undefined, trusted: boolean) {
  if (trusted) {
    // tedious has no SSPI; Windows accounts go through NTLM as DOMAIN\user
    const [domain = '', userName = ''] = (user ?? '').includes('\\') ? (user ?? '').split('\\') : ['', user ?? ''];
    return { type: 'ntlm' as const, options: { domain, userName, password: password ?? '' } };
  }
  return { type: 'default' as const, options: { userName: user, password } };
}

export function tediousConfiguration(config: ConnectionConfig): TediousConfiguration {
  const ado = config.connectionString ? parseAdoConnectionString(config.connectionString) : undefined;
  const user = ado?.user ?? config.user;
  const password = ado?.password ?? config.password;
  return {
    server: ado?.server ?? config.host,
    authentication: authentication(user, password, ado?.trusted ?? config.trusted),
    options: {
      database: ado?.database ?? config.database,
      port: ado?.port ?? config.port ?? undefined,
      encrypt: true,
      trustServerCertificate: true,
      rowCollectionOnRequestCompletion: false,
    },
  };
}

export async function openMssql(config: ConnectionConfig): Promise<QueryRunner> {
  const connection = new Connection(tediousConfiguration(config));

  await connecting(
    'mssql',
    () =>
      new Promise<void>((resolve, reject) => {
        connection.connect((error) => (error ? reject(error) : resolve()));
      }),
  );

  return {
    dialect: 'mssql',
    query: (sql, params = []) =>
      new Promise<Row[]>((resolve, reject) => {
        const rows: Row[] = [];
        const request = new Request(sql, (error) => (error ? reject(error) : resolve(rows)));
        params.forEach((value, index) => {
          request.addParameter(`p${index + 1}`, TYPES.NVarChar, value == null ? null : String(value));
        });
        request.on('row', (columns: unknown) => {
          const row: Row = {};
          for (const column of rowColumns.parse(columns)) {
            row[column.metadata.colName] = column.value;
          }
          rows.push(row);
        });
        connection.execSql(request);
      }),
    close: () =>
      new Promise<void>((resolve) => {
        connection.once('end', () => resolve());
        connection.close();
      }),
  };
}
