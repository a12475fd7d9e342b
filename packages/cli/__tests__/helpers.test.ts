import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import chalk from 'chalk';
import { afterEach, describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  ConnectionError,
  ExtractionError,
  FilterConflictError,
  createDialectRegistry,
} from '@dbatlas/core';

import {
  formatError,
  parseCliOptions,
  parseList,
  renderDialectTable,
  sanitizeDatabaseName,
  toConnectionInput,
  toSelectionInput,
  writeDocuments,
} from '../src/utils';

chalk.level = 0;

describe('option parsing', () => {
  it('fills in defaults', () => {
    expect(parseCliOptions({ dbType: 'postgres' })).toEqual({
      dbType: 'postgres',
      trusted: false,
      output: './schema_docs',
      verbose: 0,
      dryRun: false,
    });
  });

  it('rejects unknown database types', () => {
    expect(() => parseCliOptions({ dbType: 'db2' })).toThrow(ConfigurationError);
    expect(() => parseCliOptions({ dbType: 'db2' })).toThrow(/^Invalid options: --dbType: /);
  });

  it('splits comma lists', () => {
    expect(parseList('sales, hr,,')).toEqual(['sales', 'hr']);
    expect(parseList(' , ')).toBeUndefined();
    expect(parseList(undefined)).toBeUndefined();
  });

  it('maps flags to a connection input', () => {
    const options = parseCliOptions({
      dbType: 'postgres',
      host: 'db.local',
      port: '5433',
      database: 'shop',
      username: 'app',
      password: 'test-secret',
    });
    expect(toConnectionInput(options)).toEqual({
      dialect: 'postgres',
      host: 'db.local',
      port: 5433,
      database: 'shop',
      user: 'app',
      password: 'test-secret',
      trusted: false,
    });
  });

  it('uses the database flag as the sqlite path', () => {
    const input = toConnectionInput(parseCliOptions({ dbType: 'sqlite', database: './data/app.db' }));
    expect(input.path).toBe('./data/app.db');
    expect(input.port).toBeUndefined();
  });

  it('maps filter flags to a selection', () => {
    const options = parseCliOptions({ dbType: 'mssql', schemas: 'dbo,sales', objectTypes: 'tables' });
    expect(toSelectionInput(options)).toEqual({ schemas: ['dbo', 'sales'], objectTypes: ['tables'] });
  });
});

describe('output', () => {
  let directory: string | undefined;

  afterEach(() => {
    if (directory) fs.rmSync(directory, { recursive: true, force: true });
    directory = undefined;
  });

  it('sanitizes database names for directories', () => {
    expect(sanitizeDatabaseName('shop db')).toBe('shop_db');
    expect(sanitizeDatabaseName('..')).toBe('database');
    expect(sanitizeDatabaseName('C:/data/app.db')).toBe('C_data_app.db');
  });

  it('writes documents under nested folders', () => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'dbatlas-cli-'));
    const written = writeDocuments(directory, [
      { path: 'README.md', content: '# shop\n' },
      { path: 'tables/public.orders.md', content: '# orders\n' },
    ]);
    expect(written).toEqual([path.join(directory, 'README.md'), path.join(directory, 'tables', 'public.orders.md')]);
    expect(fs.readFileSync(path.join(directory, 'tables', 'public.orders.md'), 'utf-8')).toBe('# orders\n');
  });

  it('prefixes errors by kind', () => {
    expect(formatError(new FilterConflictError(['sales']))).toBe(
      'Filter conflict: Schemas both included and excluded: sales',
    );
    expect(formatError(new ConfigurationError('port must be a number'))).toBe(
      'Configuration error: port must be a number',
    );
    expect(formatError(new ConnectionError('mysql', new Error('timeout')))).toBe(
      'Connection failed: Could not connect to mysql: timeout',
    );
    expect(formatError(new ExtractionError('no tables'))).toBe('Extraction failed: no tables');
    expect(formatError('boom')).toBe('Unexpected error: boom');
  });

  it('lists dialects with their unsupported capabilities', () => {
    expect(renderDialectTable(createDialectRegistry()).split('\n')).toEqual([
      'mssql  Microsoft SQL Server (port 1433)',
      '  not applicable: none',
      'postgres  PostgreSQL (port 5432)',
      '  not applicable: synonyms',
      'mysql  MySQL / MariaDB (port 3306)',
      '  not applicable: types, sequences, synonyms',
      'oracle  Oracle Database (port 1521)',
      '  not applicable: none',
      'sqlite  SQLite',
      '  not applicable: routines, types, sequences, synonyms, security',
    ]);
  });
});
