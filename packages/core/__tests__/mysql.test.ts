import { beforeAll, describe, expect, it } from 'vitest';

import { accountName } from '../src/discovery/mysql';
import { createDialectRegistry } from '../src/discovery/registry';
import type { Row } from '../src/discovery/types';
import { extract } from '../src/extract';
import { outgoingEdges } from '../src/graph';
import { identifier } from '../src/normalize';
import type { Column, SchemaSnapshot, Table } from '../src/types';
import { fakeRunner } from './helpers/fakeRunner';

function column(table: string, name: string, ordinal: number, dataType: string, columnType: string, extra: Row = {}) {
  return {
    schema_name: 'shop',
    table_name: table,
    column_name: name,
    ordinal,
    data_type: dataType,
    column_type: columnType,
    char_length: null,
    numeric_precision: null,
    numeric_scale: null,
    is_nullable: 0,
    column_default: null,
    extra: '',
    generation_expression: '',
    collation_name: null,
    description: '',
    ...extra,
  };
}

const routes: Record<string, Row[]> = {
  version: [{ version: '8.0.36' }],
  Schemas: [{ schema_name: 'shop' }],
  Tables: [
    { schema_name: 'shop', table_name: 'customers', row_count: 3n, size_kb: 32, description: '' },
    { schema_name: 'shop', table_name: 'orders', row_count: 0, size_kb: 16, description: 'Placed orders' },
  ],
  'Column metadata': [
    column('customers', 'id', 1, 'int', 'int(11)', { numeric_precision: 10, numeric_scale: 0, extra: 'auto_increment' }),
    column('customers', 'email', 2, 'varchar', 'varchar(120)', { char_length: 120 }),
    column('orders', 'id', 1, 'bigint', 'bigint(20)', { extra: 'auto_increment' }),
    column('orders', 'customer_id', 2, 'int', 'int(11)', { is_nullable: 1 }),
    column('orders', 'is_paid', 3, 'tinyint', 'tinyint(1)', { column_default: '0' }),
    column('orders', 'total', 4, 'decimal', 'decimal(10,2)', { numeric_precision: 10, numeric_scale: 2 }),
    column('open_orders', 'id', 1, 'bigint', 'bigint(20)'),
  ],
  'Primary key columns': [
    { schema_name: 'shop', table_name: 'customers', constraint_name: 'PRIMARY', column_name: 'id' },
    { schema_name: 'shop', table_name: 'orders', constraint_name: 'PRIMARY', column_name: 'id' },
  ],
  'Unique constraints': [
    { schema_name: 'shop', table_name: 'customers', constraint_name: 'uq_customers_email', column_name: 'email' },
  ],
  'Foreign key metadata': [
    {
      schema_name: 'shop',
      table_name: 'orders',
      constraint_name: 'fk_orders_customer',
      column_name: 'customer_id',
      referenced_schema: 'shop',
      referenced_table: 'customers',
      referenced_column: 'id',
      delete_rule: 'SET NULL',
      update_rule: 'CASCADE',
    },
  ],
  'Check constraints': [
    { schema_name: 'shop', table_name: 'orders', constraint_name: 'chk_total', check_clause: '(`total` >= 0)' },
  ],
  'Index definitions': [
    { schema_name: 'shop', table_name: 'customers', index_name: 'PRIMARY', non_unique: 0, index_type: 'BTREE', column_name: 'id' },
    {
      schema_name: 'shop',
      table_name: 'customers',
      index_name: 'uq_customers_email',
      non_unique: 0,
      index_type: 'BTREE',
      column_name: 'email',
    },
    {
      schema_name: 'shop',
      table_name: 'orders',
      index_name: 'idx_orders_total',
      non_unique: 1,
      index_type: 'BTREE',
      column_name: null,
    },
  ],
  'View definitions': [
    { schema_name: 'shop', view_name: 'open_orders', definition: 'select `shop`.`orders`.`id` AS `id` from `shop`.`orders`' },
  ],
  'Routine source code': [
    {
      schema_name: 'shop',
      specific_name: 'archive_orders',
      routine_name: 'archive_orders',
      routine_type: 'PROCEDURE',
      data_type: '',
      return_type: null,
      language: 'SQL',
      definition: 'BEGIN DELETE FROM orders WHERE is_paid = 1; END',
      description: '',
    },
    {
      schema_name: 'shop',
      specific_name: 'order_count',
      routine_name: 'order_count',
      routine_type: 'FUNCTION',
      data_type: 'int',
      return_type: 'int(11)',
      language: 'SQL',
      definition: 'RETURN (SELECT COUNT(*) FROM orders WHERE customer_id = p_customer)',
      description: 'Orders per customer',
    },
  ],
  'Routine parameters': [
    {
      schema_name: 'shop',
      specific_name: 'archive_orders',
      ordinal: 1,
      parameter_name: 'p_before',
      parameter_mode: 'IN',
      data_type: 'date',
      display_type: 'date',
    },
    {
      schema_name: 'shop',
      specific_name: 'archive_orders',
      ordinal: 2,
      parameter_name: 'p_count',
      parameter_mode: 'OUT',
      data_type: 'int',
      display_type: 'int(11)',
    },
    {
      schema_name: 'shop',
      specific_name: 'order_count',
      ordinal: 1,
      parameter_name: 'p_customer',
      parameter_mode: null,
      data_type: 'int',
      display_type: 'int(11)',
    },
  ],
  'Trigger metadata': [
    {
      schema_name: 'shop',
      trigger_name: 'trg_orders_bi',
      table_schema: 'shop',
      table_name: 'orders',
      action_timing: 'BEFORE',
      event_manipulation: 'INSERT',
      definition: 'SET NEW.total = GREATEST(NEW.total, 0)',
    },
  ],
  Accounts: [
    { user_name: 'readers', host_name: '%', is_locked: 1 },
    { user_name: 'report', host_name: '%', is_locked: 0 },
  ],
  'Role grants': [{ role_name: 'readers', role_host: '%', member_name: 'report', member_host: '%' }],
  'Object privileges': [
    { grantee: "'readers'@'%'", schema_name: 'shop', object_name: 'orders', privilege: 'SELECT', is_grantable: 0 },
  ],
};

async function extractShop(dialect: 'mysql' | 'postgres', rows: Record<string, Row[]>) {
  return extract({ runner: fakeRunner(dialect, rows), database: 'shop' }, { dialects: createDialectRegistry() });
}

describe('accountName', () => {
  it('strips quoting from grantee names', () => {
    expect(accountName("'app'@'%'")).toBe('app@%');
    expect(accountName('`app`@`localhost`')).toBe('app@localhost');
  });
});

describe('mysql extraction', () => {
  let snapshot: SchemaSnapshot;

  beforeAll(async () => {
    snapshot = await extractShop('mysql', routes);
  });

  function tableOf(name: string) {
    return snapshot.schemas[0]?.tables.find((table) => table.id.name === name);
  }

  it('marks object kinds MySQL does not have', () => {
    expect(snapshot.engineVersion).toBe('8.0.36');
    expect(snapshot.availability.types).toBe('not-applicable');
    expect(snapshot.availability.sequences).toBe('not-applicable');
    expect(snapshot.availability.synonyms).toBe('not-applicable');
    expect(snapshot.warnings).toEqual([]);
  });

  it('reads table statistics and blank comments', () => {
    expect(tableOf('customers')).toMatchObject({ rowCount: '3', sizeKb: '32', description: null });
    expect(tableOf('orders')).toMatchObject({ rowCount: '0', sizeKb: '16', description: 'Placed orders' });
  });

  it('normalizes MySQL column types', () => {
    expect(tableOf('orders')?.columns.map((item) => [item.name, item.dataType])).toEqual([
      ['id', { normalized: 'integer', native: 'bigint(20)' }],
      ['customer_id', { normalized: 'integer', native: 'int(11)' }],
      ['is_paid', { normalized: 'boolean', native: 'tinyint(1)' }],
      ['total', { normalized: 'decimal', native: 'decimal(10,2)', precision: 10, scale: 2 }],
    ]);
    expect(tableOf('orders')?.columns[0]?.autoIncrement).toBe(true);
    expect(tableOf('orders')?.columns[2]?.default).toBe('0');
  });

  it('folds per-column key rows into constraints', () => {
    const customers = tableOf('customers');
    expect(customers?.primaryKey).toEqual({ name: 'PRIMARY', columns: ['id'], clustered: null });
    expect(customers?.uniqueConstraints).toEqual([{ name: 'uq_customers_email', columns: ['email'] }]);
    expect(customers?.indexes.map((index) => [index.name, index.primary, index.unique, index.columns])).toEqual([
      ['PRIMARY', true, true, ['id']],
      ['uq_customers_email', false, true, ['email']],
    ]);
    expect(tableOf('orders')?.indexes[0]).toMatchObject({
      name: 'idx_orders_total',
      unique: false,
      columns: [],
      expressions: ['expression'],
      method: 'BTREE',
    });
    expect(tableOf('orders')?.checks).toEqual([{ name: 'chk_total', expression: '(`total` >= 0)' }]);
  });

  it('reads referential rules', () => {
    expect(outgoingEdges(snapshot.graph, identifier('shop', 'orders'))).toEqual([
      {
        kind: 'foreign-key',
        source: identifier('shop', 'orders'),
        target: identifier('shop', 'customers'),
        via: 'fk_orders_customer',
        columns: ['customer_id'],
        targetColumns: ['id'],
        onDelete: 'SET_NULL',
        onUpdate: 'CASCADE',
        resolved: true,
        targetType: 'tables',
      },
    ]);
  });

  it('reads views without dependency information', () => {
    expect(snapshot.schemas[0]?.views).toEqual([
      {
        id: identifier('shop', 'open_orders'),
        columns: [{ name: 'id', dataType: { normalized: 'integer', native: 'bigint(20)' }, nullable: false, description: null }],
        definition: 'select `shop`.`orders`.`id` AS `id` from `shop`.`orders`',
        baseTables: [],
        materialized: false,
        description: null,
      },
    ]);
  });

  it('reads routines and their parameters', () => {
    const [procedure] = snapshot.schemas[0]?.procedures ?? [];
    expect(procedure?.returns).toBeNull();
    expect(procedure?.parameters.map((parameter) => [parameter.name, parameter.direction])).toEqual([
      ['p_before', 'IN'],
      ['p_count', 'OUT'],
    ]);

    const [fn] = snapshot.schemas[0]?.functions ?? [];
    expect(fn).toEqual({
      id: identifier('shop', 'order_count'),
      kind: 'function',
      parameters: [
        { name: 'p_customer', dataType: { normalized: 'integer', native: 'int(11)' }, direction: 'IN', default: null },
      ],
      returns: { kind: 'scalar', dataType: { normalized: 'integer', native: 'int(11)' } },
      language: 'SQL',
      definition: 'RETURN (SELECT COUNT(*) FROM orders WHERE customer_id = p_customer)',
      description: 'Orders per customer',
    });
  });

  it('reads triggers', () => {
    expect(snapshot.schemas[0]?.triggers[0]).toMatchObject({
      table: identifier('shop', 'orders'),
      timing: 'BEFORE',
      events: ['INSERT'],
      enabled: true,
    });
    expect(tableOf('orders')?.triggers).toEqual([identifier('shop', 'trg_orders_bi')]);
  });

  it('names accounts as user@host and treats locked accounts as roles', () => {
    expect(snapshot.security).toEqual([
      {
        kind: 'ROLE',
        name: 'readers@%',
        permissions: [{ privilege: 'SELECT', object: identifier('shop', 'orders'), state: 'GRANT' }],
        memberOf: [],
      },
      { kind: 'USER', name: 'report@%', permissions: [], memberOf: ['readers@%'] },
    ]);
  });
});

describe('cross-dialect normalization', () => {
  const mysqlRoutes: Record<string, Row[]> = {
    Schemas: [{ schema_name: 'shop' }],
    Tables: [{ schema_name: 'shop', table_name: 'customers', row_count: 3, size_kb: 32, description: '' }],
    'Column metadata': [
      column('customers', 'id', 1, 'int', 'int(11)', { numeric_precision: 10, numeric_scale: 0, extra: 'auto_increment' }),
      column('customers', 'email', 2, 'varchar', 'varchar(120)', { char_length: 120 }),
      column('customers', 'last_name', 3, 'varchar', 'varchar(60)', { char_length: 60 }),
      column('customers', 'first_name', 4, 'varchar', 'varchar(60)', { char_length: 60 }),
    ],
    'Primary key columns': [{ schema_name: 'shop', table_name: 'customers', constraint_name: 'PRIMARY', column_name: 'id' }],
    'Unique constraints': [
      { schema_name: 'shop', table_name: 'customers', constraint_name: 'uq_customers_email', column_name: 'email' },
    ],
    'Index definitions': [
      { schema_name: 'shop', table_name: 'customers', index_name: 'PRIMARY', non_unique: 0, index_type: 'BTREE', column_name: 'id' },
      {
        schema_name: 'shop',
        table_name: 'customers',
        index_name: 'ix_customers_name',
        non_unique: 1,
        index_type: 'BTREE',
        column_name: 'last_name',
      },
      {
        schema_name: 'shop',
        table_name: 'customers',
        index_name: 'ix_customers_name',
        non_unique: 1,
        index_type: 'BTREE',
        column_name: 'first_name',
      },
      {
        schema_name: 'shop',
        table_name: 'customers',
        index_name: 'uq_customers_email',
        non_unique: 0,
        index_type: 'BTREE',
        column_name: 'email',
      },
    ],
  };

  function pgColumn(name: string, ordinal: number, extra: Row) {
    return { schema_name: 'shop', table_name: 'customers', column_name: name, ordinal, type_kind: 'b', is_nullable: false, ...extra };
  }

  function pgIndex(name: string, column: string, flags: { unique: boolean; primary: boolean }) {
    return {
      schema_name: 'shop',
      table_name: 'customers',
      index_name: name,
      is_unique: flags.unique,
      is_primary: flags.primary,
      index_method: 'btree',
      is_included: false,
      column_name: column,
    };
  }

  const varchar60 = { type_name: 'character varying', display_type: 'character varying(60)', char_length: 60 };

  const postgresRoutes: Record<string, Row[]> = {
    Schemas: [{ schema_name: 'shop' }],
    Tables: [{ schema_name: 'shop', table_name: 'customers', row_count: 3, size_kb: 32, description: null }],
    'Column metadata': [
      pgColumn('id', 1, { type_name: 'integer', display_type: 'integer', identity_generation: 'BY DEFAULT' }),
      pgColumn('email', 2, { type_name: 'character varying', display_type: 'character varying(120)', char_length: 120 }),
      pgColumn('last_name', 3, varchar60),
      pgColumn('first_name', 4, varchar60),
    ],
    'Primary key columns': [{ schema_name: 'shop', table_name: 'customers', constraint_name: 'customers_pkey', columns: ['id'] }],
    'Unique constraints': [
      { schema_name: 'shop', table_name: 'customers', constraint_name: 'uq_customers_email', columns: ['email'] },
    ],
    'Index definitions': [
      pgIndex('customers_pkey', 'id', { unique: true, primary: true }),
      pgIndex('ix_customers_name', 'last_name', { unique: false, primary: false }),
      pgIndex('ix_customers_name', 'first_name', { unique: false, primary: false }),
      pgIndex('uq_customers_email', 'email', { unique: true, primary: false }),
    ],
  };

  function portable(columns: readonly Column[]) {
    return columns.map((item) => ({ ...item, dataType: { ...item.dataType, native: '' }, description: null }));
  }

  function secondaryIndexes(table: Table | undefined) {
    return (table?.indexes ?? []).filter((index) => !index.primary);
  }

  it('describes the same table identically apart from native type text', async () => {
    const [mysql, postgres] = await Promise.all([extractShop('mysql', mysqlRoutes), extractShop('postgres', postgresRoutes)]);
    const fromMysql = mysql.schemas[0]?.tables[0];
    const fromPostgres = postgres.schemas[0]?.tables[0];

    expect(fromMysql?.id).toEqual(fromPostgres?.id);
    expect(portable(fromMysql?.columns ?? [])).toEqual(portable(fromPostgres?.columns ?? []));
    expect(fromMysql?.primaryKey?.columns).toEqual(fromPostgres?.primaryKey?.columns);
    expect(fromMysql?.columns.map((item) => item.dataType.native)).toEqual([
      'int(11)',
      'varchar(120)',
      'varchar(60)',
      'varchar(60)',
    ]);
    expect(fromPostgres?.columns.map((item) => item.dataType.native)).toEqual([
      'integer',
      'character varying(120)',
      'character varying(60)',
      'character varying(60)',
    ]);
  });

  it('reports the same unique constraint and secondary indexes', async () => {
    const [mysql, postgres] = await Promise.all([extractShop('mysql', mysqlRoutes), extractShop('postgres', postgresRoutes)]);
    const fromMysql = mysql.schemas[0]?.tables[0];
    const fromPostgres = postgres.schemas[0]?.tables[0];

    expect(fromMysql?.uniqueConstraints).toEqual([{ name: 'uq_customers_email', columns: ['email'] }]);
    expect(fromPostgres?.uniqueConstraints).toEqual(fromMysql?.uniqueConstraints);
    expect(secondaryIndexes(fromMysql)).toEqual([
      {
        name: 'ix_customers_name',
        unique: false,
        primary: false,
        clustered: null,
        columns: ['last_name', 'first_name'],
        expressions: [],
        includedColumns: [],
        method: 'BTREE',
        filter: null,
      },
      {
        name: 'uq_customers_email',
        unique: true,
        primary: false,
        clustered: null,
        columns: ['email'],
        expressions: [],
        includedColumns: [],
        method: 'BTREE',
        filter: null,
      },
    ]);
    expect(secondaryIndexes(fromPostgres)).toEqual(secondaryIndexes(fromMysql));
  });
});
