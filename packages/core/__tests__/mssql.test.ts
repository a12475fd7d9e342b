import { beforeAll, describe, expect, it } from 'vitest';

import { parseBaseObject } from '../src/discovery/mssql';
import { createDialectRegistry } from '../src/discovery/registry';
import type { Row } from '../src/discovery/types';
import { extract } from '../src/extract';
import { incomingEdges, outgoingEdges } from '../src/graph';
import { identifier } from '../src/normalize';
import type { SchemaSnapshot } from '../src/types';
import { fakeRunner } from './helpers/fakeRunner';

interface TypeInfo {
  type_name: string;
  system_type?: string;
  is_user_defined?: number;
  max_length?: number;
  precision?: number;
  scale?: number;
}

function typed(info: TypeInfo) {
  return {
    system_type: info.type_name,
    is_user_defined: 0,
    max_length: null,
    precision: 0,
    scale: 0,
    ...info,
  };
}

function column(schema: string, table: string, name: string, ordinal: number, type: TypeInfo, extra: Row = {}) {
  return {
    schema_name: schema,
    table_name: table,
    column_name: name,
    ordinal,
    ...typed(type),
    is_nullable: 0,
    column_default: null,
    is_identity: 0,
    identity_seed: null,
    identity_increment: null,
    computed_definition: null,
    collation_name: null,
    description: null,
    ...extra,
  };
}

function parameter(routine: string, id: number, name: string, type: TypeInfo, extra: Row = {}) {
  const [schema_name, routine_name] = routine.split('.');
  return {
    schema_name,
    routine_name,
    parameter_id: id,
    parameter_name: name,
    ...typed(type),
    is_output: 0,
    default_value: null,
    ...extra,
  };
}

const INT = { type_name: 'int', max_length: 4, precision: 10 };
const MONEY = { type_name: 'money', max_length: 8, precision: 19, scale: 4 };

const routes: Record<string, Row[]> = {
  version: [{ version: 'Microsoft SQL Server 2022 (RTM) - 16.0.1000.6 (X64)' }],
  Schemas: [{ schema_name: 'dbo' }, { schema_name: 'sales' }],
  Tables: [
    { schema_name: 'dbo', table_name: 'customers', row_count: 5, size_kb: 72, description: 'Customer master' },
    { schema_name: 'sales', table_name: 'orders', row_count: '12', size_kb: null, description: null },
  ],
  'Column metadata': [
    column('dbo', 'customers', 'id', 1, INT, { is_identity: 1, identity_seed: '1', identity_increment: '1' }),
    column('dbo', 'customers', 'name', 2, { type_name: 'nvarchar', max_length: 200 }),
    column('dbo', 'customers', 'notes', 3, { type_name: 'nvarchar', max_length: -1 }, { is_nullable: 1 }),
    column('dbo', 'customers', 'email', 4, {
      type_name: 'EmailAddress',
      system_type: 'varchar',
      is_user_defined: 1,
      max_length: 200,
    }),
    column('sales', 'orders', 'id', 1, INT, { is_identity: 1, identity_seed: '1000', identity_increment: '1' }),
    column('sales', 'orders', 'customer_id', 2, INT),
    column('sales', 'orders', 'total', 3, MONEY, { column_default: '((0))' }),
    column('sales', 'orders', 'placed_at', 4, { type_name: 'datetime2', max_length: 7, precision: 23, scale: 3 }),
    column(
      'sales',
      'orders',
      'tax',
      5,
      { type_name: 'decimal', max_length: 9, precision: 10, scale: 2 },
      { is_nullable: 1, computed_definition: '([total]*(0.2))' },
    ),
    column('sales', 'v_orders', 'id', 1, INT),
  ],
  'Primary key columns': [
    { schema_name: 'dbo', table_name: 'customers', constraint_name: 'PK_customers', index_type: 'CLUSTERED', column_name: 'id' },
    { schema_name: 'sales', table_name: 'orders', constraint_name: 'PK_orders', index_type: 'NONCLUSTERED', column_name: 'id' },
  ],
  'Unique constraints': [
    {
      schema_name: 'dbo',
      table_name: 'customers',
      constraint_name: 'UQ_customers_email',
      index_type: 'NONCLUSTERED',
      column_name: 'email',
    },
  ],
  'Foreign key metadata': [
    {
      schema_name: 'sales',
      table_name: 'orders',
      constraint_name: 'FK_orders_customers',
      column_name: 'customer_id',
      referenced_schema: 'dbo',
      referenced_table: 'customers',
      referenced_column: 'id',
      delete_action: 'NO_ACTION',
      update_action: 'CASCADE',
    },
  ],
  'Check constraints': [
    { schema_name: 'sales', table_name: 'orders', constraint_name: 'CK_orders_total', definition: '([total]>=(0))' },
  ],
  'Index definitions': [
    {
      schema_name: 'sales',
      table_name: 'orders',
      index_name: 'IX_orders_customer',
      is_unique: 0,
      is_primary: 0,
      is_clustered: 0,
      index_type: 'NONCLUSTERED',
      filter_definition: '([total]>(0))',
      is_included: 0,
      column_name: 'customer_id',
    },
    {
      schema_name: 'sales',
      table_name: 'orders',
      index_name: 'IX_orders_customer',
      is_unique: 0,
      is_primary: 0,
      is_clustered: 0,
      index_type: 'NONCLUSTERED',
      filter_definition: '([total]>(0))',
      is_included: 1,
      column_name: 'total',
    },
  ],
  'View definitions': [
    {
      schema_name: 'sales',
      view_name: 'v_orders',
      is_indexed: 0,
      definition: 'CREATE VIEW sales.v_orders AS SELECT id FROM sales.orders',
      description: null,
    },
  ],
  'View dependencies': [{ view_schema: 'sales', view_name: 'v_orders', table_schema: 'sales', table_name: 'orders' }],
  'Routine source code': [
    { schema_name: 'dbo', routine_name: 'clr_hash', object_type: 'FS', definition: null, description: null },
    {
      schema_name: 'dbo',
      routine_name: 'fn_customer_orders',
      object_type: 'IF',
      definition: 'CREATE FUNCTION dbo.fn_customer_orders(@customer_id int) RETURNS TABLE AS RETURN (SELECT id, total FROM sales.orders)',
      description: null,
    },
    {
      schema_name: 'dbo',
      routine_name: 'fn_order_total',
      object_type: 'FN',
      definition: 'CREATE FUNCTION dbo.fn_order_total(@order_id int) RETURNS money',
      description: null,
    },
    {
      schema_name: 'sales',
      routine_name: 'usp_close_order',
      object_type: 'P',
      definition: 'CREATE PROCEDURE sales.usp_close_order @order_id int, @closed_count int OUTPUT AS SELECT 1',
      description: 'Closes an order',
    },
  ],
  'Routine parameters': [
    parameter('dbo.clr_hash', 0, '', { type_name: 'varbinary', max_length: 32 }),
    parameter('dbo.clr_hash', 1, '@input', { type_name: 'nvarchar', max_length: -1 }),
    parameter('dbo.fn_customer_orders', 1, '@customer_id', INT),
    parameter('dbo.fn_order_total', 0, '', MONEY),
    parameter('dbo.fn_order_total', 1, '@order_id', INT),
    parameter('sales.usp_close_order', 1, '@order_id', INT),
    parameter('sales.usp_close_order', 2, '@closed_count', INT, { is_output: 1 }),
  ],
  'Table-valued function columns': [
    { schema_name: 'dbo', routine_name: 'fn_customer_orders', column_name: 'id', ...typed(INT), is_nullable: 0 },
    { schema_name: 'dbo', routine_name: 'fn_customer_orders', column_name: 'total', ...typed(MONEY), is_nullable: 1 },
  ],
  'Trigger metadata': [
    {
      schema_name: 'sales',
      trigger_name: 'trg_orders_audit',
      table_name: 'orders',
      is_instead_of: 0,
      is_insert: 0,
      is_update: 1,
      is_delete: 1,
      is_disabled: 1,
      definition: 'CREATE TRIGGER sales.trg_orders_audit ON sales.orders AFTER UPDATE, DELETE AS SELECT 1',
      description: null,
    },
  ],
  'User-defined types': [
    {
      schema_name: 'dbo',
      type_name: 'EmailAddress',
      is_table_type: 0,
      base_type: 'varchar',
      max_length: 200,
      precision: 0,
      scale: 0,
      is_nullable: 1,
      description: null,
    },
    {
      schema_name: 'dbo',
      type_name: 'OrderLines',
      is_table_type: 1,
      base_type: null,
      max_length: -1,
      precision: 0,
      scale: 0,
      is_nullable: 0,
      description: 'Order lines passed to usp_close_order',
    },
  ],
  'Table type columns': [
    { ...typed(INT), schema_name: 'dbo', type_name: 'OrderLines', column_name: 'line_no', member_type: 'int', is_nullable: 0 },
    {
      ...typed({ type_name: 'nvarchar', max_length: 40 }),
      schema_name: 'dbo',
      type_name: 'OrderLines',
      column_name: 'sku',
      member_type: 'nvarchar',
      is_nullable: 1,
    },
  ],
  Sequences: [
    {
      schema_name: 'sales',
      sequence_name: 'order_numbers',
      data_type: 'bigint',
      start_value: '1000',
      increment: '1',
      min_value: '1',
      max_value: '9223372036854775807',
      is_cycling: 0,
      cache_size: null,
      current_value: '1042',
      description: null,
    },
  ],
  Synonyms: [
    { schema_name: 'dbo', synonym_name: 'all_orders', base_object_name: '[sales].[orders]', description: null },
    {
      schema_name: 'dbo',
      synonym_name: 'archived_orders',
      base_object_name: '[archive01].[erp].[sales].[orders]',
      description: null,
    },
    { schema_name: 'dbo', synonym_name: 'clients', base_object_name: '[customers]', description: null },
  ],
  'Database principals': [
    { principal_name: 'app_reader', principal_type: 'S' },
    { principal_name: 'db_datareader', principal_type: 'R ' },
  ],
  'Role memberships': [{ member_name: 'app_reader', role_name: 'db_datareader' }],
  'Object permissions': [
    { grantee: 'app_reader', schema_name: 'sales', object_name: 'orders', permission_name: 'SELECT', state: 'GRANT' },
    { grantee: 'app_reader', schema_name: 'sales', object_name: 'orders', permission_name: 'DELETE', state: 'DENY' },
  ],
};

describe('parseBaseObject', () => {
  it('splits one to four name parts', () => {
    expect(parseBaseObject('[orders]')).toEqual({ server: null, database: null, schema: null, object: 'orders' });
    expect(parseBaseObject('[sales].[orders]')).toEqual({ server: null, database: null, schema: 'sales', object: 'orders' });
    expect(parseBaseObject('erp.sales.orders')).toEqual({ server: null, database: 'erp', schema: 'sales', object: 'orders' });
    expect(parseBaseObject('[srv].[erp].[sales].[orders]')).toEqual({
      server: 'srv',
      database: 'erp',
      schema: 'sales',
      object: 'orders',
    });
  });

  it('splits only on dots outside quoting', () => {
    expect(parseBaseObject('[my.schema].[obj]')).toEqual({ server: null, database: null, schema: 'my.schema', object: 'obj' });
    expect(parseBaseObject('"erp"."sales"."v.1"')).toEqual({ server: null, database: 'erp', schema: 'sales', object: 'v.1' });
    expect(parseBaseObject('[odd]]name]')).toEqual({ server: null, database: null, schema: null, object: 'odd]name' });
  });

  it('leaves omitted parts empty', () => {
    expect(parseBaseObject('[erp]..[orders]')).toEqual({ server: null, database: 'erp', schema: null, object: 'orders' });
  });
});

describe('mssql extraction', () => {
  let snapshot: SchemaSnapshot;

  beforeAll(async () => {
    snapshot = await extract(
      { runner: fakeRunner('mssql', routes), database: 'erp' },
      { dialects: createDialectRegistry() },
    );
  });

  function group(name: string) {
    return snapshot.schemas.find((item) => item.name === name);
  }

  function tableOf(schema: string, name: string) {
    return group(schema)?.tables.find((table) => table.id.name === name);
  }

  it('reads statistics and identity settings', () => {
    expect(tableOf('dbo', 'customers')).toMatchObject({ rowCount: '5', sizeKb: '72', description: 'Customer master' });
    expect(tableOf('sales', 'orders')?.rowCount).toBe('12');
    expect(tableOf('sales', 'orders')?.sizeKb).toBeUndefined();
    expect(tableOf('sales', 'orders')?.columns[0]).toMatchObject({
      autoIncrement: true,
      identitySeed: '1000',
      identityIncrement: '1',
    });
    expect(tableOf('sales', 'orders')?.columns[1]).not.toHaveProperty('identitySeed');
  });

  it('halves nvarchar lengths and keeps alias type names', () => {
    expect(tableOf('dbo', 'customers')?.columns.map((item) => item.dataType)).toEqual([
      { normalized: 'integer', native: 'int' },
      { normalized: 'string', native: 'nvarchar(100)', length: 100 },
      { normalized: 'string', native: 'nvarchar(max)', length: null },
      { normalized: 'string', native: 'EmailAddress', length: 200 },
    ]);
  });

  it('reads money, fractional time and computed columns', () => {
    const [, , total, placedAt, tax] = tableOf('sales', 'orders')?.columns ?? [];
    expect(total?.dataType).toEqual({ normalized: 'decimal', native: 'money', precision: 19, scale: 4 });
    expect(total?.default).toBe('((0))');
    expect(placedAt?.dataType).toEqual({ normalized: 'timestamp', native: 'datetime2(3)' });
    expect(tax).toMatchObject({
      dataType: { normalized: 'decimal', native: 'decimal(10,2)', precision: 10, scale: 2 },
      computed: '([total]*(0.2))',
    });
  });

  it('reads clustering on keys and indexes', () => {
    expect(tableOf('dbo', 'customers')?.primaryKey).toEqual({ name: 'PK_customers', columns: ['id'], clustered: true });
    expect(tableOf('sales', 'orders')?.primaryKey?.clustered).toBe(false);
    expect(tableOf('sales', 'orders')?.indexes).toEqual([
      {
        name: 'IX_orders_customer',
        unique: false,
        primary: false,
        clustered: false,
        columns: ['customer_id'],
        expressions: [],
        includedColumns: ['total'],
        method: 'NONCLUSTERED',
        filter: '([total]>(0))',
      },
    ]);
    expect(tableOf('dbo', 'customers')?.uniqueConstraints).toEqual([{ name: 'UQ_customers_email', columns: ['email'] }]);
  });

  it('links foreign keys and view dependencies', () => {
    expect(outgoingEdges(snapshot.graph, identifier('sales', 'orders'))[0]).toMatchObject({
      via: 'FK_orders_customers',
      target: identifier('dbo', 'customers'),
      onDelete: 'NO_ACTION',
      onUpdate: 'CASCADE',
      resolved: true,
    });
    expect(snapshot.graph.dependencies).toEqual([
      {
        view: identifier('sales', 'v_orders'),
        target: identifier('sales', 'orders'),
        resolved: true,
        targetType: 'tables',
      },
    ]);
  });

  it('classifies routines by object type', () => {
    const dbo = group('dbo');
    expect(dbo?.functions.map((routine) => [routine.id.name, routine.language])).toEqual([
      ['clr_hash', 'CLR'],
      ['fn_customer_orders', 'SQL'],
      ['fn_order_total', 'SQL'],
    ]);
    const [hash, customerOrders, orderTotal] = dbo?.functions ?? [];
    expect(hash?.returns).toEqual({ kind: 'scalar', dataType: { normalized: 'binary', native: 'varbinary(32)', length: 32 } });
    expect(orderTotal?.returns).toEqual({
      kind: 'scalar',
      dataType: { normalized: 'decimal', native: 'money', precision: 19, scale: 4 },
    });
    expect(orderTotal?.parameters.map((item) => item.name)).toEqual(['@order_id']);
    expect(customerOrders?.returns).toEqual({
      kind: 'table',
      columns: [
        { name: 'id', dataType: { normalized: 'integer', native: 'int' }, nullable: false },
        { name: 'total', dataType: { normalized: 'decimal', native: 'money', precision: 19, scale: 4 }, nullable: true },
      ],
    });

    const [procedure] = group('sales')?.procedures ?? [];
    expect(procedure?.returns).toBeNull();
    expect(procedure?.description).toBe('Closes an order');
    expect(procedure?.parameters.map((item) => [item.name, item.direction])).toEqual([
      ['@order_id', 'IN'],
      ['@closed_count', 'OUT'],
    ]);
  });

  it('reads trigger events and disabled state', () => {
    expect(group('sales')?.triggers[0]).toMatchObject({
      table: identifier('sales', 'orders'),
      timing: 'AFTER',
      events: ['UPDATE', 'DELETE'],
      enabled: false,
    });
  });

  it('reads alias and table types', () => {
    const [alias, tableType] = group('dbo')?.types ?? [];
    expect(alias).toMatchObject({
      category: 'ALIAS',
      baseType: { normalized: 'string', native: 'varchar(200)', length: 200 },
      members: [],
    });
    expect(tableType).toMatchObject({ category: 'TABLE_TYPE', baseType: null, nullable: false });
    expect(tableType?.members).toEqual([
      { name: 'line_no', dataType: { normalized: 'integer', native: 'int' }, nullable: false },
      { name: 'sku', dataType: { normalized: 'string', native: 'nvarchar(20)', length: 20 }, nullable: true },
    ]);
  });

  it('reads sequences without a cache', () => {
    expect(group('sales')?.sequences).toEqual([
      {
        id: identifier('sales', 'order_numbers'),
        dataType: 'bigint',
        start: '1000',
        increment: '1',
        min: '1',
        max: '9223372036854775807',
        cycle: false,
        cache: null,
        current: '1042',
        description: null,
      },
    ]);
  });

  it('resolves local synonyms and leaves remote ones unresolved', () => {
    const dbo = group('dbo');
    expect(dbo?.synonyms.map((synonym) => [synonym.id.name, synonym.target.key, synonym.targetServer])).toEqual([
      ['all_orders', 'sales.orders', null],
      ['archived_orders', 'sales.orders', 'archive01'],
      ['clients', 'dbo.customers', null],
    ]);
    expect(incomingEdges(snapshot.graph, identifier('sales', 'orders')).map((edge) => [edge.via, edge.resolved])).toEqual([
      ['all_orders', true],
      ['archived_orders', false],
    ]);
    expect(outgoingEdges(snapshot.graph, identifier('dbo', 'clients'))[0]).toMatchObject({
      kind: 'synonym',
      resolved: true,
      targetType: 'tables',
    });
    expect(snapshot.warnings).toEqual([
      {
        kind: 'unresolved-reference',
        source: identifier('dbo', 'archived_orders'),
        target: identifier('sales', 'orders'),
        via: 'archived_orders',
        reference: 'synonym',
      },
    ]);
  });

  it('reads principals, role membership and denied permissions', () => {
    expect(snapshot.security).toEqual([
      { kind: 'ROLE', name: 'db_datareader', permissions: [], memberOf: [] },
      {
        kind: 'USER',
        name: 'app_reader',
        permissions: [
          { privilege: 'DELETE', object: identifier('sales', 'orders'), state: 'DENY' },
          { privilege: 'SELECT', object: identifier('sales', 'orders'), state: 'GRANT' },
        ],
        memberOf: ['db_datareader'],
      },
    ]);
  });
});
