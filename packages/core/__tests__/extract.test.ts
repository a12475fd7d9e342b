import { describe, expect, it } from 'vitest';

import type { DialectAdapter } from '../src/discovery/types';
import { createDialectRegistry } from '../src/discovery/registry';
import { ConfigurationError, ExtractionError, FilterConflictError } from '../src/errors';
import { extract, extractAll } from '../src/extract';
import { outgoingEdges } from '../src/graph';
import { identifier } from '../src/normalize';
import type { DatabaseKind } from '../src/types';
import { fakeRunner } from './helpers/fakeRunner';
import { ids, intColumn } from './helpers/fixtures';
import { plainView, shopCatalog, stubDialect } from './helpers/stubDialect';

const now = () => new Date('2026-01-02T03:04:05Z');

function deps(adapter: DialectAdapter) {
  return { dialects: createDialectRegistry([adapter]), now };
}

function request(selection?: Parameters<typeof extract>[0]['selection']) {
  return { runner: fakeRunner('postgres', {}), database: 'shop', selection };
}

const denied = async (): Promise<never> => {
  throw new Error('permission denied');
};

describe('extract', () => {
  it('assembles tables, views and routines with their relationships', async () => {
    const stub = stubDialect(shopCatalog());
    const snapshot = await extract(request(), deps(stub.adapter));

    expect(snapshot.engine).toBe('postgres');
    expect(snapshot.engineVersion).toBe('Stub 1.0');
    expect(snapshot.extractedAt).toBe('2026-01-02T03:04:05.000Z');
    expect(snapshot.schemas.map((group) => group.name)).toEqual(['crm', 'sales']);
    expect(snapshot.schemas[1]?.tables.map((table) => table.id.name)).toEqual(['order_items', 'orders', 'products']);
    expect(snapshot.schemas[1]?.procedures.map((routine) => routine.id.name)).toEqual(['close_order']);
    expect(outgoingEdges(snapshot.graph, ids.orderItems).map((edge) => edge.target.key)).toEqual([
      'sales.orders',
      'sales.products',
    ]);
    expect(snapshot.graph.edges).toHaveLength(3);
    expect(snapshot.warnings).toEqual([]);
    expect(stub.calls).toEqual([
      'schemas',
      'tables',
      'columns',
      'primaryKeys',
      'indexes',
      'foreignKeys',
      'checks',
      'uniqueConstraints',
      'views',
      'routines',
      'triggers',
      'types',
      'sequences',
      'synonyms',
      'security',
    ]);
  });

  it('reads only what a views-only selection needs', async () => {
    const stub = stubDialect(shopCatalog());
    const snapshot = await extract(request({ objectTypes: ['views'] }), deps(stub.adapter));

    expect(stub.calls).toEqual(['schemas', 'tables', 'views']);
    expect(snapshot.schemas.flatMap((group) => group.views.map((view) => view.id.key))).toEqual([
      'crm.active_customers',
      'sales.open_orders',
    ]);
    expect(snapshot.schemas.every((group) => group.tables.length === 0 && group.procedures.length === 0)).toBe(true);
    expect(snapshot.availability).toEqual({
      tables: 'not-requested',
      views: 'available',
      procedures: 'not-requested',
      functions: 'not-requested',
      triggers: 'not-requested',
      types: 'not-requested',
      sequences: 'not-requested',
      synonyms: 'not-requested',
      security: 'not-requested',
    });
    expect(snapshot.graph.dependencies.map((dep) => dep.resolved)).toEqual([false, false]);
  });

  it('aborts when tables cannot be listed', async () => {
    const stub = stubDialect({ ...shopCatalog(), tables: denied });
    await expect(extract(request(), deps(stub.adapter))).rejects.toThrow(ExtractionError);
    await expect(extract(request(), deps(stub.adapter))).rejects.toThrow(
      'Extraction from postgres aborted while listing tables: Failed to list tables on postgres: permission denied',
    );
  });

  it('keeps going when an optional capability fails', async () => {
    const stub = stubDialect({ ...shopCatalog(), views: denied });
    const snapshot = await extract(request(), deps(stub.adapter));

    expect(snapshot.availability.views).toBe('failed');
    expect(snapshot.availability.tables).toBe('available');
    expect(snapshot.warnings).toEqual([
      { kind: 'query-failure', objectType: 'views', message: 'Failed to list views on postgres: permission denied' },
    ]);
  });

  it('aborts when columns cannot be read for requested tables', async () => {
    const stub = stubDialect({ ...shopCatalog(), columns: denied });
    await expect(extract(request(), deps(stub.adapter))).rejects.toThrow(
      'Extraction from postgres aborted while listing columns: Failed to list columns on postgres: permission denied',
    );
  });

  it('keeps the first of two objects whose names differ only in case', async () => {
    const lower = identifier('sales', 'orders');
    const upper = identifier('sales', 'Orders');
    const stub = stubDialect({
      schemas: async () => ['sales'],
      tables: async () => [
        { id: lower, description: null },
        { id: upper, description: null },
      ],
      columns: async () => [
        { table: lower, column: intColumn('id', 1) },
        { table: upper, column: intColumn('id', 1) },
      ],
      primaryKeys: async () => [{ table: lower, primaryKey: { name: 'orders_pkey', columns: ['id'], clustered: null } }],
      views: async () => [plainView('sales', 'open', lower), plainView('sales', 'Open', lower)],
    });
    const snapshot = await extract(request(), deps(stub.adapter));
    const tables = snapshot.schemas[0]?.tables ?? [];

    expect(tables.map((table) => table.id.name)).toEqual(['Orders']);
    expect(tables[0]?.columns.map((column) => column.name)).toEqual(['id']);
    expect(tables[0]?.primaryKey).toBeNull();
    expect(snapshot.schemas[0]?.views.map((view) => view.id.name)).toEqual(['Open']);
    expect(snapshot.warnings).toEqual([
      {
        kind: 'model-integrity',
        objectType: 'table',
        object: 'sales.orders',
        message: 'Invalid table sales.orders: name collides with sales.Orders',
      },
      {
        kind: 'model-integrity',
        objectType: 'view',
        object: 'sales.open',
        message: 'Invalid view sales.open: name collides with sales.Open',
      },
    ]);
  });

  it('stamps the snapshot before reading the catalog', async () => {
    const events: string[] = [];
    const stub = stubDialect(shopCatalog(), {
      version: async () => {
        events.push('version');
        return 'Stub 1.0';
      },
    });
    const clock = () => {
      events.push('clock');
      return now();
    };
    const snapshot = await extract(request(), { dialects: createDialectRegistry([stub.adapter]), now: clock });
    expect(events).toEqual(['clock', 'version']);
    expect(snapshot.extractedAt).toBe('2026-01-02T03:04:05.000Z');
  });

  it('records a missing server version as a warning', async () => {
    const stub = stubDialect(shopCatalog(), {
      version: async () => {
        throw new Error('boom');
      },
    });
    const snapshot = await extract(request(), deps(stub.adapter));
    expect(snapshot.engineVersion).toBeNull();
    expect(snapshot.warnings).toEqual([
      { kind: 'query-failure', objectType: 'version', message: 'Failed to list version on postgres: boom' },
    ]);
  });

  it('skips tables that fail integrity checks and reports references to them', async () => {
    const catalog = shopCatalog();
    const stub = stubDialect({
      ...catalog,
      columns: async () => [
        { table: ids.customers, column: intColumn('id', 1) },
        { table: ids.orders, column: intColumn('id', 1) },
        { table: ids.orders, column: intColumn('customer_id', 2) },
        { table: ids.orderItems, column: intColumn('id', 1) },
        { table: ids.orderItems, column: intColumn('order_id', 2) },
        { table: ids.orderItems, column: intColumn('product_id', 3) },
        { table: ids.products, column: intColumn('id', 2) },
      ],
    });
    const snapshot = await extract(request(), deps(stub.adapter));

    expect(snapshot.schemas[1]?.tables.map((table) => table.id.name)).toEqual(['order_items', 'orders']);
    expect(snapshot.warnings).toEqual([
      {
        kind: 'model-integrity',
        objectType: 'table',
        object: 'sales.products',
        message: 'Invalid table sales.products: column ordinals are not contiguous (expected 1, found 2 for id)',
      },
      {
        kind: 'unresolved-reference',
        source: ids.orderItems,
        target: ids.products,
        via: 'fk_items_product',
        reference: 'foreign-key',
      },
    ]);
  });

  it('rejects conflicting filters before touching the catalog', async () => {
    const stub = stubDialect(shopCatalog());
    await expect(
      extract(request({ schemas: ['sales'], excludeSchemas: ['SALES'] }), deps(stub.adapter)),
    ).rejects.toThrow(FilterConflictError);
    expect(stub.calls).toEqual([]);
  });

  it('requires a registered adapter', async () => {
    const dialects = new Map<DatabaseKind, DialectAdapter>();
    await expect(extract(request(), { dialects })).rejects.toThrow(ConfigurationError);
  });

  it('returns a frozen snapshot and leaves the runner open', async () => {
    const runner = fakeRunner('postgres', {});
    const snapshot = await extract({ runner, database: 'shop' }, deps(stubDialect(shopCatalog()).adapter));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.schemas[0]?.tables[0]?.columns)).toBe(true);
    expect(Object.isFrozen(snapshot.graph.outgoing)).toBe(true);
    expect(runner.closed).toBe(false);
  });
});

describe('extractAll', () => {
  it('extracts each request on its own runner', async () => {
    const { adapter } = stubDialect(shopCatalog());
    const snapshots = await extractAll(
      [
        { runner: fakeRunner('postgres', {}), database: 'shop' },
        { runner: fakeRunner('postgres', {}), database: 'archive' },
      ],
      deps(adapter),
    );
    expect(snapshots.map((snapshot) => snapshot.database)).toEqual(['shop', 'archive']);
  });
});
