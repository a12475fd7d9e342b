import { describe, expect, it } from 'vitest';

import { createDialectRegistry } from '../src/discovery/registry';
import { NOT_APPLICABLE, type CatalogReader } from '../src/discovery/types';
import { extract } from '../src/extract';
import { identifier } from '../src/normalize';
import { cell, documentPath, renderSnapshot } from '../src/render';
import type { SelectionInput } from '../src/config';
import { fakeRunner } from './helpers/fakeRunner';
import { ids, intColumn } from './helpers/fixtures';
import { shopCatalog, stubDialect } from './helpers/stubDialect';

async function snapshotOf(catalog: Partial<CatalogReader>, selection?: SelectionInput) {
  const { adapter } = stubDialect(catalog);
  return extract(
    { runner: fakeRunner('postgres', {}), database: 'shop', selection },
    { dialects: createDialectRegistry([adapter]), now: () => new Date('2026-01-02T03:04:05Z') },
  );
}

async function documents(catalog: Partial<CatalogReader>, selection?: SelectionInput) {
  const rendered = renderSnapshot(await snapshotOf(catalog, selection));
  return new Map(rendered.map((document) => [document.path, document.content]));
}

describe('cell', () => {
  it('flattens line breaks and escapes pipes', () => {
    expect(cell('a|b\n  c')).toBe('a\\|b c');
    expect(cell(null)).toBe('');
  });
});

describe('documentPath', () => {
  it('keeps slashes in names out of the path', () => {
    expect(documentPath('tables', identifier('dbo', 'a/b'))).toBe('tables/dbo.a_b.md');
  });
});

describe('renderSnapshot', () => {
  it('is deterministic', async () => {
    const snapshot = await snapshotOf(shopCatalog());
    expect(renderSnapshot(snapshot)).toEqual(renderSnapshot(snapshot));
  });

  it('writes one document per object plus the indexes', async () => {
    const docs = await documents(shopCatalog());
    expect([...docs.keys()]).toEqual([
      'README.md',
      'tables/README.md',
      'tables/crm.customers.md',
      'tables/sales.order_items.md',
      'tables/sales.orders.md',
      'tables/sales.products.md',
      'views/README.md',
      'views/crm.active_customers.md',
      'views/sales.open_orders.md',
      'procedures/README.md',
      'procedures/crm.refresh_stats.md',
      'procedures/sales.close_order.md',
      'functions/README.md',
      'triggers/README.md',
      'types/README.md',
      'sequences/README.md',
      'synonyms/README.md',
      'schemas/README.md',
      'schemas/crm.md',
      'schemas/sales.md',
      'security/README.md',
    ]);
  });

  it('renders a table with its keys and relationships', async () => {
    const docs = await documents(shopCatalog());
    expect(docs.get('tables/sales.order_items.md')).toBe(
      [
        '# sales.order_items',
        '',
        '## Columns',
        '',
        '| Column | Type | Nullable | Default | Description |',
        '|--------|------|----------|---------|-------------|',
        '| id | integer | NO |  |  |',
        '| order_id | integer | NO |  |  |',
        '| product_id | integer | NO |  |  |',
        '',
        '## Primary Key',
        '',
        '**order_items_pkey**',
        '',
        'Columns: `id`',
        '',
        '## Foreign Keys',
        '',
        '| Name | Columns | References | On Delete | On Update |',
        '|------|---------|------------|-----------|-----------|',
        '| fk_items_order | order_id | sales.orders(id) | CASCADE | - |',
        '| fk_items_product | product_id | sales.products(id) | RESTRICT | - |',
        '',
        '## Relationships',
        '',
        '### References',
        '',
        '- [sales.orders](../tables/sales.orders.md) via `fk_items_order`',
        '- [sales.products](../tables/sales.products.md) via `fk_items_product`',
        '',
      ].join('\n'),
    );
  });

  it('lists incoming references and dependent views', async () => {
    const content = (await documents(shopCatalog())).get('tables/sales.orders.md') ?? '';
    expect(content).toContain(
      ['### References', '', '- [crm.customers](../tables/crm.customers.md) via `fk_orders_customer`'].join('\n'),
    );
    expect(content).toContain(
      ['### Referenced By', '', '- [sales.order_items](../tables/sales.order_items.md) via `fk_items_order`'].join('\n'),
    );
    expect(content).toContain(['## Dependent Views', '', '- [sales.open_orders](../views/sales.open_orders.md)'].join('\n'));
  });

  it('renders routine source', async () => {
    const docs = await documents(shopCatalog());
    expect(docs.get('procedures/sales.close_order.md')).toBe(
      ['# sales.close_order', '', '**Language:** plpgsql', '', '## Definition', '', '```sql', 'BEGIN NULL; END', '```', ''].join(
        '\n',
      ),
    );
  });

  it('links synonyms and their targets in both directions', async () => {
    const docs = await documents({
      ...shopCatalog(),
      synonyms: async () => [
        {
          id: identifier('sales', 'close_alias'),
          target: identifier('sales', 'close_order'),
          targetServer: null,
          targetDatabase: null,
          baseObject: 'sales.close_order',
          description: null,
        },
      ],
    });
    expect(docs.get('procedures/sales.close_order.md')).toBe(
      [
        '# sales.close_order',
        '',
        '**Language:** plpgsql',
        '',
        '## Relationships',
        '',
        '### Referenced By',
        '',
        '- [sales.close_alias](../synonyms/sales.close_alias.md) via `close_alias`',
        '',
        '## Definition',
        '',
        '```sql',
        'BEGIN NULL; END',
        '```',
        '',
      ].join('\n'),
    );
    expect(docs.get('synonyms/sales.close_alias.md')).toBe(
      [
        '# sales.close_alias',
        '',
        '## Target',
        '',
        '**Base Object:** `sales.close_order`',
        '',
        '## Relationships',
        '',
        '### References',
        '',
        '- [sales.close_order](../procedures/sales.close_order.md) via `close_alias`',
        '',
      ].join('\n'),
    );
  });

  it('keeps separators in schema names out of schema document paths', async () => {
    const docs = await documents({ schemas: async () => ['ops/eu'] });
    expect(docs.get('schemas/ops_eu.md')).toBe('# Schema: ops/eu\n');
    expect((docs.get('README.md') ?? '').split('\n')).toContain('- [ops/eu](schemas/ops_eu.md)');
    expect((docs.get('schemas/README.md') ?? '').split('\n')).toContain('| [ops/eu](ops_eu.md) | 0 | 0 | 0 | 0 | 0 | 0 | 0 | 0 |');
  });

  it('summarizes a views-only extraction', async () => {
    const readme = (await documents(shopCatalog(), { objectTypes: ['views'] })).get('README.md') ?? '';
    expect(readme).toBe(
      [
        '# shop Database Schema',
        '',
        '*Generated on 2026-01-02T03:04:05.000Z*',
        '',
        '**Database Type:** PostgreSQL',
        '**Version:** Stub 1.0',
        '',
        '## Summary',
        '',
        '| Object Type | Count |',
        '|-------------|-------|',
        '| Tables | 0 |',
        '| Views | 2 |',
        '| Stored Procedures | 0 |',
        '| Functions | 0 |',
        '| Triggers | 0 |',
        '| User-Defined Types | 0 |',
        '| Sequences | 0 |',
        '| Synonyms | 0 |',
        '| Security | 0 |',
        '',
        '## Schemas',
        '',
        '- [crm](schemas/crm.md)',
        '- [sales](schemas/sales.md)',
        '',
        '## Object Directories',
        '',
        '- [Views](views/README.md)',
        '- [Schemas](schemas/README.md)',
        '',
      ].join('\n'),
    );
  });

  it('marks references to skipped tables as unresolved', async () => {
    const docs = await documents({
      ...shopCatalog(),
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
    const lines = (docs.get('tables/sales.order_items.md') ?? '').split('\n');
    expect(lines).toContain('- `sales.products` *(unresolved)* via `fk_items_product`');

    const readme = (docs.get('README.md') ?? '').split('\n');
    expect(readme).toContain(
      '- Skipped table `sales.products`: Invalid table sales.products: column ordinals are not contiguous (expected 1, found 2 for id)',
    );
    expect(readme).toContain('- Unresolved foreign-key `fk_items_product`: `sales.order_items` -> `sales.products`');
  });

  it('omits categories the engine does not have', async () => {
    const docs = await documents({ ...shopCatalog(), synonyms: NOT_APPLICABLE });
    const readme = (docs.get('README.md') ?? '').split('\n');
    expect(readme).toContain('| Sequences | 0 |');
    expect(readme.some((line) => line.startsWith('| Synonyms'))).toBe(false);
    expect(docs.has('synonyms/README.md')).toBe(false);
  });

  it('reports failed categories in the summary', async () => {
    const docs = await documents({
      ...shopCatalog(),
      views: async () => {
        throw new Error('permission denied');
      },
    });
    const readme = (docs.get('README.md') ?? '').split('\n');
    expect(readme).toContain('| Views | extraction failed |');
    expect(readme).toContain('- Could not read views: Failed to list views on postgres: permission denied');
    expect(docs.has('views/README.md')).toBe(false);
  });

  it('renders security principals', async () => {
    const docs = await documents({
      ...shopCatalog(),
      security: async () => [
        {
          kind: 'USER',
          name: 'report_reader',
          permissions: [{ privilege: 'SELECT', object: ids.orders, state: 'GRANT' }],
          memberOf: ['readers'],
        },
      ],
    });
    expect(docs.get('security/README.md')).toBe(
      [
        '# Security',
        '',
        '## Users',
        '',
        '| Name | Member Of | Permissions |',
        '|------|-----------|-------------|',
        '| [report_reader](users.report_reader.md) | readers | 1 |',
        '',
        '## Roles',
        '',
        'None',
        '',
      ].join('\n'),
    );
    expect(docs.get('security/users.report_reader.md')).toContain('| sales.orders | SELECT | GRANT |');
  });
});
