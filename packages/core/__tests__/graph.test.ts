import { describe, expect, it } from 'vitest';

import {
  buildRelationshipGraph,
  dependenciesOf,
  dependentsOf,
  incomingEdges,
  outgoingEdges,
  unresolvedReferences,
} from '../src/graph';
import { identifier } from '../src/normalize';
import { foreignKey, group, ids, salesGroup, synonym, table, trigger, view } from './helpers/fixtures';

describe('buildRelationshipGraph', () => {
  it('links order items to orders and products', () => {
    const graph = buildRelationshipGraph([salesGroup()]);

    const outgoing = outgoingEdges(graph, ids.orderItems);
    expect(outgoing.map((edge) => [edge.via, edge.target.key, edge.onDelete])).toEqual([
      ['fk_items_order', 'sales.orders', 'CASCADE'],
      ['fk_items_product', 'sales.products', 'RESTRICT'],
    ]);
    expect(outgoing.every((edge) => edge.resolved && edge.targetType === 'tables')).toBe(true);
    expect(incomingEdges(graph, ids.orders)).toHaveLength(1);
    expect(incomingEdges(graph, ids.products)).toHaveLength(1);
    expect(incomingEdges(graph, ids.orderItems)).toEqual([]);
  });

  it('indexes every edge from both ends', () => {
    const graph = buildRelationshipGraph([salesGroup()]);
    for (const edge of graph.edges) {
      expect(graph.outgoing[edge.source.key]).toContain(edge);
      expect(graph.incoming[edge.target.key]).toContain(edge);
    }
  });

  it('resolves targets case-insensitively to the retained object', () => {
    const invoices = identifier('sales', 'invoices');
    const graph = buildRelationshipGraph([
      group('sales', {
        tables: [
          table(ids.orders, ['id']),
          table(invoices, ['id', 'order_id'], [foreignKey('fk_invoice_order', 'order_id', identifier('SALES', 'Orders'))]),
        ],
      }),
    ]);
    const [edge] = outgoingEdges(graph, invoices);
    expect(edge?.target).toBe(ids.orders);
  });

  it('keeps foreign keys to missing tables as unresolved edges', () => {
    const graph = buildRelationshipGraph([
      group('sales', {
        tables: [table(ids.orders, ['id', 'customer_id'], [foreignKey('fk_order_customer', 'customer_id', ids.customers)])],
      }),
    ]);
    const [edge] = graph.edges;
    expect(edge).toMatchObject({ resolved: false, targetType: null, target: ids.customers });
    expect(unresolvedReferences([], graph)).toEqual([
      {
        kind: 'unresolved-reference',
        source: ids.orders,
        target: ids.customers,
        via: 'fk_order_customer',
        reference: 'foreign-key',
      },
    ]);
  });

  it('resolves local synonyms and leaves remote ones unresolved', () => {
    const local = identifier('sales', 'all_orders');
    const remote = identifier('sales', 'linked_orders');
    const graph = buildRelationshipGraph([
      group('sales', {
        tables: [table(ids.orders, ['id'])],
        synonyms: [synonym(local, ids.orders), synonym(remote, ids.orders, 'LINKED01')],
      }),
    ]);
    expect(outgoingEdges(graph, local)[0]).toMatchObject({ kind: 'synonym', resolved: true, targetType: 'tables' });
    expect(outgoingEdges(graph, remote)[0]).toMatchObject({ kind: 'synonym', resolved: false, targetType: null });
    expect(incomingEdges(graph, ids.orders).map((edge) => edge.via)).toEqual(['all_orders', 'linked_orders']);
  });

  it('records view dependencies', () => {
    const openOrders = identifier('sales', 'open_orders');
    const missing = identifier('sales', 'missing');
    const graph = buildRelationshipGraph([
      group('sales', {
        tables: [table(ids.orders, ['id'])],
        views: [view(openOrders, [ids.orders, missing])],
      }),
    ]);
    expect(dependenciesOf(graph, openOrders).map((dep) => [dep.target.key, dep.resolved])).toEqual([
      ['sales.missing', false],
      ['sales.orders', true],
    ]);
    expect(dependentsOf(graph, ids.orders).map((dep) => dep.view.key)).toEqual(['sales.open_orders']);
  });
});

describe('unresolvedReferences', () => {
  it('reports triggers whose table was not retained', () => {
    const archive = identifier('sales', 'archive');
    const groups = [
      group('sales', {
        tables: [table(ids.orders, ['id'])],
        triggers: [
          trigger(identifier('sales', 'trg_orders'), ids.orders),
          trigger(identifier('sales', 'trg_archive'), archive),
        ],
      }),
    ];
    const warnings = unresolvedReferences(groups, buildRelationshipGraph(groups));
    expect(warnings).toEqual([
      {
        kind: 'unresolved-reference',
        source: identifier('sales', 'trg_archive'),
        target: archive,
        via: 'trg_archive',
        reference: 'trigger-parent',
      },
    ]);
  });
});
