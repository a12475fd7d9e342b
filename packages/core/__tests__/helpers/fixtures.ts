import { buildTable, buildView } from '../../src/model';
import { identifier, normalizeType } from '../../src/normalize';
import { emptySchemaGroup } from '../../src/selection';
import type {
  Column,
  ForeignKey,
  Identifier,
  ReferentialAction,
  SchemaGroup,
  Synonym,
  Table,
  Trigger,
  View,
} from '../../src/types';

export function intColumn(name: string, ordinal: number): Column {
  return {
    name,
    ordinal,
    dataType: normalizeType('postgres', { name: 'integer' }),
    nullable: false,
    default: null,
    autoIncrement: false,
    computed: null,
    description: null,
  };
}

export function foreignKey(
  name: string,
  column: string,
  target: Identifier,
  onDelete: ReferentialAction | null = null,
): ForeignKey {
  return { name, columns: [column], target, targetColumns: ['id'], onDelete, onUpdate: null };
}

export function table(id: Identifier, columns: string[], foreignKeys: ForeignKey[] = []): Table {
  return buildTable({
    id,
    columns: columns.map((name, index) => intColumn(name, index + 1)),
    primaryKey: { name: `${id.name}_pkey`, columns: [columns[0] ?? 'id'], clustered: null },
    foreignKeys,
  });
}

export function view(id: Identifier, baseTables: Identifier[]): View {
  return buildView({ id, columns: [], definition: 'SELECT 1', baseTables, materialized: false, description: null });
}

export function synonym(id: Identifier, target: Identifier, targetServer: string | null = null): Synonym {
  return {
    id,
    target,
    targetServer,
    targetDatabase: null,
    baseObject: `${target.schema}.${target.name}`,
    description: null,
  };
}

export function trigger(id: Identifier, parent: Identifier): Trigger {
  return {
    id,
    table: parent,
    timing: 'AFTER',
    events: ['INSERT'],
    enabled: true,
    definition: null,
    description: null,
  };
}

export function group(name: string, contents: Partial<Omit<SchemaGroup, 'name'>> = {}): SchemaGroup {
  return { ...emptySchemaGroup(name), ...contents };
}

export const ids = {
  orders: identifier('sales', 'orders'),
  products: identifier('sales', 'products'),
  orderItems: identifier('sales', 'order_items'),
  customers: identifier('crm', 'customers'),
};

/** orders and products referenced from order_items (CASCADE and RESTRICT on delete). */
export function salesGroup(): SchemaGroup {
  return group('sales', {
    tables: [
      table(ids.orderItems, ['id', 'order_id', 'product_id'], [
        foreignKey('fk_items_order', 'order_id', ids.orders, 'CASCADE'),
        foreignKey('fk_items_product', 'product_id', ids.products, 'RESTRICT'),
      ]),
      table(ids.orders, ['id']),
      table(ids.products, ['id']),
    ],
  });
}
