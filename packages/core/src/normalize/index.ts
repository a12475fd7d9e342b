import typeBuckets from './type-buckets.json';

import type {
  DataType,
  DatabaseKind,
  ExactNumber,
  Identifier,
  ReferentialAction,
  TypeBucket,
} from '../types';

const BUCKETS: ReadonlySet<string> = new Set<TypeBucket>([
  'integer',
  'decimal',
  'float',
  'string',
  'binary',
  'boolean',
  'date',
  'time',
  'timestamp',
  'interval',
  'uuid',
  'json',
  'xml',
  'spatial',
  'array',
  'enum',
  'rowid',
  'other',
]);

const LENGTH_TYPES = new Set([
  'char',
  'character',
  'nchar',
  'varchar',
  'character varying',
  'nvarchar',
  'varchar2',
  'nvarchar2',
  'binary',
  'varbinary',
  'raw',
  'bit',
  'bit varying',
  'varbit',
]);

const PRECISION_TYPES = new Set(['decimal', 'numeric', 'number']);

const FRACTIONAL_TIME_TYPES = new Set(['datetime2', 'datetimeoffset', 'time']);

export interface TypeSpec {
  name: string;
  length?: number | null;
  precision?: number | null;
  scale?: number | null;
  /** Full type text as the engine prints it, when the catalog provides one. */
  display?: string | null;
}

export function foldCase(value: string): string {
  return value.toLowerCase();
}

export function identifier(schema: string, name: string): Identifier {
  return { schema, name, key: `${foldCase(schema)}.${foldCase(name)}` };
}

export function qualifiedName(id: Identifier): string {
  return `${id.schema}.${id.name}`;
}

export function compareIdentifiers(a: Identifier, b: Identifier): number {
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

const COMMON_BUCKETS = new Map<string, unknown>(Object.entries(typeBuckets.common));

const DIALECT_BUCKETS = new Map<string, Map<string, unknown>>(
  Object.entries(typeBuckets.dialects).map(([kind, names]) => [kind, new Map<string, unknown>(Object.entries(names))]),
);

function isBucket(value: unknown): value is TypeBucket {
  return typeof value === 'string' && BUCKETS.has(value);
}

function lookupBucket(kind: DatabaseKind, base: string): TypeBucket | undefined {
  const override = DIALECT_BUCKETS.get(kind)?.get(base);
  if (isBucket(override)) return override;
  const common = COMMON_BUCKETS.get(base);
  return isBucket(common) ? common : undefined;
}

// SQLite accepts any declared type; classify it the way column affinity does.
function sqliteAffinity(base: string): TypeBucket {
  if (base.includes('int')) return 'integer';
  if (base.includes('char') || base.includes('clob') || base.includes('text')) return 'string';
  if (base === '' || base.includes('blob')) return 'binary';
  if (base.includes('real') || base.includes('floa') || base.includes('doub')) return 'float';
  return 'decimal';
}

export function baseTypeName(name: string): string {
  return foldCase(name.replace(/\(.*\)/, '').replace(/\s+/g, ' ').trim());
}

function bucketFor(kind: DatabaseKind, base: string, spec: TypeSpec): TypeBucket {
  if (kind === 'mysql' && base === 'tinyint' && /^tinyint\(1\)/i.test(spec.display ?? '')) {
    return 'boolean';
  }
  if (kind === 'oracle' && base === 'number' && spec.precision != null && (spec.scale ?? 0) === 0) {
    return 'integer';
  }
  if (base.endsWith('[]')) return 'array';
  const bucket = lookupBucket(kind, base);
  if (bucket) return bucket;
  if (kind === 'sqlite') return sqliteAffinity(base);
  return 'other';
}

function displayLength(kind: DatabaseKind, base: string, length: number): string {
  if (length === -1) return 'max';
  if (kind === 'mssql' && (base === 'nvarchar' || base === 'nchar')) {
    return String(length / 2);
  }
  return String(length);
}

export function formatNativeType(kind: DatabaseKind, spec: TypeSpec): string {
  if (spec.display) return spec.display;
  const base = baseTypeName(spec.name);
  if (LENGTH_TYPES.has(base) && spec.length != null && spec.length !== 0) {
    return `${spec.name}(${displayLength(kind, base, spec.length)})`;
  }
  if (PRECISION_TYPES.has(base) && spec.precision != null) {
    return spec.scale != null && spec.scale > 0
      ? `${spec.name}(${spec.precision},${spec.scale})`
      : `${spec.name}(${spec.precision})`;
  }
  if (kind === 'mssql' && FRACTIONAL_TIME_TYPES.has(base) && spec.scale != null && spec.scale !== 7) {
    return `${spec.name}(${spec.scale})`;
  }
  return spec.name;
}

export function normalizeType(kind: DatabaseKind, spec: TypeSpec): DataType {
  const base = baseTypeName(spec.name);
  const normalized = bucketFor(kind, base, spec);
  const dataType: DataType = { normalized, native: formatNativeType(kind, spec) };

  if (normalized === 'string' || normalized === 'binary') {
    if (spec.length != null && spec.length > 0) {
      const halved = kind === 'mssql' && (base === 'nvarchar' || base === 'nchar');
      dataType.length = halved ? spec.length / 2 : spec.length;
    } else if (spec.length === -1) {
      dataType.length = null;
    }
  }
  if (normalized === 'decimal') {
    dataType.precision = spec.precision ?? null;
    dataType.scale = spec.scale ?? null;
  }
  return dataType;
}

export function normalizeReferentialAction(value: string | null | undefined): ReferentialAction | null {
  if (!value) return null;
  switch (value.trim().toUpperCase().replace(/[\s_]+/g, ' ')) {
    case 'NO ACTION':
      return 'NO_ACTION';
    case 'CASCADE':
      return 'CASCADE';
    case 'RESTRICT':
      return 'RESTRICT';
    case 'SET NULL':
      return 'SET_NULL';
    case 'SET DEFAULT':
      return 'SET_DEFAULT';
    default:
      return null;
  }
}

const EXACT_PATTERN = /^-?\d+(\.\d+)?$/;

export function toExact(value: unknown): ExactNumber | null {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? String(value) : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return EXACT_PATTERN.test(trimmed) ? trimmed : null;
  }
  return null;
}

/** Row counts and sizes are estimates; negative values mean "unknown". */
export function toStatistic(value: unknown): ExactNumber | undefined {
  const exact = toExact(value);
  if (exact == null || exact.startsWith('-')) return undefined;
  return exact;
}

export function toBool(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return Number(value) !== 0;
  if (typeof value === 'string') {
    return ['1', 'y', 'yes', 't', 'true', 'enabled'].includes(value.trim().toLowerCase());
  }
  return false;
}

export function tidyText(value: string | null | undefined): string | null {
  if (value == null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function splitList(value: string | null | undefined, separator = ','): string[] {
  if (!value) return [];
  return value
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
