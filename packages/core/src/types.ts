export type DatabaseKind = 'postgres' | 'mysql' | 'mssql' | 'oracle' | 'sqlite';

export const DATABASE_KINDS: readonly DatabaseKind[] = ['mssql', 'postgres', 'mysql', 'oracle', 'sqlite'];

export type ObjectType =
  | 'tables'
  | 'views'
  | 'procedures'
  | 'functions'
  | 'triggers'
  | 'types'
  | 'sequences'
  | 'synonyms'
  | 'security';

export const OBJECT_TYPES: readonly ObjectType[] = [
  'tables',
  'views',
  'procedures',
  'functions',
  'triggers',
  'types',
  'sequences',
  'synonyms',
  'security',
];

/** Decimal integer kept as text so 64-bit and NUMBER(38) values survive untouched. */
export type ExactNumber = string;

export interface Identifier {
  schema: string;
  name: string;
  /** Case-folded `schema.name`, used for every cross-object match. */
  key: string;
}

export type TypeBucket =
  | 'integer'
  | 'decimal'
  | 'float'
  | 'string'
  | 'binary'
  | 'boolean'
  | 'date'
  | 'time'
  | 'timestamp'
  | 'interval'
  | 'uuid'
  | 'json'
  | 'xml'
  | 'spatial'
  | 'array'
  | 'enum'
  | 'rowid'
  | 'other';

export interface DataType {
  normalized: TypeBucket;
  native: string;
  length?: number | null;
  precision?: number | null;
  scale?: number | null;
}

export interface Column {
  name: string;
  ordinal: number;
  dataType: DataType;
  nullable: boolean;
  default: string | null;
  autoIncrement: boolean;
  identitySeed?: ExactNumber;
  identityIncrement?: ExactNumber;
  computed: string | null;
  collation?: string | null;
  description: string | null;
}

export interface PrimaryKey {
  name: string | null;
  columns: string[];
  /** `null` when the engine has no clustering concept it exposes. */
  clustered: boolean | null;
}

export type ReferentialAction = 'NO_ACTION' | 'CASCADE' | 'RESTRICT' | 'SET_NULL' | 'SET_DEFAULT';

export interface ForeignKey {
  name: string;
  columns: string[];
  target: Identifier;
  targetColumns: string[];
  onDelete: ReferentialAction | null;
  onUpdate: ReferentialAction | null;
}

export interface Index {
  name: string;
  unique: boolean;
  primary: boolean;
  clustered: boolean | null;
  columns: string[];
  /** Key parts that are expressions rather than plain columns. */
  expressions: string[];
  includedColumns: string[];
  method: string | null;
  filter: string | null;
}

export interface CheckConstraint {
  name: string;
  expression: string;
}

export interface UniqueConstraint {
  name: string;
  columns: string[];
}

export interface Table {
  id: Identifier;
  columns: Column[];
  primaryKey: PrimaryKey | null;
  foreignKeys: ForeignKey[];
  indexes: Index[];
  checks: CheckConstraint[];
  uniqueConstraints: UniqueConstraint[];
  triggers: Identifier[];
  rowCount?: ExactNumber;
  sizeKb?: ExactNumber;
  description: string | null;
}

export interface ViewColumn {
  name: string;
  dataType: DataType;
  nullable: boolean;
  description: string | null;
}

export interface View {
  id: Identifier;
  columns: ViewColumn[];
  definition: string | null;
  baseTables: Identifier[];
  materialized: boolean;
  description: string | null;
}

export type ParameterDirection = 'IN' | 'OUT' | 'INOUT';

export interface Parameter {
  name: string;
  dataType: DataType;
  direction: ParameterDirection;
  default: string | null;
}

export interface ResultColumn {
  name: string;
  dataType: DataType;
  nullable: boolean;
}

export type ReturnShape =
  | { kind: 'scalar'; dataType: DataType }
  | { kind: 'table'; columns: ResultColumn[] };

export type RoutineKind = 'procedure' | 'function';

export interface Routine {
  id: Identifier;
  kind: RoutineKind;
  parameters: Parameter[];
  returns: ReturnShape | null;
  language: string | null;
  definition: string | null;
  description: string | null;
}

export type TriggerTiming = 'BEFORE' | 'AFTER' | 'INSTEAD_OF';
export type TriggerEvent = 'INSERT' | 'UPDATE' | 'DELETE';

export interface Trigger {
  id: Identifier;
  table: Identifier;
  timing: TriggerTiming;
  events: TriggerEvent[];
  enabled: boolean;
  definition: string | null;
  description: string | null;
}

export type TypeCategory = 'ENUM' | 'COMPOSITE' | 'DOMAIN' | 'TABLE_TYPE' | 'ALIAS' | 'RANGE';

export interface TypeMember {
  name: string;
  dataType: DataType;
  nullable: boolean;
}

export interface UserDefinedType {
  id: Identifier;
  category: TypeCategory;
  baseType: DataType | null;
  nullable: boolean;
  members: TypeMember[];
  enumValues: string[];
  check: string | null;
  description: string | null;
}

export interface Sequence {
  id: Identifier;
  dataType: string;
  start: ExactNumber;
  increment: ExactNumber;
  min: ExactNumber;
  max: ExactNumber;
  cycle: boolean;
  cache: ExactNumber | null;
  current: ExactNumber | null;
  description: string | null;
}

export interface Synonym {
  id: Identifier;
  target: Identifier;
  targetServer: string | null;
  targetDatabase: string | null;
  baseObject: string;
  description: string | null;
}

export type PrincipalKind = 'USER' | 'ROLE';

export interface Permission {
  privilege: string;
  object: Identifier;
  state: string;
}

export interface SecurityPrincipal {
  kind: PrincipalKind;
  name: string;
  permissions: Permission[];
  memberOf: string[];
}

export interface SchemaGroup {
  name: string;
  tables: Table[];
  views: View[];
  procedures: Routine[];
  functions: Routine[];
  triggers: Trigger[];
  types: UserDefinedType[];
  sequences: Sequence[];
  synonyms: Synonym[];
}

export type SchemaCollection = Exclude<keyof SchemaGroup, 'name'>;

export type EdgeKind = 'foreign-key' | 'synonym';

export interface RelationshipEdge {
  kind: EdgeKind;
  source: Identifier;
  target: Identifier;
  via: string;
  columns: string[];
  targetColumns: string[];
  onDelete: ReferentialAction | null;
  onUpdate: ReferentialAction | null;
  resolved: boolean;
  /** Category of the object the target resolved to; `null` when unresolved. */
  targetType: ObjectType | null;
}

export interface ViewDependency {
  view: Identifier;
  target: Identifier;
  resolved: boolean;
  targetType: ObjectType | null;
}

export interface RelationshipGraph {
  edges: RelationshipEdge[];
  outgoing: Record<string, RelationshipEdge[]>;
  incoming: Record<string, RelationshipEdge[]>;
  dependencies: ViewDependency[];
}

export type Availability = 'available' | 'not-applicable' | 'not-requested' | 'failed';

export interface UnresolvedReferenceWarning {
  kind: 'unresolved-reference';
  source: Identifier;
  target: Identifier;
  via: string;
  reference: 'foreign-key' | 'synonym' | 'trigger-parent';
}

export interface ModelIntegrityWarning {
  kind: 'model-integrity';
  objectType: string;
  object: string;
  message: string;
}

export interface QueryFailureWarning {
  kind: 'query-failure';
  objectType: string;
  message: string;
}

export type ExtractionWarning = UnresolvedReferenceWarning | ModelIntegrityWarning | QueryFailureWarning;

export interface SchemaSnapshot {
  database: string;
  engine: DatabaseKind;
  engineVersion: string | null;
  extractedAt: string;
  schemas: SchemaGroup[];
  security: SecurityPrincipal[];
  availability: Record<ObjectType, Availability>;
  graph: RelationshipGraph;
  warnings: ExtractionWarning[];
}
