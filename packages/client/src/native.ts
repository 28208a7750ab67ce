/**
 * @metabridge/client - Native catalog records and RPC surface
 *
 * Shapes spoken by the remote metastore service. The method set is the union
 * of every supported protocol release; the protocol adapters decide which
 * methods and argument sets a given release understands.
 *
 * @packageDocumentation
 */

import { z, type ZodError } from 'zod';
import { CatalogConsistencyError } from './errors.js';

// =============================================================================
// Native Records
// =============================================================================

/** Native table kinds. */
export const NativeTableType = {
  MANAGED_TABLE: 'MANAGED_TABLE',
  EXTERNAL_TABLE: 'EXTERNAL_TABLE',
  VIRTUAL_VIEW: 'VIRTUAL_VIEW',
  INDEX_TABLE: 'INDEX_TABLE',
} as const;

export type NativeTableType = typeof NativeTableType[keyof typeof NativeTableType];

const StringMapSchema = z.record(z.string(), z.string());

export const FieldSchemaSchema = z.object({
  name: z.string().min(1),
  type: z.string(),
  comment: z.string().nullable(),
});

export type FieldSchema = z.infer<typeof FieldSchemaSchema>;

export const SerDeInfoSchema = z.object({
  name: z.string().nullable(),
  serializationLib: z.string().nullable(),
  parameters: StringMapSchema,
});

export type SerDeInfo = z.infer<typeof SerDeInfoSchema>;

export const NativeStorageDescriptorSchema = z.object({
  cols: z.array(FieldSchemaSchema),
  location: z.string().nullable(),
  inputFormat: z.string().nullable(),
  outputFormat: z.string().nullable(),
  serdeInfo: SerDeInfoSchema,
});

export type NativeStorageDescriptor = z.infer<typeof NativeStorageDescriptorSchema>;

export const NativeDatabaseSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  locationUri: z.string(),
  parameters: StringMapSchema,
});

export type NativeDatabase = z.infer<typeof NativeDatabaseSchema>;

export const NativeTableSchema = z.object({
  tableName: z.string().min(1),
  dbName: z.string().min(1),
  owner: z.string(),
  /** Seconds since the epoch */
  createTime: z.number(),
  /** Kept as a plain string: the service may send kinds this client does not know */
  tableType: z.string(),
  partitionKeys: z.array(FieldSchemaSchema),
  parameters: StringMapSchema,
  viewOriginalText: z.string().nullable(),
  viewExpandedText: z.string().nullable(),
  sd: NativeStorageDescriptorSchema,
});

export type NativeTable = z.infer<typeof NativeTableSchema>;

export const NativePartitionSchema = z.object({
  values: z.array(z.string()).nullable(),
  dbName: z.string(),
  tableName: z.string(),
  sd: NativeStorageDescriptorSchema,
});

export type NativePartition = z.infer<typeof NativePartitionSchema>;

export const NativeIndexSchema = z.object({
  indexName: z.string().min(1),
  origTableName: z.string(),
  indexTableName: z.string(),
});

export type NativeIndex = z.infer<typeof NativeIndexSchema>;

// =============================================================================
// Load Requests
// =============================================================================

export interface NativeLoadPartitionArgs {
  loadPath: string;
  tableName: string;
  partSpec: Record<string, string>;
  replace: boolean;
  holdDDLTime: boolean;
  inheritTableSpecs: boolean;
  isSkewedStoreAsSubdir: boolean;
  /** Sent from 0.14 on */
  isSrcLocal?: boolean;
  /** Sent from 0.14 on */
  isAcid?: boolean;
}

export interface NativeLoadTableArgs {
  loadPath: string;
  tableName: string;
  replace: boolean;
  holdDDLTime: boolean;
  /** Sent from 0.14 on */
  isSrcLocal?: boolean;
  /** Sent from 0.14 on */
  isSkewedStoreAsSubdir?: boolean;
  /** Sent from 0.14 on */
  isAcid?: boolean;
}

export interface NativeLoadDynamicPartitionsArgs {
  loadPath: string;
  tableName: string;
  partSpec: Record<string, string>;
  replace: boolean;
  numDP: number;
  holdDDLTime: boolean;
  listBucketingEnabled: boolean;
  /** Sent from 0.14 on */
  isAcid?: boolean;
  /** Sent from 1.2 on */
  txnId?: number;
}

export interface NativeDropIndexArgs {
  dbName: string;
  tableName: string;
  indexName: string;
  deleteData: boolean;
  /** Sent from 1.1 on */
  throwException?: boolean;
}

// =============================================================================
// Command Processing
// =============================================================================

/** A single field of a result row. */
export const NativeFieldSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type NativeField = z.infer<typeof NativeFieldSchema>;

/** A result row: already rendered text, or one entry per column. */
export const NativeResultRowSchema = z.union([z.string(), z.array(NativeFieldSchema)]);

export type NativeResultRow = z.infer<typeof NativeResultRowSchema>;

/**
 * Renders a result row as text, fields separated by tabs.
 */
export function formatResultRow(row: NativeResultRow): string {
  if (typeof row === 'string') {
    return row;
  }
  return row.map((field) => (field === null ? 'NULL' : String(field))).join('\t');
}

export const NativeCommandResponseSchema = z.object({
  responseCode: z.number().int(),
  errorMessage: z.string().nullish(),
  sqlState: z.string().nullish(),
  /** What the command printed to its output stream */
  output: z.string().nullish(),
  /** What the command printed to its error stream */
  errorOutput: z.string().nullish(),
  /** Progress and timing notices */
  info: z.string().nullish(),
});

export type NativeCommandResponse = z.infer<typeof NativeCommandResponseSchema>;

/**
 * A query-capable command processor living on the service.
 */
export interface NativeDriver {
  run(command: string): Promise<NativeCommandResponse>;
  setMaxRows(maxRows: number): Promise<void>;
  /** Text rows; the only result call 0.12 understands */
  getResults(): Promise<string[]>;
  /** Rows as text or as field arrays; 0.13 and later */
  getResultRows(): Promise<NativeResultRow[]>;
  close(): Promise<void>;
}

/**
 * Handshake reply identifying the remote session.
 */
export const NativeHandshakeSchema = z.object({
  sessionId: z.string(),
  serverVersion: z.string(),
});

export type NativeHandshake = z.infer<typeof NativeHandshakeSchema>;

// =============================================================================
// Reply Validation
// =============================================================================

/**
 * Checks a reply of the remote service against its schema.
 *
 * @throws {CatalogConsistencyError} When the reply does not match
 */
export function parseReply<T>(schema: z.ZodType<T>, call: string, reply: unknown): T {
  const result = schema.safeParse(reply);
  if (!result.success) {
    throw new CatalogConsistencyError(`Malformed ${call} reply: ${describeIssues(result.error)}`, {
      call,
      issues: result.error.issues,
    });
  }
  return result.data;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// =============================================================================
// Remote API
// =============================================================================

/**
 * Remote metastore service surface.
 */
export interface MetastoreApi {
  handshake(config: Record<string, string>): Promise<NativeHandshake>;

  createDatabase(database: NativeDatabase, ignoreIfExists: boolean): Promise<void>;
  getDatabase(name: string): Promise<NativeDatabase | null>;
  getAllDatabases(): Promise<string[]>;
  dropDatabase(name: string, deleteData: boolean, ignoreUnknownDb: boolean, cascade: boolean): Promise<void>;

  getTable(dbName: string, tableName: string): Promise<NativeTable | null>;
  getAllTables(dbName: string): Promise<string[]>;
  createTable(table: NativeTable): Promise<void>;
  alterTable(qualifiedName: string, table: NativeTable): Promise<void>;
  dropTable(dbName: string, tableName: string): Promise<void>;

  getIndexes(dbName: string, tableName: string, max: number): Promise<NativeIndex[]>;
  dropIndex(args: NativeDropIndexArgs): Promise<void>;

  getPartition(table: NativeTable, partSpec: Record<string, string>, forceCreate: boolean): Promise<NativePartition | null>;
  getAllPartitionsForPruner(table: NativeTable): Promise<NativePartition[]>;
  getAllPartitionsOf(table: NativeTable): Promise<NativePartition[]>;
  getPartitionsByFilter(table: NativeTable, filter: string): Promise<NativePartition[]>;

  loadPartition(args: NativeLoadPartitionArgs): Promise<void>;
  loadTable(args: NativeLoadTableArgs): Promise<void>;
  loadDynamicPartitions(args: NativeLoadDynamicPartitionsArgs): Promise<void>;

  openDriver(config: Record<string, string>): Promise<NativeDriver>;
  runProcessor(processor: string, args: string, config: Record<string, string>): Promise<NativeCommandResponse>;
}
