/**
 * In-process metastore used by the tests, with failure injection.
 */

import { createConnectionFactory } from '../../connection/handle.js';
import type { ConnectionFactory, ConnectionHandle } from '../../connection/types.js';
import type {
  MetastoreApi,
  NativeCommandResponse,
  NativeDatabase,
  NativeDriver,
  NativeDropIndexArgs,
  NativeHandshake,
  NativeIndex,
  NativeLoadDynamicPartitionsArgs,
  NativeLoadPartitionArgs,
  NativeLoadTableArgs,
  NativePartition,
  NativeResultRow,
  NativeTable,
} from '../../native.js';

export interface RecordedCall {
  method: string;
  args: unknown[];
}

export interface CommandOutcome {
  response: NativeCommandResponse;
  rows?: NativeResultRow[];
}

export type CommandHandler = (command: string) => CommandOutcome;

interface InjectedFailure {
  method: string | undefined;
  error: Error;
  remaining: number;
}

type Comparison = '=' | '<>' | '<' | '<=' | '>' | '>=';

const FILTER_CLAUSE = /^(\w+) (=|<>|<=|>=|<|>) ("[^"]*"|-?\d+(?:\.\d+)?)$/;

function order(left: string, literal: string): number {
  if (literal.startsWith('"')) {
    const right = literal.slice(1, -1);
    return left === right ? 0 : left < right ? -1 : 1;
  }
  return Number(left) - Number(literal);
}

function compare(left: string, operator: Comparison, literal: string): boolean {
  const result = order(left, literal);
  switch (operator) {
    case '=':
      return result === 0;
    case '<>':
      return result !== 0;
    case '<':
      return result < 0;
    case '<=':
      return result <= 0;
    case '>':
      return result > 0;
    case '>=':
      return result >= 0;
  }
}

function isComparison(value: string): value is Comparison {
  return ['=', '<>', '<', '<=', '>', '>='].includes(value);
}

function key(dbName: string, tableName: string): string {
  return `${dbName}.${tableName}`.toLowerCase();
}

export function nativeTable(overrides: Partial<NativeTable> = {}): NativeTable {
  return {
    tableName: 'events',
    dbName: 'default',
    owner: 'tester',
    createTime: 1700000000,
    tableType: 'MANAGED_TABLE',
    partitionKeys: [],
    parameters: {},
    viewOriginalText: null,
    viewExpandedText: null,
    sd: {
      cols: [{ name: 'id', type: 'bigint', comment: null }],
      location: null,
      inputFormat: null,
      outputFormat: null,
      serdeInfo: { name: null, serializationLib: null, parameters: {} },
    },
    ...overrides,
  };
}

class FakeDriver implements NativeDriver {
  private rows: NativeResultRow[] = [];
  private maxRows = Number.POSITIVE_INFINITY;
  closed = false;

  constructor(
    private readonly catalog: InMemoryCatalog,
    private readonly handler: CommandHandler
  ) {}

  async run(command: string): Promise<NativeCommandResponse> {
    this.catalog.record('driver.run', [command]);
    const outcome = this.handler(command);
    this.rows = outcome.rows ?? [];
    return outcome.response;
  }

  async setMaxRows(maxRows: number): Promise<void> {
    this.catalog.record('driver.setMaxRows', [maxRows]);
    this.maxRows = maxRows;
  }

  async getResults(): Promise<string[]> {
    this.catalog.record('driver.getResults', []);
    return this.rows.slice(0, this.maxRows).map((row) => (typeof row === 'string' ? row : row.join('|')));
  }

  async getResultRows(): Promise<NativeResultRow[]> {
    this.catalog.record('driver.getResultRows', []);
    return this.rows.slice(0, this.maxRows);
  }

  async close(): Promise<void> {
    this.catalog.record('driver.close', []);
    this.closed = true;
  }
}

export class InMemoryCatalog implements MetastoreApi {
  readonly calls: RecordedCall[] = [];
  readonly databases = new Map<string, NativeDatabase>();
  readonly tables = new Map<string, NativeTable>();
  readonly partitions = new Map<string, NativePartition[]>();
  readonly indexes = new Map<string, NativeIndex[]>();
  readonly loads: Array<NativeLoadPartitionArgs | NativeLoadTableArgs | NativeLoadDynamicPartitionsArgs> = [];
  readonly drivers: FakeDriver[] = [];
  handshakes = 0;
  commandHandler: CommandHandler = () => ({ response: { responseCode: 0 }, rows: [] });

  private readonly failures: InjectedFailure[] = [];

  constructor() {
    this.databases.set('default', {
      name: 'default',
      description: 'Default database',
      locationUri: 'file:///warehouse',
      parameters: {},
    });
  }

  /**
   * Makes the next `times` calls (of `method`, or of any method) throw.
   */
  failNext(error: Error, options: { method?: string; times?: number } = {}): void {
    this.failures.push({ method: options.method, error, remaining: options.times ?? 1 });
  }

  record(method: string, args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.failures.find((f) => f.remaining > 0 && (f.method === undefined || f.method === method));
    if (failure) {
      failure.remaining--;
      throw failure.error;
    }
  }

  callsTo(method: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  addTable(table: NativeTable): void {
    this.tables.set(key(table.dbName, table.tableName), structuredClone(table));
  }

  addPartition(table: NativeTable, values: string[], location: string): void {
    const partitions = this.partitions.get(key(table.dbName, table.tableName)) ?? [];
    partitions.push({
      values,
      dbName: table.dbName,
      tableName: table.tableName,
      sd: { ...structuredClone(table.sd), location },
    });
    this.partitions.set(key(table.dbName, table.tableName), partitions);
  }

  addIndex(dbName: string, tableName: string, indexName: string): void {
    const indexes = this.indexes.get(key(dbName, tableName)) ?? [];
    indexes.push({ indexName, origTableName: tableName, indexTableName: `${tableName}_${indexName}_idx` });
    this.indexes.set(key(dbName, tableName), indexes);
  }

  // ===========================================================================
  // MetastoreApi
  // ===========================================================================

  async handshake(config: Record<string, string>): Promise<NativeHandshake> {
    this.record('handshake', [config]);
    this.handshakes++;
    return { sessionId: `session-${this.handshakes}`, serverVersion: 'in-memory' };
  }

  async createDatabase(database: NativeDatabase, ignoreIfExists: boolean): Promise<void> {
    this.record('createDatabase', [database, ignoreIfExists]);
    if (this.databases.has(database.name)) {
      if (ignoreIfExists) {
        return;
      }
      throw new Error(`AlreadyExistsException: Database ${database.name} already exists`);
    }
    this.databases.set(database.name, structuredClone(database));
  }

  async getDatabase(name: string): Promise<NativeDatabase | null> {
    this.record('getDatabase', [name]);
    const database = this.databases.get(name);
    return database ? structuredClone(database) : null;
  }

  async getAllDatabases(): Promise<string[]> {
    this.record('getAllDatabases', []);
    return [...this.databases.keys()].sort();
  }

  async dropDatabase(name: string, deleteData: boolean, ignoreUnknownDb: boolean, cascade: boolean): Promise<void> {
    this.record('dropDatabase', [name, deleteData, ignoreUnknownDb, cascade]);
    if (!this.databases.has(name)) {
      if (ignoreUnknownDb) {
        return;
      }
      throw new Error(`NoSuchObjectException: ${name}`);
    }
    for (const [tableKey, table] of this.tables) {
      if (table.dbName === name) {
        this.tables.delete(tableKey);
      }
    }
    this.databases.delete(name);
  }

  async getTable(dbName: string, tableName: string): Promise<NativeTable | null> {
    this.record('getTable', [dbName, tableName]);
    const table = this.tables.get(key(dbName, tableName));
    return table ? structuredClone(table) : null;
  }

  async getAllTables(dbName: string): Promise<string[]> {
    this.record('getAllTables', [dbName]);
    return [...this.tables.values()].filter((table) => table.dbName === dbName).map((table) => table.tableName);
  }

  async createTable(table: NativeTable): Promise<void> {
    this.record('createTable', [table]);
    if (!this.databases.has(table.dbName)) {
      throw new Error(`InvalidObjectException: Database ${table.dbName} does not exist`);
    }
    if (this.tables.has(key(table.dbName, table.tableName))) {
      throw new Error(`AlreadyExistsException: Table ${table.tableName} already exists`);
    }
    this.addTable(table);
  }

  async alterTable(qualifiedName: string, table: NativeTable): Promise<void> {
    this.record('alterTable', [qualifiedName, table]);
    const existing = qualifiedName.toLowerCase();
    if (!this.tables.has(existing)) {
      throw new Error(`InvalidOperationException: Table ${qualifiedName} does not exist`);
    }
    this.tables.delete(existing);
    this.addTable(table);
  }

  async dropTable(dbName: string, tableName: string): Promise<void> {
    this.record('dropTable', [dbName, tableName]);
    if (!this.tables.delete(key(dbName, tableName))) {
      throw new Error(`NoSuchObjectException: ${dbName}.${tableName}`);
    }
    this.partitions.delete(key(dbName, tableName));
  }

  async getIndexes(dbName: string, tableName: string, max: number): Promise<NativeIndex[]> {
    this.record('getIndexes', [dbName, tableName, max]);
    return (this.indexes.get(key(dbName, tableName)) ?? []).slice(0, max);
  }

  async dropIndex(args: NativeDropIndexArgs): Promise<void> {
    this.record('dropIndex', [args]);
    const indexes = this.indexes.get(key(args.dbName, args.tableName)) ?? [];
    this.indexes.set(
      key(args.dbName, args.tableName),
      indexes.filter((index) => index.indexName !== args.indexName)
    );
  }

  async getPartition(
    table: NativeTable,
    partSpec: Record<string, string>,
    _forceCreate: boolean
  ): Promise<NativePartition | null> {
    this.record('getPartition', [table, partSpec]);
    const wanted = table.partitionKeys.map((column) => partSpec[column.name]);
    const found = this.partitionsOf(table).find((partition) =>
      wanted.every((value, i) => partition.values?.[i] === value)
    );
    return found ? structuredClone(found) : null;
  }

  async getAllPartitionsForPruner(table: NativeTable): Promise<NativePartition[]> {
    this.record('getAllPartitionsForPruner', [table]);
    return structuredClone(this.partitionsOf(table));
  }

  async getAllPartitionsOf(table: NativeTable): Promise<NativePartition[]> {
    this.record('getAllPartitionsOf', [table]);
    return structuredClone(this.partitionsOf(table));
  }

  async getPartitionsByFilter(table: NativeTable, filter: string): Promise<NativePartition[]> {
    this.record('getPartitionsByFilter', [table, filter]);
    const positions = new Map(table.partitionKeys.map((column, i) => [column.name, i]));
    const clauses = filter.split(' and ').map((clause) => {
      const match = FILTER_CLAUSE.exec(clause);
      const operator = match?.[2];
      const position = match?.[1] === undefined ? undefined : positions.get(match[1]);
      if (!match?.[3] || operator === undefined || !isComparison(operator) || position === undefined) {
        throw new Error(`MetaException: Error parsing partition filter: ${clause}`);
      }
      return { position, operator, literal: match[3] };
    });
    return structuredClone(
      this.partitionsOf(table).filter((partition) =>
        clauses.every(({ position, operator, literal }) =>
          compare(partition.values?.[position] ?? '', operator, literal)
        )
      )
    );
  }

  async loadPartition(args: NativeLoadPartitionArgs): Promise<void> {
    this.record('loadPartition', [args]);
    this.loads.push(args);
  }

  async loadTable(args: NativeLoadTableArgs): Promise<void> {
    this.record('loadTable', [args]);
    this.loads.push(args);
  }

  async loadDynamicPartitions(args: NativeLoadDynamicPartitionsArgs): Promise<void> {
    this.record('loadDynamicPartitions', [args]);
    this.loads.push(args);
  }

  async openDriver(config: Record<string, string>): Promise<NativeDriver> {
    this.record('openDriver', [config]);
    const driver = new FakeDriver(this, this.commandHandler);
    this.drivers.push(driver);
    return driver;
  }

  async runProcessor(processor: string, args: string, config: Record<string, string>): Promise<NativeCommandResponse> {
    this.record('runProcessor', [processor, args, config]);
    return { responseCode: 0 };
  }

  private partitionsOf(table: NativeTable): NativePartition[] {
    return this.partitions.get(key(table.dbName, table.tableName)) ?? [];
  }
}

/**
 * Connection factory whose connections all reach the given catalog. Calls on
 * a closed connection reject.
 */
export function inMemoryConnectionFactory(catalog: InMemoryCatalog): ConnectionFactory {
  let transports = 0;
  return createConnectionFactory(async () => {
    const transport = ++transports;
    let closed = false;
    const target: MetastoreApi = catalog;
    const api = new Proxy(target, {
      get(apiTarget, property) {
        const value: unknown = Reflect.get(apiTarget, property);
        if (typeof value !== 'function') {
          return value;
        }
        if (closed) {
          return async () => {
            throw new Error(`transport ${transport} closed`);
          };
        }
        return value.bind(apiTarget);
      },
    });
    return {
      api,
      close: () => {
        closed = true;
      },
    };
  });
}

/**
 * A bare handle on the catalog, for calling adapters directly.
 */
export function inMemoryHandle(catalog: InMemoryCatalog, id = 1): ConnectionHandle {
  return {
    id,
    sessionId: `session-${id}`,
    serverVersion: 'in-memory',
    openedAt: 0,
    api: catalog,
    close: async () => undefined,
  };
}

/**
 * An error carrying a transport failure marker.
 */
export function transportFailure(message = 'TTransportException: java.net.SocketException: Broken pipe'): Error {
  return new Error(message);
}
