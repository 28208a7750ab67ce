import { Writable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { TableType, type Table } from '@metabridge/catalog-types';
import { createMetastoreClient } from '../client.js';
import { MAX_QUERY_RESULTS } from '../constants.js';
import { ExecutionContext } from '../context/execution-context.js';
import { runWithSharedContext } from '../context/session-scope.js';
import {
  ConfigurationError,
  ConnectionError,
  DatabaseNotFoundError,
  InvalidArgumentError,
  QueryExecutionError,
  TableNotFoundError,
  TransientRpcError,
  TruncationAmbiguityError,
} from '../errors.js';
import { createLogger, NoOpSink } from '../logging/index.js';
import { InMemoryCatalog, inMemoryConnectionFactory, nativeTable, transportFailure } from './fixtures/in-memory-catalog.js';
import { createTestClient, TEST_EPOCH } from './fixtures/test-client.js';

function clicks(overrides: Partial<Table> = {}): Table {
  return {
    name: 'clicks',
    specifiedDatabase: 'default',
    schema: [
      { name: 'user_id', type: 'bigint' },
      { name: 'url', type: 'string' },
    ],
    partitionColumns: [{ name: 'ds', type: 'string' }],
    properties: {},
    serdeProperties: {},
    tableType: TableType.MANAGED,
    ...overrides,
  };
}

function collect(chunks: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    },
  });
}

function partitionedCatalog(): InMemoryCatalog {
  const catalog = new InMemoryCatalog();
  const table = nativeTable({
    tableName: 'visits',
    partitionKeys: [
      { name: 'ds', type: 'string', comment: null },
      { name: 'hr', type: 'int', comment: null },
    ],
  });
  catalog.addTable(table);
  catalog.addPartition(table, ['2024-01-01', '1'], 'file:///warehouse/visits/ds=2024-01-01/hr=1');
  catalog.addPartition(table, ['2024-01-02', '5'], 'file:///warehouse/visits/ds=2024-01-02/hr=5');
  return catalog;
}

describe('createMetastoreClient', () => {
  it('requires a catalog version', async () => {
    await expect(
      createMetastoreClient({ connectionFactory: inMemoryConnectionFactory(new InMemoryCatalog()), env: {} })
    ).rejects.toThrow('Catalog version is required (option "version" or METABRIDGE_VERSION)');
  });

  it('rejects unsupported versions', async () => {
    await expect(createTestClient({ version: '2.0' })).rejects.toThrow(ConfigurationError);
    await expect(createTestClient({ version: '2.0' })).rejects.toThrow('Unsupported catalog version: 2.0');
  });

  it('takes the version from the environment', async () => {
    const client = await createMetastoreClient({
      connectionFactory: inMemoryConnectionFactory(new InMemoryCatalog()),
      logger: createLogger({ sink: new NoOpSink() }),
      env: { METABRIDGE_VERSION: '0.13.1' },
    });

    expect(client.version).toBe('0.13');
  });

  it('handshakes with the client configuration', async () => {
    const { catalog } = await createTestClient({ config: { 'metastore.failure.retries': '2' } });

    expect(catalog.callsTo('handshake')[0]?.args).toEqual([
      { 'user.name': 'tester', 'metastore.failure.retries': '2' },
    ]);
  });
});

describe('databases', () => {
  it('creates and reads databases', async () => {
    const { client } = await createTestClient();

    await client.createDatabase({ name: 'sales', location: '/warehouse/sales' });

    expect(await client.listDatabases()).toEqual(['default', 'sales']);
    expect(await client.getDatabase('sales')).toEqual({ name: 'sales', location: 'file:///warehouse/sales' });
  });

  it('ignores an existing database only when asked to', async () => {
    const { client } = await createTestClient();

    await client.createDatabase({ name: 'default', location: '/warehouse' }, true);
    await expect(client.createDatabase({ name: 'default', location: '/warehouse' })).rejects.toThrow(
      'AlreadyExistsException: Database default already exists'
    );
  });

  it('reports a missing database', async () => {
    const { client } = await createTestClient();

    expect(await client.getDatabaseOption('missing')).toBeUndefined();
    await expect(client.getDatabase('missing')).rejects.toThrow(DatabaseNotFoundError);
  });
});

describe('tables', () => {
  it('reads back a created table', async () => {
    const { client, catalog } = await createTestClient();

    await client.createTable(clicks());
    const table = await client.getTable('default', 'clicks');

    expect(table.tableType).toBe(TableType.MANAGED);
    expect(table.partitionColumns).toEqual([{ name: 'ds', type: 'string' }]);
    expect(table.schema).toEqual([
      { name: 'user_id', type: 'bigint' },
      { name: 'url', type: 'string' },
    ]);
    expect(catalog.tables.get('default.clicks')).toMatchObject({
      owner: 'tester',
      createTime: TEST_EPOCH / 1000,
      tableType: 'MANAGED_TABLE',
    });
  });

  it('reports a missing table', async () => {
    const { client } = await createTestClient();

    expect(await client.getTableOption('default', 'missing')).toBeUndefined();
    await expect(client.getTable('default', 'missing')).rejects.toThrow(TableNotFoundError);
    await expect(client.getTable('default', 'missing')).rejects.toThrow('Table default.missing not found');
  });

  it('validates a table before sending it', async () => {
    const { client, catalog } = await createTestClient();

    await expect(client.createTable(clicks({ specifiedDatabase: undefined }))).rejects.toThrow(InvalidArgumentError);
    expect(catalog.callsTo('createTable')).toHaveLength(0);
  });

  it('lists the tables of a database', async () => {
    const { client } = await createTestClient();
    await client.createTable(clicks());
    await client.createTable(clicks({ name: 'views' }));

    expect(await client.listTables('default')).toEqual(['clicks', 'views']);
  });

  it('alters a table in place', async () => {
    const { client } = await createTestClient();
    await client.createTable(clicks());

    await client.alterTable(clicks({ properties: { comment: 'raw clicks' } }));

    expect((await client.getTable('default', 'clicks')).properties).toEqual({ comment: 'raw clicks' });
  });

  it('alters a table addressed by name', async () => {
    const { client, catalog } = await createTestClient();
    await client.createTable(clicks());

    await client.alterTable('default.clicks', clicks({ name: 'clicks_v2' }));

    expect(await client.listTables('default')).toEqual(['clicks_v2']);
    expect(catalog.callsTo('alterTable')[0]?.args[0]).toBe('default.clicks');
  });

  it('returns a bare path location unchanged on 0.12', async () => {
    const { client } = await createTestClient({ version: '0.12' });

    await client.createTable(clicks({ location: '/data/clicks' }));

    expect((await client.getTable('default', 'clicks')).location).toBe('/data/clicks');
  });
});

describe('partitions', () => {
  it('looks partitions up through the table', async () => {
    const { client } = await createTestClient({ catalog: partitionedCatalog() });
    const table = await client.getTable('default', 'visits');

    const all = await table.catalog.getAllPartitions();
    const late = await table.catalog.getPartitionsByFilter([{ column: 'hr', operator: '>', value: 3 }]);

    expect(all.map((partition) => partition.values)).toEqual([
      ['2024-01-01', '1'],
      ['2024-01-02', '5'],
    ]);
    expect(late.map((partition) => partition.values)).toEqual([['2024-01-02', '5']]);
    expect(late[0]?.storage.location).toBe('file:///warehouse/visits/ds=2024-01-02/hr=5');
  });

  it('finds a partition by spec', async () => {
    const { client } = await createTestClient({ catalog: partitionedCatalog() });
    const table = await client.getTable('default', 'visits');

    const found = await client.getPartitionOption(table, { hr: '5', ds: '2024-01-02' });
    const missing = await client.getPartitionOption(table, { ds: '2024-01-03', hr: '1' });

    expect(found?.values).toEqual(['2024-01-02', '5']);
    expect(missing).toBeUndefined();
  });

  it('rejects specs naming other columns', async () => {
    const { client } = await createTestClient({ catalog: partitionedCatalog() });
    const table = await client.getTable('default', 'visits');

    await expect(client.getPartitionOption(table, { id: '1' })).rejects.toThrow('Not partition columns of visits: id');
  });
});

describe('loads', () => {
  it('sends the argument set of the client version', async () => {
    const { client, catalog } = await createTestClient({ version: '1.2' });

    await client.loadTable({ loadPath: '/staging/events', tableName: 'default.events', replace: true, holdDDLTime: false });
    await client.loadDynamicPartitions({
      loadPath: '/staging/visits',
      tableName: 'default.visits',
      partitionSpec: { ds: '2024-01-01', hr: '' },
      replace: false,
      numDynamicPartitions: 1,
      holdDDLTime: false,
      listBucketingEnabled: false,
    });

    expect(catalog.loads).toEqual([
      {
        loadPath: '/staging/events',
        tableName: 'default.events',
        replace: true,
        holdDDLTime: false,
        isSrcLocal: false,
        isSkewedStoreAsSubdir: false,
        isAcid: false,
      },
      {
        loadPath: '/staging/visits',
        tableName: 'default.visits',
        partSpec: { ds: '2024-01-01', hr: '' },
        replace: false,
        numDP: 1,
        holdDDLTime: false,
        listBucketingEnabled: false,
        isAcid: false,
        txnId: 0,
      },
    ]);
  });

  it('loads a partition', async () => {
    const { client, catalog } = await createTestClient({ version: '0.13' });

    await client.loadPartition({
      loadPath: '/staging/visits',
      tableName: 'default.visits',
      partitionSpec: { ds: '2024-01-01', hr: '1' },
      replace: true,
      holdDDLTime: false,
      inheritTableSpecs: true,
      isSkewedStoreAsSubdir: false,
    });

    expect(catalog.callsTo('loadPartition')).toHaveLength(1);
    expect(catalog.loads[0]).not.toHaveProperty('isAcid');
  });
});

describe('reset', () => {
  it('drops the tables of the default database and every other database', async () => {
    const catalog = new InMemoryCatalog();
    catalog.addTable(nativeTable({ tableName: 'a' }));
    catalog.addTable(nativeTable({ tableName: 'b' }));
    catalog.addIndex('default', 'a', 'by_id');
    catalog.databases.set('sales', { name: 'sales', description: '', locationUri: 'file:///warehouse/sales', parameters: {} });
    catalog.addTable(nativeTable({ dbName: 'sales', tableName: 'orders' }));
    const { client } = await createTestClient({ catalog });

    await client.reset();

    expect(await client.listTables('default')).toEqual([]);
    expect(await client.listDatabases()).toEqual(['default']);
    expect(catalog.callsTo('dropIndex').map((call) => call.args)).toEqual([
      [{ dbName: 'default', tableName: 'a', indexName: 'by_id', deleteData: true, throwException: true }],
    ]);
    expect(catalog.callsTo('getIndexes').map((call) => call.args)).toEqual([
      ['default', 'a', 255],
      ['default', 'b', 255],
    ]);
    expect(catalog.callsTo('dropDatabase').map((call) => call.args)).toEqual([['sales', true, false, true]]);
  });

  it('keeps index tables, which go with their index', async () => {
    const catalog = new InMemoryCatalog();
    catalog.addTable(nativeTable({ tableName: 'a' }));
    catalog.addTable(nativeTable({ tableName: 'a_by_id_idx', tableType: 'INDEX_TABLE' }));
    const { client } = await createTestClient({ catalog });

    await client.reset();

    expect(catalog.callsTo('dropTable').map((call) => call.args)).toEqual([['default', 'a']]);
  });
});

describe('commands', () => {
  it('applies set to the client configuration and captures its output', async () => {
    const { client } = await createTestClient();

    expect(await client.runCommand('set hive.exec.parallel=true')).toEqual(['0']);
    expect(client.configValue('hive.exec.parallel', 'false')).toBe('true');
    expect(client.capturedOutput()).toBe('set hive.exec.parallel=true\n');
  });

  it('writes command output to a redirected stream', async () => {
    const { client } = await createTestClient();
    const chunks: string[] = [];
    await client.setOutputStream(collect(chunks));

    await client.runCommand('set a=1');

    expect(chunks).toEqual(['set a=1\n']);
    expect(client.capturedOutput()).toBe('');
  });

  it('redirects output only after the command in flight has finished', async () => {
    const { client } = await createTestClient();
    const chunks: string[] = [];

    const running = client.runCommand('set a=1');
    const redirecting = client.setOutputStream(collect(chunks));
    await Promise.all([running, redirecting]);

    expect(client.capturedOutput()).toBe('set a=1\n');
    expect(chunks).toEqual([]);

    await client.runCommand('set b=2');
    expect(chunks).toEqual(['set b=2\n']);
  });

  it('keeps the error of a failed command in the captured output', async () => {
    const { client, catalog } = await createTestClient();
    const message = 'FAILED: SemanticException [Error 10001]: Table not found missing';
    catalog.commandHandler = () => ({ response: { responseCode: 10001, errorMessage: message } });

    const error = await client.runCommand('SELECT * FROM missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error).toMatchObject({ message, diagnostics: `${message}\n` });
    expect(client.capturedOutput()).toBe(`${message}\n`);
  });

  it('adds jars through the add processor', async () => {
    const { client, catalog } = await createTestClient();

    await client.addJar('/tmp/udfs.jar');

    expect(catalog.callsTo('runProcessor')[0]?.args).toEqual(['add', 'JAR /tmp/udfs.jar', { 'user.name': 'tester' }]);
  });

  it('returns query rows', async () => {
    const { client, catalog } = await createTestClient();
    catalog.commandHandler = () => ({ response: { responseCode: 0 }, rows: [['1', 'home'], ['2', null]] });

    expect(await client.runQuery('SELECT id, page FROM visits')).toEqual(['1\thome', '2\tNULL']);
  });

  it('refuses a result that may have been cut off', async () => {
    const { client, catalog } = await createTestClient();
    const rows = Array.from({ length: MAX_QUERY_RESULTS + 5 }, (_, i) => String(i));
    catalog.commandHandler = () => ({ response: { responseCode: 0 }, rows });

    await expect(client.runQuery('SELECT * FROM big')).rejects.toThrow(TruncationAmbiguityError);
    await expect(client.runCommand('SELECT * FROM big', 3)).resolves.toEqual(['0', '1', '2']);
  });

  it('tracks the current database', async () => {
    const { client } = await createTestClient();
    await client.createDatabase({ name: 'sales', location: '/warehouse/sales' });

    expect(client.currentDatabase()).toBe('default');
    await expect(client.setCurrentDatabase('missing')).rejects.toThrow(DatabaseNotFoundError);
    expect(client.currentDatabase()).toBe('default');

    await client.setCurrentDatabase('sales');
    expect(client.currentDatabase()).toBe('sales');

    await client.runCommand('use default');
    expect(client.currentDatabase()).toBe('default');
  });
});

describe('retries', () => {
  const retryConfig = {
    'metastore.failure.retries': '1',
    'metastore.client.connect.retry.delay': '10ms',
  };

  it('reconnects after a transient failure', async () => {
    const { client, catalog, sleeps } = await createTestClient({ config: retryConfig });
    catalog.failNext(transportFailure(), { method: 'getAllDatabases' });

    expect(await client.listDatabases()).toEqual(['default']);
    expect(sleeps).toEqual([10]);
    expect(catalog.handshakes).toBe(2);
    expect(client.stats()).toMatchObject({ attempts: 2, retries: 1, reconnects: 1 });
  });

  it('gives up once retries are used up', async () => {
    const { client, catalog, sleeps } = await createTestClient({ config: retryConfig });
    const reconnecting: number[] = [];
    client.on('reconnecting', ({ attempt }) => reconnecting.push(attempt));
    catalog.failNext(transportFailure(), { method: 'getAllDatabases', times: 5 });

    const error = await client.listDatabases().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientRpcError);
    expect(error).toMatchObject({ attempts: 2 });
    expect(sleeps).toEqual([10]);
    expect(reconnecting).toEqual([1]);
    expect(catalog.callsTo('getAllDatabases')).toHaveLength(2);
  });

  it('does not rerun a failed command that names a transport failure', async () => {
    const { client, catalog, sleeps } = await createTestClient({ config: retryConfig });
    catalog.commandHandler = () => ({
      response: { responseCode: 2, errorMessage: 'FAILED: Execution Error, TTransportException from the job tracker' },
    });

    await expect(client.runCommand('INSERT INTO visits SELECT * FROM staging')).rejects.toThrow(QueryExecutionError);
    expect(sleeps).toEqual([]);
    expect(catalog.callsTo('driver.run')).toHaveLength(1);
  });

  it('does not retry logical failures', async () => {
    const { client, catalog, sleeps } = await createTestClient({ config: retryConfig });

    await expect(client.createDatabase({ name: 'default', location: '/warehouse' })).rejects.toThrow(
      'AlreadyExistsException'
    );
    expect(sleeps).toEqual([]);
    expect(catalog.callsTo('createDatabase')).toHaveLength(1);
  });
});

describe('shared execution context', () => {
  it('gives every client on a shared context its own connection', async () => {
    const catalog = new InMemoryCatalog();
    const logger = createLogger({ sink: new NoOpSink() });
    const shared = ExecutionContext.shared({
      config: { 'metastore.failure.retries': '1', 'metastore.client.connect.retry.delay': '10ms' },
      logger,
    });
    const options = {
      version: '1.2',
      connectionFactory: inMemoryConnectionFactory(catalog),
      logger,
      sleep: async () => undefined,
      env: {},
    };
    const first = await runWithSharedContext(shared, () => createMetastoreClient(options));
    const second = await runWithSharedContext(shared, () => createMetastoreClient(options));
    catalog.failNext(transportFailure(), { method: 'getAllDatabases' });

    expect(await first.listDatabases()).toEqual(['default']);
    expect(await second.listDatabases()).toEqual(['default']);
    expect(first.stats().reconnects).toBe(1);
    expect(second.stats().reconnects).toBe(0);

    await first.close();
    const third = await runWithSharedContext(shared, () => createMetastoreClient(options));

    expect(await third.listDatabases()).toEqual(['default']);
    expect(await second.listDatabases()).toEqual(['default']);
    expect(catalog.handshakes).toBe(4);
  });
});

describe('close', () => {
  it('rejects calls after close', async () => {
    const { client } = await createTestClient({ catalog: partitionedCatalog() });
    const table = await client.getTable('default', 'visits');

    await client.close();

    await expect(client.listDatabases()).rejects.toThrow(ConnectionError);
    await expect(table.catalog.getAllPartitions()).rejects.toThrow('Metastore client is closed');
  });
});
