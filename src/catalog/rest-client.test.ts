import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { AxiosAdapter } from 'axios';
import type { S3ConnectionOptions } from '../storage/object-store';
import { MemoryObjectStore } from '../testing/memory-object-store';
import { decodeRecords, readContainer } from './avro';
import { writeManifestList } from './manifest';
import { createCatalogHttp, RestCatalogClient } from './rest-client';
import { CatalogRequestError, type LoadedTable } from './types';

type Call = {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
  authorization: unknown;
  delegation: unknown;
};

type Reply = { status: number; body?: unknown; raw?: string };

const createFakeCatalog = (routes: Record<string, (call: Call) => Reply>) => {
  const calls: Call[] = [];
  const adapter: AxiosAdapter = async (config) => {
    const call: Call = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
      authorization: config.headers.get('Authorization'),
      delegation: config.headers.get('X-Iceberg-Access-Delegation'),
    };
    calls.push(call);

    const route = routes[`${call.method} ${call.url}`];
    const reply: Reply = route
      ? route(call)
      : { status: 404, body: { error: { message: `Not found: ${call.url}`, type: 'NoSuchTableException', code: 404 } } };

    return {
      data: reply.raw ?? (reply.body === undefined ? '' : JSON.stringify(reply.body)),
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
  };

  return { calls, http: createCatalogHttp({ endpoint: 'http://catalog.test/api/', token: 'test-token', adapter }) };
};

const CONFIG_ROUTE = {
  'GET /v1/config': () => ({ status: 200, body: { defaults: {}, overrides: { prefix: 'test-prefix' } } }),
};

const TABLE_URL = '/v1/test-prefix/namespaces/analytics/tables/events';

const tableMetadata = (overrides: Record<string, unknown> = {}) => ({
  'format-version': 2,
  'table-uuid': 'uuid-1',
  location: 's3://test-warehouse/analytics/events',
  'last-sequence-number': 0,
  'current-schema-id': 0,
  schemas: [{ type: 'struct', 'schema-id': 0, fields: [{ id: 1, name: 'id', required: false, type: 'long' }] }],
  'current-snapshot-id': -1,
  snapshots: [],
  refs: {},
  properties: {},
  ...overrides,
});

const createClient = (routes: Record<string, (call: Call) => Reply>, store = new MemoryObjectStore()) => {
  const catalog = createFakeCatalog({ ...CONFIG_ROUTE, ...routes });
  const storeOptions: S3ConnectionOptions[] = [];
  const client = new RestCatalogClient({
    warehouse: 'test-warehouse',
    http: catalog.http,
    storage: { region: 'us-east-1' },
    objectStoreFactory: (options) => {
      storeOptions.push(options);
      return store;
    },
    now: () => 1_700_000_000_000,
  });
  return { client, calls: catalog.calls, store, storeOptions };
};

describe('RestCatalogClient', () => {
  it('resolves the warehouse prefix and sends the bearer token', async () => {
    const { client, calls } = createClient({
      'GET /v1/test-prefix/namespaces/analytics%1Fdaily': () => ({ status: 200, body: { namespace: ['analytics', 'daily'] } }),
    });

    await client.connect();
    expect(await client.namespaceExists(['analytics', 'daily'])).toBe(true);

    expect(calls[0]).toMatchObject({ url: '/v1/config', params: { warehouse: 'test-warehouse' }, authorization: 'Bearer test-token' });
    expect(calls[1].url).toBe('/v1/test-prefix/namespaces/analytics%1Fdaily');
  });

  it('treats 404 as absent', async () => {
    const { client } = createClient({});
    await client.connect();

    expect(await client.namespaceExists(['analytics'])).toBe(false);
    expect(await client.loadTable(['analytics'], 'events')).toBeUndefined();
  });

  it('raises catalog errors with status and type', async () => {
    const { client } = createClient({
      'POST /v1/test-prefix/namespaces': () => ({
        status: 409,
        body: { error: { message: 'Namespace already exists: analytics', type: 'AlreadyExistsException', code: 409 } },
      }),
    });
    await client.connect();

    const err = await client.createNamespace(['analytics']).catch((caught: unknown) => caught);
    expect(err).toBeInstanceOf(CatalogRequestError);
    expect(err).toMatchObject({ status: 409, errorType: 'AlreadyExistsException', message: 'Namespace already exists: analytics' });
  });

  it('describes error responses without a body', async () => {
    const { client } = createClient({ [`GET ${TABLE_URL}`]: () => ({ status: 500, raw: 'Internal error' }) });
    await client.connect();

    await expect(client.loadTable(['analytics'], 'events')).rejects.toThrow(`GET ${TABLE_URL} answered 500`);
  });

  it('reports an unreachable catalog without a status', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:8181');
    };
    const client = new RestCatalogClient({
      warehouse: 'test-warehouse',
      http: createCatalogHttp({ endpoint: 'http://catalog.test', adapter }),
      storage: { region: 'us-east-1' },
    });

    const err = await client.connect().catch((caught: unknown) => caught);
    expect(err).toBeInstanceOf(CatalogRequestError);
    expect(err).toMatchObject({ status: undefined, message: 'GET /v1/config: connect ECONNREFUSED 127.0.0.1:8181' });
  });

  it('loads tables with 64-bit snapshot ids', async () => {
    const raw = JSON.stringify({
      'metadata-location': 's3://test-warehouse/analytics/events/metadata/v2.metadata.json',
      metadata: tableMetadata({
        'last-sequence-number': 1,
        'current-snapshot-id': 'BIG',
        refs: { main: { 'snapshot-id': 'BIG', type: 'branch' } },
        snapshots: [
          {
            'snapshot-id': 'BIG',
            'sequence-number': 1,
            'manifest-list': 's3://test-warehouse/analytics/events/metadata/snap.avro',
            summary: { operation: 'append', 'lakeload.source-file': 's3://test-bucket/data/a.parquet' },
          },
        ],
      }),
    })
      .split('"BIG"')
      .join('9223372036854775807');
    const { client, calls } = createClient({ [`GET ${TABLE_URL}`]: () => ({ status: 200, raw }) });
    await client.connect();

    const table = await client.loadTable(['analytics'], 'events');

    expect(calls[1].delegation).toBe('vended-credentials');
    expect(table?.currentSnapshotId).toBe(9223372036854775807n);
    expect(table?.snapshots[0].summary['lakeload.source-file']).toBe('s3://test-bucket/data/a.parquet');
    expect(table?.schema.columns).toEqual([{ id: 1, name: 'id', required: false, type: { kind: 'primitive', name: 'long' } }]);
    expect(JSON.parse(table?.schemaJson ?? '')).toEqual({
      type: 'struct',
      'schema-id': 0,
      fields: [{ id: 1, name: 'id', required: false, type: 'long' }],
    });
  });

  it('creates tables with field ids and a name mapping', async () => {
    const { client, calls } = createClient({
      'POST /v1/test-prefix/namespaces/analytics/tables': () => ({ status: 200, body: { metadata: tableMetadata() } }),
    });
    await client.connect();

    const table = await client.createTable(['analytics'], 'events', {
      schemaId: 0,
      columns: [{ id: 1, name: 'id', required: false, type: { kind: 'primitive', name: 'long' } }],
    });

    expect(table.currentSnapshotId).toBeUndefined();
    expect(calls[1].body).toEqual({
      name: 'events',
      schema: { type: 'struct', 'schema-id': 0, fields: [{ id: 1, name: 'id', required: false, type: 'long' }] },
      'partition-spec': { 'spec-id': 0, fields: [] },
      'write-order': { 'order-id': 0, fields: [] },
      'stage-create': false,
      properties: {
        'format-version': '2',
        'schema.name-mapping.default': '[{"field-id":1,"names":["id"]}]',
      },
    });
  });

  describe('appendFile', () => {
    let dir: string;
    let dataFile: string;
    const contents = 'PAR1 test rows PAR1';

    beforeAll(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rest-client-test-'));
      dataFile = path.join(dir, 'a.parquet');
      await fs.writeFile(dataFile, contents);
    });

    afterAll(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    const setup = async (metadata: Record<string, unknown>, store = new MemoryObjectStore()) => {
      const context = createClient(
        {
          [`GET ${TABLE_URL}`]: () => ({
            status: 200,
            body: {
              metadata,
              config: {
                's3.access-key-id': 'test-access-key',
                's3.secret-access-key': 'test-secret',
                's3.endpoint': 'http://localhost:9000',
                's3.path-style-access': 'true',
              },
            },
          }),
          [`POST ${TABLE_URL}`]: () => ({
            status: 200,
            body: { metadata: tableMetadata({ 'current-snapshot-id': 42, 'last-sequence-number': 1 }) },
          }),
        },
        store
      );
      await context.client.connect();
      const table = await context.client.loadTable(['analytics'], 'events');
      if (!table) throw new Error('table fixture did not load');
      return { ...context, table };
    };

    const commitBody = (calls: Call[]): unknown => calls[calls.length - 1].body;

    it('writes the data file and manifests, then commits one snapshot', async () => {
      const { client, calls, store, storeOptions, table } = await setup(tableMetadata());

      const committed: LoadedTable = await client.appendFile(table, {
        localPath: dataFile,
        rows: 3,
        sourceFile: 's3://test-bucket/data/a.parquet',
        snapshotId: 42n,
      });

      const size = String(Buffer.byteLength(contents));
      expect(committed.currentSnapshotId).toBe(42n);
      expect(storeOptions).toEqual([
        {
          region: 'us-east-1',
          endpoint: 'http://localhost:9000',
          forcePathStyle: true,
          credentials: { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret', sessionToken: undefined },
        },
      ]);

      const keys = [...store.objects.keys()];
      expect(keys).toHaveLength(3);
      expect(keys[0]).toMatch(/^test-warehouse\/analytics\/events\/data\/[0-9a-f-]+\.parquet$/);
      expect(keys[1]).toMatch(/^test-warehouse\/analytics\/events\/metadata\/[0-9a-f-]+-m0\.avro$/);
      expect(keys[2]).toMatch(/^test-warehouse\/analytics\/events\/metadata\/snap-42-1-[0-9a-f-]+\.avro$/);

      expect(commitBody(calls)).toEqual({
        identifier: { namespace: ['analytics'], name: 'events' },
        requirements: [
          { type: 'assert-table-uuid', uuid: 'uuid-1' },
          { type: 'assert-ref-snapshot-id', ref: 'main', 'snapshot-id': null },
        ],
        updates: [
          {
            action: 'set-properties',
            updates: { 'schema.name-mapping.default': '[{"field-id":1,"names":["id"]}]' },
          },
          {
            action: 'add-snapshot',
            snapshot: {
              'snapshot-id': 42,
              'sequence-number': 1,
              'timestamp-ms': 1_700_000_000_000,
              'manifest-list': expect.stringMatching(/^s3:\/\/test-warehouse\/analytics\/events\/metadata\/snap-42-1-/),
              summary: {
                operation: 'append',
                'added-data-files': '1',
                'added-records': '3',
                'added-files-size': size,
                'lakeload.source-file': 's3://test-bucket/data/a.parquet',
                'total-data-files': '1',
                'total-records': '3',
                'total-files-size': size,
              },
              'schema-id': 0,
            },
          },
          { action: 'set-snapshot-ref', 'ref-name': 'main', type: 'branch', 'snapshot-id': 42 },
        ],
      });
    });

    it('carries the parent manifests and totals forward', async () => {
      const store = new MemoryObjectStore();
      store.put(
        'test-warehouse',
        'analytics/events/metadata/snap-41.avro',
        writeManifestList({
          snapshotId: 41n,
          sequenceNumber: 1n,
          manifest: { path: 's3://test-warehouse/analytics/events/metadata/old-m0.avro', length: 700, rows: 5 },
        })
      );
      const { client, calls, table } = await setup(
        tableMetadata({
          'last-sequence-number': 1,
          'current-snapshot-id': 41,
          refs: { main: { 'snapshot-id': 41, type: 'branch' } },
          snapshots: [
            {
              'snapshot-id': 41,
              'sequence-number': 1,
              'manifest-list': 's3://test-warehouse/analytics/events/metadata/snap-41.avro',
              summary: { operation: 'append', 'total-data-files': '1', 'total-records': '5', 'total-files-size': '100' },
            },
          ],
          properties: { 'schema.name-mapping.default': '[{"field-id":1,"names":["id"]}]' },
        }),
        store
      );

      await client.appendFile(table, {
        localPath: dataFile,
        rows: 3,
        sourceFile: 's3://test-bucket/data/b.parquet',
        snapshotId: 42n,
      });

      const listKey = [...store.objects.keys()].find((key) => key.includes('/metadata/snap-42-1-'));
      const list = readContainer(store.objects.get(listKey ?? '') ?? Buffer.alloc(0));
      expect(decodeRecords(list)).toEqual([
        expect.objectContaining({ added_snapshot_id: 41, added_rows_count: 5 }),
        expect.objectContaining({ added_snapshot_id: 42, added_rows_count: 3, sequence_number: 2 }),
      ]);

      expect(commitBody(calls)).toMatchObject({
        requirements: [
          { type: 'assert-table-uuid', uuid: 'uuid-1' },
          { type: 'assert-ref-snapshot-id', ref: 'main', 'snapshot-id': 41 },
        ],
        updates: [
          {
            action: 'add-snapshot',
            snapshot: {
              'parent-snapshot-id': 41,
              'sequence-number': 2,
              summary: {
                'total-data-files': '2',
                'total-records': '8',
                'total-files-size': String(100 + Buffer.byteLength(contents)),
              },
            },
          },
          { action: 'set-snapshot-ref', 'snapshot-id': 42 },
        ],
      });
    });
  });
});
