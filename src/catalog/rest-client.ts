import { randomUUID } from 'node:crypto';
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import JSONbig from 'json-bigint';
import { z } from 'zod';
import { formatError } from '../engine/logger';
import {
  createS3Client,
  parseS3Location,
  S3ObjectStore,
  type ObjectStore,
  type S3ConnectionOptions,
} from '../storage/object-store';
import { buildNameMapping, parseIcebergType, toSchemaJson, type TableSchema } from './iceberg-types';
import { writeManifest, writeManifestList } from './manifest';
import {
  CatalogRequestError,
  NAME_MAPPING_PROPERTY,
  SOURCE_FILE_PROPERTY,
  type AppendRequest,
  type CatalogClient,
  type LoadedTable,
  type Snapshot,
} from './types';

export const CATALOG_TIMEOUT_MS = 30_000;

// Snapshot ids written by other engines use the full signed 64-bit range.
const JSONBig = JSONbig({ useNativeBigInt: true });

const LongField = z.union([z.bigint(), z.number().int()]).transform((value) => BigInt(value));

const StringRecord = z.record(z.string(), z.unknown()).transform((record) => {
  const strings: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    strings[key] = typeof value === 'string' ? value : JSONBig.stringify(value);
  }
  return strings;
});

const ConfigResponse = z.object({
  defaults: StringRecord.optional(),
  overrides: StringRecord.optional(),
});

const ErrorResponse = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().optional(),
    code: z.number().optional(),
  }),
});

const SchemaResponse = z
  .object({
    'schema-id': z.number().optional(),
    fields: z.array(
      z
        .object({
          id: z.number(),
          name: z.string(),
          required: z.boolean(),
          type: z.unknown(),
        })
        .passthrough()
    ),
  })
  .passthrough();

const SnapshotResponse = z.object({
  'snapshot-id': LongField,
  'parent-snapshot-id': LongField.nullish(),
  'sequence-number': LongField.optional(),
  'manifest-list': z.string().optional(),
  summary: StringRecord.optional(),
});

const TableMetadataResponse = z.object({
  'format-version': z.number(),
  'table-uuid': z.string(),
  location: z.string(),
  'last-sequence-number': LongField.optional(),
  'current-schema-id': z.number().optional(),
  schemas: z.array(SchemaResponse).optional(),
  schema: SchemaResponse.optional(),
  'current-snapshot-id': LongField.nullish(),
  snapshots: z.array(SnapshotResponse).optional(),
  refs: z.record(z.string(), z.object({ 'snapshot-id': LongField, type: z.string() })).optional(),
  properties: StringRecord.optional(),
});

const LoadTableResponse = z.object({
  'metadata-location': z.string().nullish(),
  metadata: TableMetadataResponse,
  config: StringRecord.optional(),
});

type LoadTableResult = z.infer<typeof LoadTableResponse>;

const NO_SNAPSHOT = -1n;

const DELEGATION_HEADERS = { 'X-Iceberg-Access-Delegation': 'vended-credentials' };

export type CatalogHttpOptions = {
  endpoint: string;
  token?: string;
  adapter?: AxiosAdapter;
};

/**
 * Axios instance for the catalog. Bodies are parsed by the client (large
 * integers must survive), and every status is returned to it.
 */
export const createCatalogHttp = (options: CatalogHttpOptions): AxiosInstance =>
  axios.create({
    baseURL: options.endpoint.replace(/\/+$/, ''),
    timeout: CATALOG_TIMEOUT_MS,
    headers: options.token ? { Authorization: `Bearer ${options.token}` } : {},
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

export type RestCatalogOptions = {
  warehouse: string;
  http: AxiosInstance;
  /** Storage settings used where the catalog vends none */
  storage: S3ConnectionOptions;
  objectStoreFactory?: (options: S3ConnectionOptions) => ObjectStore;
  now?: () => number;
};

const encodeNamespace = (namespace: readonly string[]): string => encodeURIComponent(namespace.join('\x1f'));

const toTableSchema = (schema: z.infer<typeof SchemaResponse>): TableSchema => ({
  schemaId: schema['schema-id'] ?? 0,
  columns: schema.fields.map((field) => ({
    id: field.id,
    name: field.name,
    required: field.required,
    type: parseIcebergType(field.type),
  })),
});

const toSnapshot = (snapshot: z.infer<typeof SnapshotResponse>): Snapshot => ({
  snapshotId: snapshot['snapshot-id'],
  parentSnapshotId: snapshot['parent-snapshot-id'] ?? undefined,
  sequenceNumber: snapshot['sequence-number'] ?? 0n,
  manifestList: snapshot['manifest-list'],
  summary: snapshot.summary ?? {},
});

const addTotal = (parent: Readonly<Record<string, string>> | undefined, key: string, added: number): string | undefined => {
  if (!parent) return String(added);
  const previous = parent[key];
  if (previous === undefined || !/^\d+$/.test(previous)) return undefined;
  return (BigInt(previous) + BigInt(added)).toString();
};

/**
 * Client for a catalog speaking the Iceberg REST protocol. Appends write the
 * data file and manifests straight to the table location, then commit the
 * snapshot with optimistic-concurrency requirements.
 */
export class RestCatalogClient implements CatalogClient {
  private prefix: string | undefined;
  private readonly stores = new Map<string, ObjectStore>();
  private readonly objectStoreFactory: (options: S3ConnectionOptions) => ObjectStore;
  private readonly now: () => number;

  constructor(private readonly options: RestCatalogOptions) {
    this.objectStoreFactory = options.objectStoreFactory ?? ((storage) => new S3ObjectStore(createS3Client(storage)));
    this.now = options.now ?? Date.now;
  }

  async connect(): Promise<void> {
    const { data } = await this.request('GET', '/v1/config', { params: { warehouse: this.options.warehouse } });
    const config = ConfigResponse.parse(data ?? {});
    this.prefix = config.overrides?.prefix ?? config.defaults?.prefix;
  }

  async namespaceExists(namespace: readonly string[]): Promise<boolean> {
    const response = await this.requestUnlessMissing('GET', this.path('namespaces', encodeNamespace(namespace)));
    return response !== undefined;
  }

  async createNamespace(namespace: readonly string[]): Promise<void> {
    await this.request('POST', this.path('namespaces'), { body: { namespace, properties: {} } });
  }

  async loadTable(namespace: readonly string[], name: string): Promise<LoadedTable | undefined> {
    const response = await this.requestUnlessMissing('GET', this.tablePath(namespace, name), {
      headers: DELEGATION_HEADERS,
    });
    return response && this.toLoadedTable(namespace, name, LoadTableResponse.parse(response.data));
  }

  async createTable(namespace: readonly string[], name: string, schema: TableSchema): Promise<LoadedTable> {
    const { data } = await this.request('POST', this.path('namespaces', encodeNamespace(namespace), 'tables'), {
      headers: DELEGATION_HEADERS,
      body: {
        name,
        schema: toSchemaJson(schema),
        'partition-spec': { 'spec-id': 0, fields: [] },
        'write-order': { 'order-id': 0, fields: [] },
        'stage-create': false,
        properties: {
          'format-version': '2',
          [NAME_MAPPING_PROPERTY]: JSON.stringify(buildNameMapping(schema)),
        },
      },
    });
    return this.toLoadedTable(namespace, name, LoadTableResponse.parse(data));
  }

  async appendFile(table: LoadedTable, request: AppendRequest): Promise<LoadedTable> {
    const location = parseS3Location(table.location);
    if (!location) {
      throw new Error(`Table location ${table.location} is not an s3 location`);
    }

    const store = this.storeFor(table);
    const root = table.location.replace(/\/+$/, '');
    const keyRoot = location.key.replace(/\/+$/, '');
    const keyFor = (relative: string): string => (keyRoot === '' ? relative : `${keyRoot}/${relative}`);

    const commitId = randomUUID();
    const dataFile = `data/${commitId}.parquet`;
    const sizeBytes = await store.putFile(location.bucket, keyFor(dataFile), request.localPath);

    const manifestFile = `metadata/${commitId}-m0.avro`;
    const manifest = writeManifest({
      snapshotId: request.snapshotId,
      schemaJson: table.schemaJson,
      schemaId: table.schema.schemaId,
      dataFile: { path: `${root}/${dataFile}`, rows: request.rows, sizeBytes },
    });
    await store.putBytes(location.bucket, keyFor(manifestFile), manifest);

    const parent = table.snapshots.find((snapshot) => snapshot.snapshotId === table.currentSnapshotId);
    const parentList = await this.readManifestList(store, parent);
    const sequenceNumber = table.lastSequenceNumber + 1n;

    const listFile = `metadata/snap-${request.snapshotId}-1-${commitId}.avro`;
    const manifestList = writeManifestList({
      snapshotId: request.snapshotId,
      parentSnapshotId: parent?.snapshotId,
      sequenceNumber,
      manifest: { path: `${root}/${manifestFile}`, length: manifest.length, rows: request.rows },
      parentList,
    });
    await store.putBytes(location.bucket, keyFor(listFile), manifestList);

    const summary: Record<string, string> = {
      operation: 'append',
      'added-data-files': '1',
      'added-records': String(request.rows),
      'added-files-size': String(sizeBytes),
      [SOURCE_FILE_PROPERTY]: request.sourceFile,
    };
    const totals: Array<[string, number]> = [
      ['total-data-files', 1],
      ['total-records', request.rows],
      ['total-files-size', sizeBytes],
    ];
    for (const [key, added] of totals) {
      const total = addTotal(parent?.summary, key, added);
      if (total !== undefined) summary[key] = total;
    }

    const updates: unknown[] = [];
    const nameMapping = JSON.stringify(buildNameMapping(table.schema));
    if (table.properties[NAME_MAPPING_PROPERTY] !== nameMapping) {
      updates.push({ action: 'set-properties', updates: { [NAME_MAPPING_PROPERTY]: nameMapping } });
    }
    updates.push(
      {
        action: 'add-snapshot',
        snapshot: {
          'snapshot-id': request.snapshotId,
          ...(parent ? { 'parent-snapshot-id': parent.snapshotId } : {}),
          'sequence-number': sequenceNumber,
          'timestamp-ms': this.now(),
          'manifest-list': `${root}/${listFile}`,
          summary,
          'schema-id': table.schema.schemaId,
        },
      },
      { action: 'set-snapshot-ref', 'ref-name': 'main', type: 'branch', 'snapshot-id': request.snapshotId }
    );

    const { data } = await this.request('POST', this.tablePath(table.namespace, table.name), {
      body: {
        identifier: { namespace: table.namespace, name: table.name },
        requirements: [
          { type: 'assert-table-uuid', uuid: table.uuid },
          { type: 'assert-ref-snapshot-id', ref: 'main', 'snapshot-id': table.currentSnapshotId ?? null },
        ],
        updates,
      },
    });

    const committed = LoadTableResponse.parse(data);
    return this.toLoadedTable(table.namespace, table.name, { ...committed, config: table.config });
  }

  private async readManifestList(store: ObjectStore, parent: Snapshot | undefined): Promise<Buffer | undefined> {
    if (!parent?.manifestList) return undefined;
    const location = parseS3Location(parent.manifestList);
    if (!location) {
      throw new Error(`Manifest list ${parent.manifestList} is not an s3 location`);
    }
    return store.getBytes(location.bucket, location.key);
  }

  private storeFor(table: LoadedTable): ObjectStore {
    const cached = this.stores.get(table.uuid);
    if (cached) return cached;

    const config = table.config;
    const { storage } = this.options;
    const accessKeyId = config['s3.access-key-id'];
    const secretAccessKey = config['s3.secret-access-key'];
    const pathStyle = config['s3.path-style-access'];

    const store = this.objectStoreFactory({
      region: config['s3.region'] ?? config['client.region'] ?? storage.region,
      endpoint: config['s3.endpoint'] ?? storage.endpoint,
      forcePathStyle: pathStyle === undefined ? storage.forcePathStyle : pathStyle === 'true',
      credentials:
        accessKeyId && secretAccessKey
          ? { accessKeyId, secretAccessKey, sessionToken: config['s3.session-token'] }
          : storage.credentials,
    });
    this.stores.set(table.uuid, store);
    return store;
  }

  private toLoadedTable(namespace: readonly string[], name: string, result: LoadTableResult): LoadedTable {
    const { metadata } = result;
    const schemaId = metadata['current-schema-id'];
    const schema =
      metadata.schemas?.find((candidate) => candidate['schema-id'] === schemaId) ??
      metadata.schemas?.at(-1) ??
      metadata.schema;
    if (!schema) {
      throw new CatalogRequestError(`Table ${namespace.join('.')}.${name} has no schema`);
    }

    const currentSnapshotId = metadata.refs?.main?.['snapshot-id'] ?? metadata['current-snapshot-id'] ?? undefined;

    return {
      namespace,
      name,
      metadataLocation: result['metadata-location'] ?? undefined,
      formatVersion: metadata['format-version'],
      uuid: metadata['table-uuid'],
      location: metadata.location,
      lastSequenceNumber: metadata['last-sequence-number'] ?? 0n,
      currentSnapshotId: currentSnapshotId === NO_SNAPSHOT ? undefined : currentSnapshotId,
      schema: toTableSchema(schema),
      schemaJson: JSONBig.stringify(schema),
      snapshots: (metadata.snapshots ?? []).map(toSnapshot),
      properties: metadata.properties ?? {},
      config: result.config ?? {},
    };
  }

  private path(...segments: string[]): string {
    const prefix = this.prefix === undefined ? [] : [this.prefix];
    return ['', 'v1', ...prefix, ...segments].join('/');
  }

  private tablePath(namespace: readonly string[], name: string): string {
    return this.path('namespaces', encodeNamespace(namespace), 'tables', encodeURIComponent(name));
  }

  private async requestUnlessMissing(
    method: 'GET',
    url: string,
    options: { headers?: Record<string, string> } = {}
  ): Promise<{ status: number; data: unknown } | undefined> {
    try {
      return await this.request(method, url, options);
    } catch (err) {
      if (err instanceof CatalogRequestError && err.status === 404) return undefined;
      throw err;
    }
  }

  private async request(
    method: 'GET' | 'POST',
    url: string,
    options: { params?: Record<string, string>; body?: unknown; headers?: Record<string, string> } = {}
  ): Promise<{ status: number; data: unknown }> {
    const headers: Record<string, string> = { ...options.headers };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.options.http.request<unknown>({
        method,
        url,
        params: options.params,
        headers,
        data: options.body === undefined ? undefined : JSONBig.stringify(options.body),
      });
    } catch (err) {
      throw new CatalogRequestError(`${method} ${url}: ${formatError(err)}`, { cause: err });
    }

    const data = parseBody(response.data);
    if (response.status >= 400) {
      const parsed = ErrorResponse.safeParse(data);
      throw new CatalogRequestError(
        parsed.success ? parsed.data.error.message : `${method} ${url} answered ${response.status}`,
        { status: response.status, errorType: parsed.success ? parsed.data.error.type : undefined }
      );
    }
    return { status: response.status, data };
  }
}

const parseBody = (raw: unknown): unknown => {
  if (typeof raw !== 'string') return raw;
  if (raw.trim() === '') return undefined;
  try {
    const parsed: unknown = JSONBig.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
};
