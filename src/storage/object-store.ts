import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';

export type ObjectPage = {
  keys: string[];
  nextToken?: string;
};

/**
 * The object-store operations the loader needs: paging a prefix, reading an
 * object and writing one. Implemented over S3 for any S3-compatible store.
 */
export interface ObjectStore {
  list(bucket: string, prefix: string, continuationToken?: string): Promise<ObjectPage>;
  get(bucket: string, key: string): Promise<Readable>;
  getBytes(bucket: string, key: string): Promise<Buffer>;
  putBytes(bucket: string, key: string, body: Buffer): Promise<void>;
  putFile(bucket: string, key: string, localPath: string): Promise<number>;
}

export type S3ConnectionOptions = {
  region: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  anonymous?: boolean;
  credentials?: { accessKeyId: string; secretAccessKey: string; sessionToken?: string };
};

export const createS3Client = (options: S3ConnectionOptions): S3Client => {
  const config: S3ClientConfig = {
    region: options.region,
    forcePathStyle: options.forcePathStyle ?? false,
  };
  if (options.endpoint) {
    config.endpoint = options.endpoint;
  }
  if (options.credentials) {
    config.credentials = options.credentials;
  }
  if (options.anonymous) {
    // Public buckets: send requests unsigned.
    config.signer = { sign: async (request) => request };
  }
  return new S3Client(config);
};

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async list(bucket: string, prefix: string, continuationToken?: string): Promise<ObjectPage> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken,
      })
    );

    const keys: string[] = [];
    for (const object of response.Contents ?? []) {
      if (object.Key) {
        keys.push(object.Key);
      }
    }
    return { keys, nextToken: response.NextContinuationToken };
  }

  async get(bucket: string, key: string): Promise<Readable> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    const body = response.Body;
    if (!(body instanceof Readable)) {
      throw new Error(`s3://${bucket}/${key} returned no readable body`);
    }
    return body;
  }

  async getBytes(bucket: string, key: string): Promise<Buffer> {
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`s3://${bucket}/${key} returned no body`);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async putBytes(bucket: string, key: string, body: Buffer): Promise<void> {
    await this.client.send(
      new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentLength: body.length })
    );
  }

  async putFile(bucket: string, key: string, localPath: string): Promise<number> {
    const { size } = await stat(localPath);
    await this.client.send(
      new PutObjectCommand({ Bucket: bucket, Key: key, Body: createReadStream(localPath), ContentLength: size })
    );
    return size;
  }
}

const LOCATION_PATTERN = /^s3a?:\/\/([^/]+)\/?(.*)$/;

/** Split `s3://bucket/some/key` into bucket and key. */
export const parseS3Location = (location: string): { bucket: string; key: string } | undefined => {
  const match = LOCATION_PATTERN.exec(location);
  if (!match) return undefined;
  return { bucket: match[1], key: match[2] };
};
