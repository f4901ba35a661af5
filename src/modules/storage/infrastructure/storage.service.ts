import {
  DeleteObjectsCommand,
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { StorageGateway } from '../domain/storage-gateway.interface';

const DELETE_BATCH_SIZE = 1000;

export class StorageDownloadError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
  ) {
    super(`Download of ${url} failed with HTTP ${status}`);
    this.name = 'StorageDownloadError';
  }
}

@Injectable()
export class StorageService implements StorageGateway {
  private readonly logger = new Logger(StorageService.name);
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly publicBaseUrl: string;
  private readonly signedUrlTtl: number;

  constructor(private readonly configService: ConfigService) {
    const bucket = this.configService.get<string>('storage.bucket');
    const accessKeyId = this.configService.get<string>('storage.accessKeyId');
    const secretAccessKey = this.configService.get<string>('storage.secretAccessKey');
    const region = this.configService.get<string>('storage.region') || 'us-east-1';
    const endpoint = this.configService.get<string>('storage.endpoint');

    if (!bucket || !accessKeyId || !secretAccessKey) {
      throw new Error('Storage configuration is missing');
    }

    this.bucket = bucket;
    this.signedUrlTtl =
      this.configService.get<number>('storage.signedUrlTtlSeconds') ?? 3600;

    const configuredBase = this.configService.get<string>('storage.publicBaseUrl');
    this.publicBaseUrl = (
      configuredBase ||
      (endpoint
        ? `${endpoint.replace(/\/$/, '')}/${bucket}`
        : `https://${bucket}.s3.${region}.amazonaws.com`)
    ).replace(/\/$/, '');

    this.client = new S3Client({
      region,
      endpoint,
      forcePathStyle: Boolean(endpoint),
      credentials: { accessKeyId, secretAccessKey },
    });
  }

  async upload(key: string, body: Buffer, contentType: string): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );

    return this.getPublicUrl(key);
  }

  async download(url: string): Promise<Buffer> {
    const key = this.keyFromUrl(url);
    if (key) {
      return this.getObjectBuffer(key);
    }

    const response = await fetch(url);
    if (!response.ok) {
      throw new StorageDownloadError(url, response.status);
    }
    return Buffer.from(await response.arrayBuffer());
  }

  async getSignedUrl(keyOrUrl: string, expiresInSeconds = this.signedUrlTtl): Promise<string> {
    const key = this.keyFromUrl(keyOrUrl) ?? keyOrUrl;
    const command = new GetObjectCommand({ Bucket: this.bucket, Key: key });
    return getSignedUrl(this.client, command, { expiresIn: expiresInSeconds });
  }

  async deletePrefix(prefix: string): Promise<number> {
    let deleted = 0;
    let continuationToken: string | undefined;

    do {
      const listing = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
          MaxKeys: DELETE_BATCH_SIZE,
        }),
      );

      const keys = (listing.Contents ?? [])
        .map((object) => object.Key)
        .filter((key): key is string => typeof key === 'string');

      if (keys.length > 0) {
        await this.client.send(
          new DeleteObjectsCommand({
            Bucket: this.bucket,
            Delete: { Objects: keys.map((Key) => ({ Key })), Quiet: true },
          }),
        );
        deleted += keys.length;
      }

      continuationToken = listing.IsTruncated ? listing.NextContinuationToken : undefined;
    } while (continuationToken);

    if (deleted > 0) {
      this.logger.debug(`Deleted ${deleted} object(s) under ${prefix}`);
    }
    return deleted;
  }

  getPublicUrl(key: string): string {
    return `${this.publicBaseUrl}/${key}`;
  }

  /** Object key for one of our public URLs, or null for anything else. */
  keyFromUrl(url: string): string | null {
    const prefix = `${this.publicBaseUrl}/`;
    return url.startsWith(prefix) ? url.slice(prefix.length) : null;
  }

  private async getObjectBuffer(key: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: key }),
    );

    if (!response.Body) {
      return Buffer.alloc(0);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }
}
