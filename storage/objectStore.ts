import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { StoredObject } from "./types";

export interface ObjectPage {
  objects: StoredObject[];
  nextCursor?: string;
}

// The slice of an object store the remote backend needs
export interface ObjectStore {
  putObject(key: string, body: Buffer, contentType: string): Promise<void>;
  getObject(key: string): Promise<Buffer>;
  listPage(prefix: string, cursor: string | undefined, pageSize: number): Promise<ObjectPage>;
  presignGet(key: string, expiresInSeconds: number): Promise<string>;
  readonly location: string;
}

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client, private readonly bucket: string) {}

  get location(): string {
    return `bucket ${this.bucket}`;
  }

  async putObject(key: string, body: Buffer, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
  }

  async getObject(key: string): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: this.bucket, Key: key })
    );
    if (!response.Body) {
      throw new Error(`Object ${key} has no body`);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async listPage(
    prefix: string,
    cursor: string | undefined,
    pageSize: number
  ): Promise<ObjectPage> {
    const response = await this.client.send(
      new ListObjectsV2Command({
        Bucket: this.bucket,
        Prefix: prefix,
        MaxKeys: pageSize,
        ContinuationToken: cursor,
      })
    );

    const objects: StoredObject[] = [];
    for (const item of response.Contents ?? []) {
      if (!item.Key) continue;
      objects.push({
        key: item.Key,
        lastModified: item.LastModified ?? new Date(0),
        sizeBytes: item.Size ?? 0,
      });
    }

    return {
      objects,
      nextCursor: response.IsTruncated ? response.NextContinuationToken : undefined,
    };
  }

  async presignGet(key: string, expiresInSeconds: number): Promise<string> {
    return getSignedUrl(
      this.client,
      new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      { expiresIn: expiresInSeconds }
    );
  }
}
