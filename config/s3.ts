import { S3Client } from "@aws-sdk/client-s3";
import type { RemoteModeConfig } from "./reportConfig";

export function createS3Client(s3: RemoteModeConfig["s3"]): S3Client {
  return new S3Client({
    region: s3.region,
    // S3-compatible stores (R2, MinIO) need an explicit endpoint
    ...(s3.endpoint ? { endpoint: s3.endpoint, forcePathStyle: true } : {}),
    credentials: {
      accessKeyId: s3.accessKeyId,
      secretAccessKey: s3.secretAccessKey,
    },
  });
}
