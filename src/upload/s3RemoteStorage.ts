import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { Agent } from "node:https";
import { HeadBucketCommand, PutObjectCommand, S3Client, type S3ClientConfig } from "@aws-sdk/client-s3";

import type { S3Settings } from "../types";
import type { RemoteStorage } from "./remoteStorage";
import { toAppErrorDto } from "../shared/appError";
import { APP_ERROR } from "../shared/appErrorCodes";
import { err, ok, type Result } from "../shared/result";

const DEFAULT_REGION = "us-east-1";
const REQUEST_TIMEOUT_MS = 60_000;

export function buildS3ClientConfig(s3: S3Settings): S3ClientConfig {
  return {
    endpoint: s3.endpointUrl,
    region: s3.region ?? DEFAULT_REGION,
    forcePathStyle: s3.pathStyle,
    credentials: { accessKeyId: s3.accessKey, secretAccessKey: s3.secretKey },
    // один повтор делает диспетчер по своей политике, SDK не ретраит
    maxAttempts: 1,
    requestHandler: s3.verifySsl
      ? { requestTimeout: REQUEST_TIMEOUT_MS }
      : { requestTimeout: REQUEST_TIMEOUT_MS, httpsAgent: new Agent({ rejectUnauthorized: false }) },
  };
}

/** S3-совместимое хранилище (AWS, MinIO и т.п.). */
export class S3RemoteStorage implements RemoteStorage {
  readonly bucket: string;
  private client: S3Client;

  constructor(s3: S3Settings, client?: S3Client) {
    this.bucket = s3.bucket;
    this.client = client ?? new S3Client(buildS3ClientConfig(s3));
  }

  async put(key: string, localPath: string): Promise<void> {
    const st = await stat(localPath);
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: createReadStream(localPath),
        ContentLength: st.size,
      }),
    );
  }

  async checkBucket(): Promise<Result<void>> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      return ok(undefined);
    } catch (e) {
      return err(toAppErrorDto(e, { code: APP_ERROR.UPLOAD, message: "Рекордер: bucket недоступен", details: { bucket: this.bucket } }));
    }
  }

  close(): void {
    this.client.destroy();
  }
}
