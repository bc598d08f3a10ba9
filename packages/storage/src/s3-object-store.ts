import {
  GetObjectCommand,
  HeadObjectCommand,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import { NotFoundError, TransientIOError } from "@docpipe/errors";
import type { IObjectStore, StorageConfig, StoredObjectInfo } from "@docpipe/types";

export type S3Port = Pick<S3Client, "send">;

const SERVICE = "s3";
const DEFAULT_CONTENT_TYPE = "application/octet-stream";

export function objectKey(documentId: string): string {
  return `documents/${documentId}`;
}

export function createS3Client(config: StorageConfig): S3Client {
  const clientConfig: S3ClientConfig = { region: config.region };
  if (config.endpoint) {
    clientConfig.endpoint = config.endpoint;
    // MinIO and LocalStack only serve path-style URLs
    clientConfig.forcePathStyle = true;
  }
  if (config.accessKeyId && config.secretAccessKey) {
    clientConfig.credentials = {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    };
  }
  return new S3Client(clientConfig);
}

/**
 * Reads uploaded originals from an S3-compatible bucket. Objects live
 * under `documents/<documentId>`; the original filename is kept in the
 * `filename` user metadata.
 */
export class S3ObjectStore implements IObjectStore {
  constructor(
    private readonly bucket: string,
    private readonly client: S3Port,
  ) {}

  async getBytes(documentId: string, signal?: AbortSignal): Promise<Uint8Array> {
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: objectKey(documentId) }),
        { abortSignal: signal },
      );
      if (!response.Body) throw objectNotFound(documentId);
      return await response.Body.transformToByteArray();
    } catch (error) {
      throw mapS3Error(error, documentId, "get");
    }
  }

  async describe(documentId: string, signal?: AbortSignal): Promise<StoredObjectInfo> {
    try {
      const head = await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: objectKey(documentId) }),
        { abortSignal: signal },
      );
      return {
        filename: head.Metadata?.["filename"] ?? documentId,
        sizeBytes: head.ContentLength ?? 0,
        contentType: head.ContentType ?? DEFAULT_CONTENT_TYPE,
      };
    } catch (error) {
      throw mapS3Error(error, documentId, "head");
    }
  }
}

function objectNotFound(documentId: string, cause?: unknown): NotFoundError {
  return new NotFoundError(`Object ${documentId} not found`, { details: { documentId }, cause });
}

export function mapS3Error(error: unknown, documentId: string, operation: "get" | "head"): Error {
  if (error instanceof NotFoundError) return error;
  if (error instanceof S3ServiceException) {
    if (error.name === "NoSuchKey" || error.name === "NotFound" || error.$metadata.httpStatusCode === 404) {
      return objectNotFound(documentId, error);
    }
    return new TransientIOError(`S3 ${operation} failed: ${error.message}`, SERVICE, {
      details: { documentId, status: error.$metadata.httpStatusCode },
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientIOError(`S3 ${operation} failed: ${message}`, SERVICE, {
    details: { documentId },
    cause: error,
  });
}
