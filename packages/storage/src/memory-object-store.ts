import type { IObjectStore, StoredObjectInfo } from "@docpipe/types";
import { NotFoundError } from "@docpipe/errors";

interface StoredObject {
  bytes: Uint8Array;
  info: StoredObjectInfo;
}

export class InMemoryObjectStore implements IObjectStore {
  private readonly objects = new Map<string, StoredObject>();

  put(documentId: string, bytes: Uint8Array, filename: string, contentType = "application/octet-stream"): void {
    this.objects.set(documentId, { bytes, info: { filename, sizeBytes: bytes.byteLength, contentType } });
  }

  async getBytes(documentId: string): Promise<Uint8Array> {
    return this.get(documentId).bytes;
  }

  async describe(documentId: string): Promise<StoredObjectInfo> {
    return { ...this.get(documentId).info };
  }

  private get(documentId: string): StoredObject {
    const stored = this.objects.get(documentId);
    if (!stored) throw new NotFoundError(`Object ${documentId} not found`, { details: { documentId } });
    return stored;
  }
}
