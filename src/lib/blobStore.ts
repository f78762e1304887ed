import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, type S3Client } from "@aws-sdk/client-s3";

import { NotFoundError } from "@/lib/errors";

export type BlobStore = {
  put(key: string, bytes: Uint8Array, contentType: string): Promise<void>;
  get(key: string): Promise<Uint8Array>;
  delete(key: string): Promise<void>;
};

export function documentBlobKey(fundId: string, documentId: string, fileName: string): string {
  const safeName = fileName.replace(/[^A-Za-z0-9._-]+/g, "_").slice(0, 120) || "document.pdf";
  return `funds/${fundId}/documents/${documentId}/${safeName}`;
}

export function createS3BlobStore(s3: S3Client, bucket: string): BlobStore {
  return {
    async put(key, bytes, contentType) {
      await s3.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: bytes, ContentType: contentType }));
    },
    async get(key) {
      const res = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!res.Body) throw new NotFoundError(`Object ${key}`);
      return res.Body.transformToByteArray();
    },
    async delete(key) {
      await s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    },
  };
}

export function createMemoryBlobStore(): BlobStore & { keys(): string[] } {
  const objects = new Map<string, Uint8Array>();
  return {
    async put(key, bytes) {
      objects.set(key, new Uint8Array(bytes));
    },
    async get(key) {
      const bytes = objects.get(key);
      if (!bytes) throw new NotFoundError(`Object ${key}`);
      return bytes;
    },
    async delete(key) {
      objects.delete(key);
    },
    keys() {
      return [...objects.keys()];
    },
  };
}
