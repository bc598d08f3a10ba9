export { S3ObjectStore, createS3Client, objectKey, mapS3Error, type S3Port } from "./s3-object-store.js";
export { InMemoryObjectStore } from "./memory-object-store.js";
