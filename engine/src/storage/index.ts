export type { BlobContainer, BlobStore } from "./blob-store";
export { AzureBlobStore, createBlobServiceClient } from "./azure-blob-store";
