/**
 * dscpack Engine — Blob Store Interface
 *
 * The publisher only needs a few things from a storage backend: a container
 * it can create on demand, an existence check and a file upload.
 */

import { StorageCredentials } from "../types";

export interface BlobContainer {
  readonly name: string;
  /** @returns true when the container was created by this call */
  createIfNotExists(): Promise<boolean>;
  /** Absolute URL of a blob in this container */
  blobUrl(blobName: string): string;
  exists(blobName: string): Promise<boolean>;
  /** Upload a local file as the blob's content, replacing any existing blob */
  uploadFile(blobName: string, filePath: string): Promise<void>;
}

export interface BlobStore {
  /** Reference a container; no request is made until it is used */
  getContainer(
    credentials: StorageCredentials,
    containerName: string,
  ): BlobContainer;
}
