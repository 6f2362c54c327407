/**
 * dscpack Engine — Azure Blob Storage backend
 */

import {
  BlobServiceClient,
  ContainerClient,
  StorageSharedKeyCredential,
} from "@azure/storage-blob";
import { StorageCredentials } from "../types";
import { Logger } from "../utils/logger";
import { BlobContainer, BlobStore } from "./blob-store";

export function createBlobServiceClient(
  credentials: StorageCredentials,
): BlobServiceClient {
  switch (credentials.kind) {
    case "connection_string":
      return BlobServiceClient.fromConnectionString(credentials.connectionString);
    case "account_key":
      return new BlobServiceClient(
        `https://${credentials.accountName}.blob.${credentials.endpointSuffix}`,
        new StorageSharedKeyCredential(
          credentials.accountName,
          credentials.accountKey,
        ),
      );
    case "sas_token": {
      const sas = credentials.sasToken.replace(/^\?/, "");
      return new BlobServiceClient(
        `https://${credentials.accountName}.blob.${credentials.endpointSuffix}?${sas}`,
      );
    }
  }
}

class AzureBlobContainer implements BlobContainer {
  constructor(
    private client: ContainerClient,
    private logger: Logger,
  ) {}

  get name(): string {
    return this.client.containerName;
  }

  async createIfNotExists(): Promise<boolean> {
    const response = await this.client.createIfNotExists();
    if (response.succeeded) {
      this.logger.info({ container: this.name }, "Created blob container");
    }
    return response.succeeded;
  }

  blobUrl(blobName: string): string {
    // Without the SAS query string
    return this.client.getBlockBlobClient(blobName).url.split("?")[0];
  }

  async exists(blobName: string): Promise<boolean> {
    return this.client.getBlockBlobClient(blobName).exists();
  }

  async uploadFile(blobName: string, filePath: string): Promise<void> {
    this.logger.debug({ blob: blobName, file: filePath }, "Uploading blob");
    await this.client.getBlockBlobClient(blobName).uploadFile(filePath, {
      blobHTTPHeaders: { blobContentType: "application/zip" },
    });
  }
}

export class AzureBlobStore implements BlobStore {
  constructor(private logger: Logger) {}

  getContainer(
    credentials: StorageCredentials,
    containerName: string,
  ): BlobContainer {
    const service = createBlobServiceClient(credentials);
    return new AzureBlobContainer(
      service.getContainerClient(containerName),
      this.logger,
    );
  }
}
