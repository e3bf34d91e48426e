/*
 * Copyright (C) 2026 RavHub Team
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published
 * by the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU Affero General Public License for more details.
 */

import { BlobServiceClient, StorageSharedKeyCredential } from '@azure/storage-blob';
import { z } from 'zod';
import { StorageType } from '../storage-type.enum';
import { BaseStorageHandler, secretField, textField } from './storage-variant.handler';

export enum AzureBlobAuthMethod {
  CONNECTION_STRING = 'CONNECTION_STRING',
  ACCOUNT_KEY = 'ACCOUNT_KEY',
}

export const azureBlobStorageConfigSchema = z.object({
  authMethod: z
    .nativeEnum(AzureBlobAuthMethod)
    .nullish()
    .transform((value) => value ?? AzureBlobAuthMethod.ACCOUNT_KEY),
  connectionString: secretField(),
  accountName: textField(),
  accountKey: secretField(),
  containerName: textField(),
  endpoint: textField(),
  prefix: textField(),
});

export type AzureBlobStorageConfig = z.infer<typeof azureBlobStorageConfigSchema>;

export class AzureBlobStorageHandler extends BaseStorageHandler<
  AzureBlobStorageConfig,
  'connectionString' | 'accountKey'
> {
  readonly type = StorageType.AZURE_BLOB;
  protected readonly label = 'Azure Blob';
  // Both secrets are hidden whichever auth method is active.
  protected readonly sensitiveFields = ['connectionString', 'accountKey'] as const;

  // The active method's secret is required on updates too, since an update may
  // switch methods.
  validate(config: AzureBlobStorageConfig, _isNew: boolean): void {
    this.require(config.containerName !== '', 'Azure Blob container name is required');
    switch (config.authMethod) {
      case AzureBlobAuthMethod.CONNECTION_STRING:
        this.require(config.connectionString !== '', 'Azure Blob connection string is required');
        break;
      case AzureBlobAuthMethod.ACCOUNT_KEY:
        this.require(config.accountName !== '', 'Azure Blob account name is required');
        this.require(config.accountKey !== '', 'Azure Blob account key is required');
        break;
    }
  }

  protected async checkConnection(config: AzureBlobStorageConfig, signal: AbortSignal): Promise<void> {
    const service = this.createServiceClient(config);
    const exists = await service
      .getContainerClient(config.containerName)
      .exists({ abortSignal: signal });
    if (!exists) {
      throw new Error(`container "${config.containerName}" does not exist`);
    }
  }

  private createServiceClient(config: AzureBlobStorageConfig): BlobServiceClient {
    if (config.authMethod === AzureBlobAuthMethod.CONNECTION_STRING) {
      return BlobServiceClient.fromConnectionString(config.connectionString);
    }
    const url = config.endpoint || `https://${config.accountName}.blob.core.windows.net`;
    return new BlobServiceClient(
      url,
      new StorageSharedKeyCredential(config.accountName, config.accountKey),
    );
  }
}
