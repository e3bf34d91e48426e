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

import { StorageType } from './storage-type.enum';
import { AzureBlobStorageConfig } from './variants/azure-blob-storage.handler';
import { FtpStorageConfig } from './variants/ftp-storage.handler';
import { GoogleDriveStorageConfig } from './variants/google-drive-storage.handler';
import { LocalStorageConfig } from './variants/local-storage.handler';
import { NasStorageConfig } from './variants/nas-storage.handler';
import { RcloneStorageConfig } from './variants/rclone-storage.handler';
import { S3StorageConfig } from './variants/s3-storage.handler';
import { SftpStorageConfig } from './variants/sftp-storage.handler';

export interface StorageConfigByType {
  [StorageType.LOCAL]: LocalStorageConfig;
  [StorageType.S3]: S3StorageConfig;
  [StorageType.NAS]: NasStorageConfig;
  [StorageType.AZURE_BLOB]: AzureBlobStorageConfig;
  [StorageType.FTP]: FtpStorageConfig;
  [StorageType.SFTP]: SftpStorageConfig;
  [StorageType.GOOGLE_DRIVE]: GoogleDriveStorageConfig;
  [StorageType.RCLONE]: RcloneStorageConfig;
}

/**
 * Exactly one backend payload, tagged by its type. With the default type
 * argument this is the union of all eight; a generic `K` keeps the type and
 * its config correlated inside dispatch code.
 */
export type StorageVariant<K extends StorageType = StorageType> = {
  [P in K]: { type: P; config: StorageConfigByType[P] };
}[K];

export interface Storage {
  id: string;
  workspaceId: string;
  name: string;
  isSystem: boolean;
  lastSaveError: string | null;
  variant: StorageVariant;
}

/** Submitted record. A missing id means "create". */
export interface StorageInput {
  id?: string;
  workspaceId: string;
  name: string;
  isSystem: boolean;
  variant: StorageVariant;
}
