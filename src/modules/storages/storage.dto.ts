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

import { z } from 'zod';
import { StorageValidationException } from './storage.errors';
import { Storage, StorageInput } from './storage.types';
import { StorageType } from './storage-type.enum';
import { formatZodIssues, parseStorageVariant, STORAGE_PAYLOAD_KEYS } from './storage-variants';
import { AzureBlobStorageConfig } from './variants/azure-blob-storage.handler';
import { FtpStorageConfig } from './variants/ftp-storage.handler';
import { GoogleDriveStorageConfig } from './variants/google-drive-storage.handler';
import { LocalStorageConfig } from './variants/local-storage.handler';
import { NasStorageConfig } from './variants/nas-storage.handler';
import { RcloneStorageConfig } from './variants/rclone-storage.handler';
import { S3StorageConfig } from './variants/s3-storage.handler';
import { SftpStorageConfig } from './variants/sftp-storage.handler';

export interface StoragePayloads {
  localStorage: LocalStorageConfig | null;
  s3Storage: S3StorageConfig | null;
  nasStorage: NasStorageConfig | null;
  azureBlobStorage: AzureBlobStorageConfig | null;
  ftpStorage: FtpStorageConfig | null;
  sftpStorage: SftpStorageConfig | null;
  googleDriveStorage: GoogleDriveStorageConfig | null;
  rcloneStorage: RcloneStorageConfig | null;
}

/** Wire shape: the payload key matching `type` is set, every other one is null. */
export interface StorageView extends StoragePayloads {
  id: string;
  workspaceId: string;
  name: string;
  type: StorageType;
  isSystem: boolean;
  lastSaveError: string | null;
}

const EMPTY_PAYLOADS: StoragePayloads = {
  localStorage: null,
  s3Storage: null,
  nasStorage: null,
  azureBlobStorage: null,
  ftpStorage: null,
  sftpStorage: null,
  googleDriveStorage: null,
  rcloneStorage: null,
};

function payloadsOf(storage: Storage): StoragePayloads {
  const { variant } = storage;
  switch (variant.type) {
    case StorageType.LOCAL:
      return { ...EMPTY_PAYLOADS, localStorage: variant.config };
    case StorageType.S3:
      return { ...EMPTY_PAYLOADS, s3Storage: variant.config };
    case StorageType.NAS:
      return { ...EMPTY_PAYLOADS, nasStorage: variant.config };
    case StorageType.AZURE_BLOB:
      return { ...EMPTY_PAYLOADS, azureBlobStorage: variant.config };
    case StorageType.FTP:
      return { ...EMPTY_PAYLOADS, ftpStorage: variant.config };
    case StorageType.SFTP:
      return { ...EMPTY_PAYLOADS, sftpStorage: variant.config };
    case StorageType.GOOGLE_DRIVE:
      return { ...EMPTY_PAYLOADS, googleDriveStorage: variant.config };
    case StorageType.RCLONE:
      return { ...EMPTY_PAYLOADS, rcloneStorage: variant.config };
  }
}

/**
 * Maps a storage to its wire shape. Callers hide secrets first;
 * `hideAllData` additionally drops the payload entirely.
 */
export function toStorageView(storage: Storage, options: { hideAllData: boolean }): StorageView {
  return {
    id: storage.id,
    workspaceId: storage.workspaceId,
    name: storage.name,
    type: storage.variant.type,
    isSystem: storage.isSystem,
    lastSaveError: storage.lastSaveError,
    ...(options.hideAllData ? EMPTY_PAYLOADS : payloadsOf(storage)),
  };
}

const storageInputSchema = z
  .object({
    id: z.string().uuid().nullish(),
    workspaceId: z.string({ required_error: 'workspaceId is required' }).uuid(),
    name: z
      .string()
      .nullish()
      .transform((value) => (value ?? '').trim()),
    type: z.nativeEnum(StorageType),
    isSystem: z
      .boolean()
      .nullish()
      .transform((value) => value ?? false),
  })
  .passthrough();

/** Parses a StorageView-shaped body. Payload keys of other types are ignored. */
export function parseStorageInput(body: unknown): StorageInput {
  const result = storageInputSchema.safeParse(body);
  if (!result.success) {
    throw new StorageValidationException(formatZodIssues(result.error));
  }
  const { id, workspaceId, name, type, isSystem } = result.data;
  const payload = result.data[STORAGE_PAYLOAD_KEYS[type]];
  return {
    ...(id ? { id } : {}),
    workspaceId,
    name,
    isSystem,
    variant: parseStorageVariant(type, payload),
  };
}

const workspaceIdQuerySchema = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string({ required_error: 'workspace_id is required' }).uuid('invalid workspace_id'),
);

export function parseWorkspaceIdQuery(value: unknown): string {
  const result = workspaceIdQuerySchema.safeParse(value);
  if (!result.success) {
    throw new StorageValidationException(formatZodIssues(result.error));
  }
  return result.data;
}

const transferStorageSchema = z.object({
  targetWorkspaceId: z.string({ required_error: 'targetWorkspaceId is required' }).uuid(),
});

export type TransferStorageDto = z.infer<typeof transferStorageSchema>;

export function parseTransferStorage(body: unknown): TransferStorageDto {
  const result = transferStorageSchema.safeParse(body);
  if (!result.success) {
    throw new StorageValidationException(formatZodIssues(result.error));
  }
  return result.data;
}
