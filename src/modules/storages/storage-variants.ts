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

import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { FieldEncryptor } from 'src/common/encryption/field-encryptor';
import { AppConfigService } from 'src/config/app-config.service';
import { StorageValidationException } from './storage.errors';
import { StorageConfigByType, StorageVariant } from './storage.types';
import { StorageType } from './storage-type.enum';
import {
  AzureBlobStorageHandler,
  azureBlobStorageConfigSchema,
} from './variants/azure-blob-storage.handler';
import { FtpStorageHandler, ftpStorageConfigSchema } from './variants/ftp-storage.handler';
import {
  GoogleDriveStorageHandler,
  googleDriveStorageConfigSchema,
} from './variants/google-drive-storage.handler';
import { LocalStorageHandler, localStorageConfigSchema } from './variants/local-storage.handler';
import { NasStorageHandler, nasStorageConfigSchema } from './variants/nas-storage.handler';
import { RcloneStorageHandler, rcloneStorageConfigSchema } from './variants/rclone-storage.handler';
import { S3StorageHandler, s3StorageConfigSchema } from './variants/s3-storage.handler';
import { SftpStorageHandler, sftpStorageConfigSchema } from './variants/sftp-storage.handler';
import {
  StorageConnectionContext,
  StorageVariantHandler,
} from './variants/storage-variant.handler';

/** Key carrying each variant's payload in the external representation. */
export const STORAGE_PAYLOAD_KEYS = {
  [StorageType.LOCAL]: 'localStorage',
  [StorageType.S3]: 's3Storage',
  [StorageType.NAS]: 'nasStorage',
  [StorageType.AZURE_BLOB]: 'azureBlobStorage',
  [StorageType.FTP]: 'ftpStorage',
  [StorageType.SFTP]: 'sftpStorage',
  [StorageType.GOOGLE_DRIVE]: 'googleDriveStorage',
  [StorageType.RCLONE]: 'rcloneStorage',
} as const satisfies Record<StorageType, string>;

export type StoragePayloadKey = (typeof STORAGE_PAYLOAD_KEYS)[StorageType];

export function formatZodIssues(error: z.ZodError, prefix?: string): string {
  return error.issues
    .map((issue) => {
      const field = [prefix, ...issue.path].filter((part) => part !== undefined).join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  type: StorageType,
  payload: unknown,
): z.output<S> {
  const key = STORAGE_PAYLOAD_KEYS[type];
  if (payload === null || payload === undefined) {
    throw new StorageValidationException(`${key} is required for storage type ${type}`);
  }
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new StorageValidationException(formatZodIssues(result.error, key));
  }
  return result.data;
}

/**
 * Builds a typed variant from an untyped payload. Used for request bodies and
 * for rows read back from the jsonb column.
 */
export function parseStorageVariant(type: StorageType, payload: unknown): StorageVariant {
  switch (type) {
    case StorageType.LOCAL:
      return { type, config: parsePayload(localStorageConfigSchema, type, payload ?? {}) };
    case StorageType.S3:
      return { type, config: parsePayload(s3StorageConfigSchema, type, payload) };
    case StorageType.NAS:
      return { type, config: parsePayload(nasStorageConfigSchema, type, payload) };
    case StorageType.AZURE_BLOB:
      return { type, config: parsePayload(azureBlobStorageConfigSchema, type, payload) };
    case StorageType.FTP:
      return { type, config: parsePayload(ftpStorageConfigSchema, type, payload) };
    case StorageType.SFTP:
      return { type, config: parsePayload(sftpStorageConfigSchema, type, payload) };
    case StorageType.GOOGLE_DRIVE:
      return { type, config: parsePayload(googleDriveStorageConfigSchema, type, payload) };
    case StorageType.RCLONE:
      return { type, config: parsePayload(rcloneStorageConfigSchema, type, payload) };
  }
}

type StorageHandlerMap = {
  [K in StorageType]: StorageVariantHandler<StorageConfigByType[K]>;
};

export interface MergedVariant {
  variant: StorageVariant;
  /** The type changed, so the payload was replaced and must be validated as new. */
  replaced: boolean;
}

@Injectable()
export class StorageVariantRegistry {
  private readonly handlers: StorageHandlerMap;

  constructor(config: AppConfigService) {
    this.handlers = {
      [StorageType.LOCAL]: new LocalStorageHandler(config.localStoragePath),
      [StorageType.S3]: new S3StorageHandler(),
      [StorageType.NAS]: new NasStorageHandler(),
      [StorageType.AZURE_BLOB]: new AzureBlobStorageHandler(),
      [StorageType.FTP]: new FtpStorageHandler(),
      [StorageType.SFTP]: new SftpStorageHandler(),
      [StorageType.GOOGLE_DRIVE]: new GoogleDriveStorageHandler(),
      [StorageType.RCLONE]: new RcloneStorageHandler(config.rcloneBinary),
    };
  }

  handlerFor<K extends StorageType>(type: K): StorageHandlerMap[K] {
    return this.handlers[type];
  }

  validateVariant<K extends StorageType>(variant: StorageVariant<K>, isNew: boolean): void {
    this.handlerFor(variant.type).validate(variant.config, isNew);
  }

  encryptVariant<K extends StorageType>(
    variant: StorageVariant<K>,
    encryptor: FieldEncryptor,
    entityId: string,
  ): void {
    this.handlerFor(variant.type).encryptSensitiveData(variant.config, encryptor, entityId);
  }

  hideVariant<K extends StorageType>(variant: StorageVariant<K>): void {
    this.handlerFor(variant.type).hideSensitiveData(variant.config);
  }

  testVariantConnection<K extends StorageType>(
    variant: StorageVariant<K>,
    context: StorageConnectionContext,
  ): Promise<void> {
    return this.handlerFor(variant.type).testConnection(variant.config, context);
  }

  /**
   * Applies `incoming` over `current` in place when both share a type
   * (secrets left empty are kept); otherwise `incoming` replaces it.
   */
  mergeVariant(current: StorageVariant, incoming: StorageVariant): MergedVariant {
    switch (incoming.type) {
      case StorageType.LOCAL:
        if (current.type === StorageType.LOCAL) {
          this.handlers[StorageType.LOCAL].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
      case StorageType.S3:
        if (current.type === StorageType.S3) {
          this.handlers[StorageType.S3].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
      case StorageType.NAS:
        if (current.type === StorageType.NAS) {
          this.handlers[StorageType.NAS].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
      case StorageType.AZURE_BLOB:
        if (current.type === StorageType.AZURE_BLOB) {
          this.handlers[StorageType.AZURE_BLOB].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
      case StorageType.FTP:
        if (current.type === StorageType.FTP) {
          this.handlers[StorageType.FTP].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
      case StorageType.SFTP:
        if (current.type === StorageType.SFTP) {
          this.handlers[StorageType.SFTP].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
      case StorageType.GOOGLE_DRIVE:
        if (current.type === StorageType.GOOGLE_DRIVE) {
          this.handlers[StorageType.GOOGLE_DRIVE].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
      case StorageType.RCLONE:
        if (current.type === StorageType.RCLONE) {
          this.handlers[StorageType.RCLONE].applyUpdate(current.config, incoming.config);
          return { variant: current, replaced: false };
        }
        break;
    }
    return { variant: incoming, replaced: true };
  }
}
