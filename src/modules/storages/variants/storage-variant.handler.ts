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

import { Logger } from '@nestjs/common';
import { z } from 'zod';
import { FieldEncryptor } from 'src/common/encryption/field-encryptor';
import { errorMessage } from 'src/common/utils/error-message';
import { withTimeout } from 'src/common/utils/with-timeout';
import { StorageConnectionFailedException, StorageValidationException } from '../storage.errors';
import { StorageType } from '../storage-type.enum';

export interface StorageConnectionContext {
  encryptor: FieldEncryptor;
  /** Owner of any ciphertext in the config. Absent for never-persisted input. */
  entityId?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface StorageVariantHandler<TConfig> {
  readonly type: StorageType;
  validate(config: TConfig, isNew: boolean): void;
  encryptSensitiveData(config: TConfig, encryptor: FieldEncryptor, entityId: string): void;
  hideSensitiveData(config: TConfig): void;
  applyUpdate(current: TConfig, incoming: TConfig): void;
  testConnection(config: TConfig, context: StorageConnectionContext): Promise<void>;
}

// Shared zod field builders. Clients send null or omit fields they don't use.
export const textField = () =>
  z
    .string()
    .trim()
    .nullish()
    .transform((value) => value ?? '');

export const secretField = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? '');

export const flagField = () =>
  z
    .boolean()
    .nullish()
    .transform((value) => value ?? false);

export const portField = (defaultPort: number) =>
  z
    .number()
    .int()
    .nullish()
    .transform((value) => value ?? defaultPort);

/**
 * Secret bookkeeping shared by every backend. Subclasses list their sensitive
 * keys and implement validation plus a connectivity check.
 */
export abstract class BaseStorageHandler<
  TConfig extends Record<TSecret, string>,
  TSecret extends string = never,
> implements StorageVariantHandler<TConfig> {
  abstract readonly type: StorageType;
  protected abstract readonly label: string;
  protected abstract readonly sensitiveFields: readonly TSecret[];
  protected readonly logger = new Logger(this.constructor.name);

  abstract validate(config: TConfig, isNew: boolean): void;

  protected abstract checkConnection(config: TConfig, signal: AbortSignal, timeoutMs: number): Promise<void>;

  encryptSensitiveData(config: TConfig, encryptor: FieldEncryptor, entityId: string): void {
    const secrets: Record<TSecret, string> = config;
    for (const field of this.sensitiveFields) {
      const value = secrets[field];
      if (value !== '' && !encryptor.isEncrypted(value)) {
        secrets[field] = encryptor.encrypt(entityId, value);
      }
    }
  }

  hideSensitiveData(config: TConfig): void {
    const secrets: Record<TSecret, string> = config;
    for (const field of this.sensitiveFields) {
      secrets[field] = '';
    }
  }

  applyUpdate(current: TConfig, incoming: TConfig): void {
    const previous: Record<TSecret, string> = { ...current };
    Object.assign(current, incoming);
    const secrets: Record<TSecret, string> = current;
    for (const field of this.sensitiveFields) {
      if (secrets[field] === '') {
        secrets[field] = previous[field];
      }
    }
  }

  async testConnection(config: TConfig, context: StorageConnectionContext): Promise<void> {
    // Decryption failures surface as-is; only backend failures are wrapped.
    const revealed = this.revealSensitiveData(config, context.encryptor, context.entityId);
    try {
      await withTimeout(
        (signal) => this.checkConnection(revealed, signal, context.timeoutMs),
        context.timeoutMs,
        context.signal,
      );
    } catch (err) {
      this.logger.warn(`${this.label} connection test failed: ${errorMessage(err)}`);
      throw new StorageConnectionFailedException(`${this.label} connection failed: ${errorMessage(err)}`);
    }
  }

  protected revealSensitiveData(
    config: TConfig,
    encryptor: FieldEncryptor,
    entityId: string | undefined,
  ): TConfig {
    const revealed: TConfig = { ...config };
    const secrets: Record<TSecret, string> = revealed;
    for (const field of this.sensitiveFields) {
      secrets[field] = encryptor.decryptIfEncrypted(entityId, secrets[field]);
    }
    return revealed;
  }

  protected require(condition: boolean, message: string): void {
    if (!condition) {
      throw new StorageValidationException(message);
    }
  }

  protected requirePort(port: number): void {
    this.require(port >= 1 && port <= 65535, `${this.label} port must be between 1 and 65535`);
  }
}
