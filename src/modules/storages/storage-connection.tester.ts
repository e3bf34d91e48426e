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
import { FieldEncryptor } from '../../common/encryption/field-encryptor';
import { AppConfigService } from '../../config/app-config.service';
import { StorageVariant } from './storage.types';
import { StorageVariantRegistry } from './storage-variants';

@Injectable()
export class StorageConnectionTester {
  constructor(
    private readonly registry: StorageVariantRegistry,
    private readonly encryptor: FieldEncryptor,
    private readonly config: AppConfigService,
  ) { }

  /**
   * Tests the backend described by `variant`. `entityId` is required when
   * the variant carries stored ciphertext.
   */
  test(variant: StorageVariant, entityId?: string, signal?: AbortSignal): Promise<void> {
    return this.registry.testVariantConnection(variant, {
      encryptor: this.encryptor,
      entityId,
      timeoutMs: this.config.connectionTestTimeoutMs,
      signal,
    });
  }
}
