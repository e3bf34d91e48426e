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

import * as crypto from 'crypto';
import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { StorageType } from '../storage-type.enum';
import { BaseStorageHandler } from './storage-variant.handler';

// Local disk has nothing to configure; the target directory is deployment-wide.
export const localStorageConfigSchema = z.object({}).strip();

export type LocalStorageConfig = z.infer<typeof localStorageConfigSchema>;

export class LocalStorageHandler extends BaseStorageHandler<LocalStorageConfig> {
  readonly type = StorageType.LOCAL;
  protected readonly label = 'Local storage';
  protected readonly sensitiveFields = [] as const;

  constructor(private readonly basePath: string) {
    super();
  }

  validate(): void {
    // nothing to validate
  }

  protected async checkConnection(): Promise<void> {
    await fs.mkdir(this.basePath, { recursive: true });
    const checkFile = path.join(this.basePath, `.write-test-${crypto.randomUUID()}`);
    await fs.writeFile(checkFile, 'ok');
    await fs.rm(checkFile, { force: true });
  }
}
