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
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { BackupConfig } from '../../entities/backup-config.entity';

/** Tells which databases currently back up to a storage. */
export abstract class StorageAttachmentCounter {
  abstract getStorageAttachedDatabaseIds(storageId: string): Promise<string[]>;
}

@Injectable()
export class TypeOrmStorageAttachmentCounter extends StorageAttachmentCounter {
  constructor(
    @InjectRepository(BackupConfig)
    private readonly repo: Repository<BackupConfig>,
  ) {
    super();
  }

  async getStorageAttachedDatabaseIds(storageId: string): Promise<string[]> {
    const configs = await this.repo.find({
      where: { storageId },
      select: { databaseId: true },
    });
    return [...new Set(configs.map((config) => config.databaseId))];
  }
}
