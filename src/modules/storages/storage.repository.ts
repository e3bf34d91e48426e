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
import { StorageEntity } from '../../entities/storage.entity';
import { Storage } from './storage.types';
import { parseStorageVariant } from './storage-variants';

export abstract class StorageRepository {
  abstract findById(id: string): Promise<Storage | null>;

  /** Storages owned by the workspace plus every system storage. */
  abstract findByWorkspaceId(workspaceId: string): Promise<Storage[]>;

  abstract save(storage: Storage): Promise<Storage>;

  abstract delete(id: string): Promise<void>;
}

@Injectable()
export class TypeOrmStorageRepository extends StorageRepository {
  constructor(
    @InjectRepository(StorageEntity)
    private readonly repo: Repository<StorageEntity>,
  ) {
    super();
  }

  async findById(id: string): Promise<Storage | null> {
    const entity = await this.repo.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  async findByWorkspaceId(workspaceId: string): Promise<Storage[]> {
    const entities = await this.repo.find({
      where: [{ workspaceId }, { isSystem: true }],
      order: { name: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  async save(storage: Storage): Promise<Storage> {
    const entity = this.repo.create({
      id: storage.id,
      workspaceId: storage.workspaceId,
      name: storage.name,
      type: storage.variant.type,
      isSystem: storage.isSystem,
      lastSaveError: storage.lastSaveError,
      config: { ...storage.variant.config },
    });
    return this.toDomain(await this.repo.save(entity));
  }

  async delete(id: string): Promise<void> {
    await this.repo.delete(id);
  }

  private toDomain(entity: StorageEntity): Storage {
    return {
      id: entity.id,
      workspaceId: entity.workspaceId,
      name: entity.name,
      isSystem: entity.isSystem,
      lastSaveError: entity.lastSaveError,
      variant: parseStorageVariant(entity.type, entity.config),
    };
  }
}
