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

import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { StorageEntity } from './storage.entity';

/** Per-database backup settings. Only the storage reference is used here. */
@Entity('backup_configs')
export class BackupConfig {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'database_id', type: 'uuid', unique: true })
  databaseId!: string;

  @Column({ name: 'storage_id', type: 'uuid', nullable: true })
  storageId!: string | null;

  @ManyToOne(() => StorageEntity, { nullable: true, onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'storage_id' })
  storage?: StorageEntity;

  @Column({ name: 'is_backups_enabled', type: 'boolean', default: false })
  isBackupsEnabled!: boolean;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
