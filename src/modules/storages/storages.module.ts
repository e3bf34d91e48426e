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

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BackupConfig } from '../../entities/backup-config.entity';
import { StorageEntity } from '../../entities/storage.entity';
import { AuditModule } from '../audit/audit.module';
import { WorkspacesModule } from '../workspaces/workspaces.module';
import { StorageRepository, TypeOrmStorageRepository } from './storage.repository';
import {
  StorageAttachmentCounter,
  TypeOrmStorageAttachmentCounter,
} from './storage-attachment.counter';
import { StorageConnectionTester } from './storage-connection.tester';
import { StorageVariantRegistry } from './storage-variants';
import { StoragesController } from './storages.controller';
import { StoragesService } from './storages.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([StorageEntity, BackupConfig]),
    AuditModule,
    WorkspacesModule,
  ],
  controllers: [StoragesController],
  providers: [
    StoragesService,
    StorageVariantRegistry,
    StorageConnectionTester,
    { provide: StorageRepository, useClass: TypeOrmStorageRepository },
    { provide: StorageAttachmentCounter, useClass: TypeOrmStorageAttachmentCounter },
  ],
  exports: [StoragesService],
})
export class StoragesModule { }
