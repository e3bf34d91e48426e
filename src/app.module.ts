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
import { EncryptionModule } from './common/encryption/encryption.module';
import { AppConfigService } from './config/app-config.service';
import { ConfigModule } from './config/config.module';
import { ENTITIES } from './entities';
import { AuditModule } from './modules/audit/audit.module';
import { StoragesModule } from './modules/storages/storages.module';
import { WorkspacesModule } from './modules/workspaces/workspaces.module';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: (config: AppConfigService) => ({
        type: 'postgres',
        ...config.database,
        entities: ENTITIES,
        logging: false,
      }),
    }),
    EncryptionModule,
    AuditModule,
    WorkspacesModule,
    StoragesModule,
  ],
})
export class AppModule { }
