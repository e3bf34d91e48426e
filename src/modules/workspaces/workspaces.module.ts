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
import { WorkspaceMembership } from '../../entities/workspace-membership.entity';
import { WorkspaceAccessService } from './workspace-access.service';

@Module({
  imports: [TypeOrmModule.forFeature([WorkspaceMembership])],
  providers: [WorkspaceAccessService],
  exports: [WorkspaceAccessService],
})
export class WorkspacesModule {}
