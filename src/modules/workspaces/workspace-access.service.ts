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
import { Actor, isGlobalAdmin } from '../../entities/user.entity';
import {
  WorkspaceMembership,
  WorkspaceRole,
} from '../../entities/workspace-membership.entity';

// Role hierarchy: owner > admin > member > viewer
const ROLE_LEVELS: Record<WorkspaceRole, number> = {
  [WorkspaceRole.VIEWER]: 1,
  [WorkspaceRole.MEMBER]: 2,
  [WorkspaceRole.ADMIN]: 3,
  [WorkspaceRole.OWNER]: 4,
};

export interface WorkspaceViewAccess {
  canView: boolean;
  /** Null for global admins without a membership and for outsiders. */
  role: WorkspaceRole | null;
}

@Injectable()
export class WorkspaceAccessService {
  constructor(
    @InjectRepository(WorkspaceMembership)
    private readonly repo: Repository<WorkspaceMembership>,
  ) {}

  async getWorkspaceRole(workspaceId: string, userId: string): Promise<WorkspaceRole | null> {
    const membership = await this.repo.findOne({ where: { workspaceId, userId } });
    return membership?.role ?? null;
  }

  async canUserViewWorkspace(workspaceId: string, actor: Actor): Promise<WorkspaceViewAccess> {
    const role = await this.getWorkspaceRole(workspaceId, actor.id);
    return { canView: role !== null || isGlobalAdmin(actor), role };
  }

  /**
   * Members and above may create, edit and delete storages; viewers may not.
   */
  async canUserManageStorages(workspaceId: string, actor: Actor): Promise<boolean> {
    if (isGlobalAdmin(actor)) return true;
    const role = await this.getWorkspaceRole(workspaceId, actor.id);
    if (!role) return false;
    return ROLE_LEVELS[role] >= ROLE_LEVELS[WorkspaceRole.MEMBER];
  }
}
