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

import { Injectable, Logger } from '@nestjs/common';
import * as crypto from 'crypto';
import { FieldEncryptor } from '../../common/encryption/field-encryptor';
import { errorMessage } from '../../common/utils/error-message';
import { AppConfigService } from '../../config/app-config.service';
import { Actor, isGlobalAdmin } from '../../entities/user.entity';
import { AuditService } from '../audit/audit.service';
import { WorkspaceAccessService } from '../workspaces/workspace-access.service';
import { StorageView, toStorageView } from './storage.dto';
import {
  StorageAttachmentConstraint,
  StorageAttachmentConstraintException,
  StorageNotFoundException,
  StoragePermissionDeniedException,
  StoragePermissionReason,
  StorageValidationException,
  SystemStorageConstraint,
  SystemStorageConstraintException,
} from './storage.errors';
import { StorageRepository } from './storage.repository';
import { Storage, StorageInput } from './storage.types';
import { StorageAttachmentCounter } from './storage-attachment.counter';
import { StorageConnectionTester } from './storage-connection.tester';
import { StorageType } from './storage-type.enum';
import { StorageVariantRegistry } from './storage-variants';

@Injectable()
export class StoragesService {
  private readonly logger = new Logger(StoragesService.name);

  constructor(
    private readonly storages: StorageRepository,
    private readonly workspaceAccess: WorkspaceAccessService,
    private readonly attachments: StorageAttachmentCounter,
    private readonly auditService: AuditService,
    private readonly encryptor: FieldEncryptor,
    private readonly variants: StorageVariantRegistry,
    private readonly connectionTester: StorageConnectionTester,
    private readonly config: AppConfigService,
  ) { }

  /**
   * Create (no id) or update (id present) a storage in `workspaceId`.
   * Returns the persisted record with every secret blanked.
   */
  async saveStorage(actor: Actor, workspaceId: string, input: StorageInput): Promise<StorageView> {
    await this.assertCanManage(workspaceId, actor, StoragePermissionReason.MANAGE);
    this.assertLocalStorageAllowed(actor, input.variant.type);
    if (input.isSystem && !isGlobalAdmin(actor)) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.SYSTEM_STORAGE);
    }
    if (!input.name.trim()) {
      throw new StorageValidationException('storage name is required');
    }

    const saved = input.id
      ? await this.updateStorage(actor, workspaceId, input.id, input)
      : await this.createStorage(actor, workspaceId, input);
    return this.toView(saved, actor);
  }

  async deleteStorage(actor: Actor, id: string): Promise<void> {
    const storage = await this.getStorageById(id);
    await this.assertCanManage(storage.workspaceId, actor, StoragePermissionReason.MANAGE);
    if (storage.isSystem && !isGlobalAdmin(actor)) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.SYSTEM_STORAGE);
    }

    const attached = await this.attachments.getStorageAttachedDatabaseIds(id);
    if (attached.length > 0) {
      throw new StorageAttachmentConstraintException(StorageAttachmentConstraint.DELETE_BLOCKED);
    }

    await this.storages.delete(id);
    this.logger.log(`Deleted storage ${id} from workspace ${storage.workspaceId}`);
    await this.recordAudit(`Storage deleted: ${storage.name}`, actor.id, storage.workspaceId);
  }

  async getStorage(actor: Actor, id: string): Promise<StorageView> {
    const storage = await this.getStorageById(id);
    if (!storage.isSystem) {
      const { canView } = await this.workspaceAccess.canUserViewWorkspace(storage.workspaceId, actor);
      if (!canView) {
        throw new StoragePermissionDeniedException(StoragePermissionReason.VIEW);
      }
    }
    return this.toView(storage, actor);
  }

  async getStorages(actor: Actor, workspaceId: string): Promise<StorageView[]> {
    const { canView } = await this.workspaceAccess.canUserViewWorkspace(workspaceId, actor);
    if (!canView) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.VIEW_LIST);
    }
    const storages = await this.storages.findByWorkspaceId(workspaceId);
    return storages.map((storage) => this.toView(storage, actor));
  }

  /**
   * Tests a persisted storage and records the outcome in `lastSaveError`.
   * The connection failure is rethrown after it has been recorded.
   */
  async testStorageConnection(actor: Actor, id: string, signal?: AbortSignal): Promise<void> {
    const storage = await this.getStorageById(id);
    const { canView } = await this.workspaceAccess.canUserViewWorkspace(storage.workspaceId, actor);
    if (!canView) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.TEST);
    }

    try {
      await this.connectionTester.test(storage.variant, storage.id, signal);
    } catch (err) {
      try {
        await this.recordConnectionResult(id, errorMessage(err));
      } catch (recordErr) {
        this.logger.error(
          `Could not record connection test result for storage ${id}: ${errorMessage(recordErr)}`,
        );
      }
      throw err;
    }
    await this.recordConnectionResult(id, null);
  }

  /**
   * Tests a submitted configuration without persisting anything. When the
   * input references a stored record, its secrets fill in the blanks.
   */
  async testStorageConnectionDirect(
    actor: Actor,
    input: StorageInput,
    signal?: AbortSignal,
  ): Promise<void> {
    const { canView } = await this.workspaceAccess.canUserViewWorkspace(input.workspaceId, actor);
    if (!canView) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.TEST);
    }
    this.assertLocalStorageAllowed(actor, input.variant.type);

    if (!input.id) {
      this.variants.validateVariant(input.variant, true);
      await this.connectionTester.test(input.variant, undefined, signal);
      return;
    }

    const existing = await this.getStorageById(input.id);
    if (existing.workspaceId !== input.workspaceId) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.WORKSPACE_MISMATCH);
    }
    // Stored secrets are about to be used against a caller-chosen endpoint.
    await this.assertCanManage(existing.workspaceId, actor, StoragePermissionReason.MANAGE);
    if (existing.isSystem && !isGlobalAdmin(actor)) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.SYSTEM_STORAGE);
    }

    const { variant, replaced } = this.variants.mergeVariant(existing.variant, input.variant);
    this.variants.validateVariant(variant, replaced);
    await this.connectionTester.test(variant, existing.id, signal);
  }

  async transferStorageToWorkspace(
    actor: Actor,
    id: string,
    targetWorkspaceId: string,
    singleDatabaseId?: string,
  ): Promise<void> {
    const storage = await this.getStorageById(id);
    if (storage.isSystem) {
      throw new SystemStorageConstraintException(SystemStorageConstraint.CANNOT_TRANSFER);
    }
    await this.assertCanManage(storage.workspaceId, actor, StoragePermissionReason.SOURCE_WORKSPACE);
    await this.assertCanManage(targetWorkspaceId, actor, StoragePermissionReason.TARGET_WORKSPACE);

    const attached = await this.attachments.getStorageAttachedDatabaseIds(id);
    if (singleDatabaseId) {
      if (attached.some((databaseId) => databaseId !== singleDatabaseId)) {
        throw new StorageAttachmentConstraintException(
          StorageAttachmentConstraint.OTHER_DATABASES_ATTACHED,
        );
      }
    } else if (attached.length > 0) {
      throw new StorageAttachmentConstraintException(StorageAttachmentConstraint.TRANSFER_BLOCKED);
    }

    const sourceWorkspaceId = storage.workspaceId;
    await this.storages.save({ ...storage, workspaceId: targetWorkspaceId });
    this.logger.log(
      `Transferred storage ${id} from workspace ${sourceWorkspaceId} to ${targetWorkspaceId}`,
    );
    await this.recordAudit(
      `Storage transferred: ${storage.name} from workspace ${sourceWorkspaceId} to workspace ${targetWorkspaceId}`,
      actor.id,
      targetWorkspaceId,
    );
  }

  /**
   * Runs before a workspace is removed. A system storage owned by the
   * workspace blocks the deletion; nothing is deleted in that case.
   */
  async onBeforeWorkspaceDeletion(workspaceId: string): Promise<void> {
    const storages = await this.storages.findByWorkspaceId(workspaceId);
    const owned = storages.filter((storage) => storage.workspaceId === workspaceId);

    if (owned.some((storage) => storage.isSystem)) {
      throw new SystemStorageConstraintException(
        SystemStorageConstraint.BLOCKS_WORKSPACE_DELETION,
      );
    }

    for (const storage of owned) {
      await this.storages.delete(storage.id);
    }
    this.logger.log(`Removed ${owned.length} storage(s) of workspace ${workspaceId}`);
  }

  /** Persisted record with secrets still encrypted. No permission check. */
  async getStorageById(id: string): Promise<Storage> {
    const storage = await this.storages.findById(id);
    if (!storage) {
      throw new StorageNotFoundException(id);
    }
    return storage;
  }

  private async createStorage(actor: Actor, workspaceId: string, input: StorageInput): Promise<Storage> {
    const storage: Storage = {
      id: crypto.randomUUID(),
      workspaceId,
      name: input.name.trim(),
      isSystem: input.isSystem,
      lastSaveError: null,
      variant: input.variant,
    };
    this.variants.validateVariant(storage.variant, true);
    this.variants.encryptVariant(storage.variant, this.encryptor, storage.id);

    const saved = await this.storages.save(storage);
    this.logger.log(
      `Created ${saved.variant.type} storage ${saved.id} in workspace ${workspaceId}`,
    );
    await this.recordAudit(`Storage created: ${saved.name}`, actor.id, workspaceId);
    return saved;
  }

  private async updateStorage(
    actor: Actor,
    workspaceId: string,
    id: string,
    input: StorageInput,
  ): Promise<Storage> {
    const existing = await this.getStorageById(id);
    if (existing.workspaceId !== workspaceId) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.WORKSPACE_MISMATCH);
    }
    if (existing.isSystem && !input.isSystem) {
      throw new SystemStorageConstraintException(SystemStorageConstraint.CANNOT_MAKE_PRIVATE);
    }

    const { variant, replaced } = this.variants.mergeVariant(existing.variant, input.variant);
    this.variants.validateVariant(variant, replaced);
    this.variants.encryptVariant(variant, this.encryptor, existing.id);

    const saved = await this.storages.save({
      ...existing,
      name: input.name.trim(),
      isSystem: input.isSystem,
      variant,
    });
    this.logger.log(`Updated ${saved.variant.type} storage ${saved.id} in workspace ${workspaceId}`);
    await this.recordAudit(`Storage updated: ${saved.name}`, actor.id, workspaceId);
    return saved;
  }

  private async assertCanManage(
    workspaceId: string,
    actor: Actor,
    reason: StoragePermissionReason,
  ): Promise<void> {
    const canManage = await this.workspaceAccess.canUserManageStorages(workspaceId, actor);
    if (!canManage) {
      throw new StoragePermissionDeniedException(reason);
    }
  }

  private assertLocalStorageAllowed(actor: Actor, type: StorageType): void {
    if (this.config.isCloudMode() && type === StorageType.LOCAL && !isGlobalAdmin(actor)) {
      throw new StoragePermissionDeniedException(StoragePermissionReason.LOCAL_IN_CLOUD);
    }
  }

  // Re-reads the row so an edit made during the test is not overwritten.
  private async recordConnectionResult(id: string, lastSaveError: string | null): Promise<void> {
    const current = await this.storages.findById(id);
    if (!current) {
      return;
    }
    if (lastSaveError) {
      this.logger.warn(`Connection test failed for storage ${id}: ${lastSaveError}`);
    }
    await this.storages.save({ ...current, lastSaveError });
  }

  private toView(storage: Storage, actor: Actor): StorageView {
    const copy = structuredClone(storage);
    this.variants.hideVariant(copy.variant);
    return toStorageView(copy, { hideAllData: storage.isSystem && !isGlobalAdmin(actor) });
  }

  private async recordAudit(message: string, actorId: string, workspaceId: string): Promise<void> {
    try {
      await this.auditService.writeAuditLog(message, actorId, workspaceId);
    } catch (err) {
      this.logger.error(`Audit entry "${message}" was not recorded: ${errorMessage(err)}`);
    }
  }
}
