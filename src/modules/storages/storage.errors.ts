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
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
} from '@nestjs/common';

export enum StoragePermissionReason {
  MANAGE = 'manage',
  VIEW = 'view',
  VIEW_LIST = 'view_list',
  TEST = 'test',
  SOURCE_WORKSPACE = 'source_workspace',
  TARGET_WORKSPACE = 'target_workspace',
  LOCAL_IN_CLOUD = 'local_in_cloud',
  WORKSPACE_MISMATCH = 'workspace_mismatch',
  SYSTEM_STORAGE = 'system_storage',
}

const PERMISSION_MESSAGES: Record<StoragePermissionReason, string> = {
  [StoragePermissionReason.MANAGE]: 'insufficient permissions to manage storage in this workspace',
  [StoragePermissionReason.VIEW]: 'insufficient permissions to view storage in this workspace',
  [StoragePermissionReason.VIEW_LIST]: 'insufficient permissions to view storages in this workspace',
  [StoragePermissionReason.TEST]: 'insufficient permissions to test storage in this workspace',
  [StoragePermissionReason.SOURCE_WORKSPACE]:
    'insufficient permissions to manage storage in source workspace',
  [StoragePermissionReason.TARGET_WORKSPACE]:
    'insufficient permissions to manage storage in target workspace',
  [StoragePermissionReason.LOCAL_IN_CLOUD]:
    'local storage can only be managed by administrators in cloud mode',
  [StoragePermissionReason.WORKSPACE_MISMATCH]: 'storage does not belong to this workspace',
  [StoragePermissionReason.SYSTEM_STORAGE]: 'only administrators can manage system storages',
};

export class StoragePermissionDeniedException extends ForbiddenException {
  constructor(readonly reason: StoragePermissionReason) {
    super(PERMISSION_MESSAGES[reason]);
  }
}

export class StorageNotFoundException extends NotFoundException {
  constructor(id: string) {
    super(`Storage ${id} not found`);
  }
}

export class StorageValidationException extends BadRequestException { }

export enum SystemStorageConstraint {
  CANNOT_MAKE_PRIVATE = 'cannot_make_private',
  CANNOT_TRANSFER = 'cannot_transfer',
  BLOCKS_WORKSPACE_DELETION = 'blocks_workspace_deletion',
}

const SYSTEM_CONSTRAINT_MESSAGES: Record<SystemStorageConstraint, string> = {
  [SystemStorageConstraint.CANNOT_MAKE_PRIVATE]: 'system storage cannot be changed to non-system',
  [SystemStorageConstraint.CANNOT_TRANSFER]:
    'system storage cannot be transferred between workspaces',
  [SystemStorageConstraint.BLOCKS_WORKSPACE_DELETION]:
    'system storage cannot be deleted due to workspace deletion, please transfer or remove storage first',
};

export class SystemStorageConstraintException extends BadRequestException {
  constructor(readonly constraint: SystemStorageConstraint) {
    super(SYSTEM_CONSTRAINT_MESSAGES[constraint]);
  }
}

export enum StorageAttachmentConstraint {
  DELETE_BLOCKED = 'delete_blocked',
  TRANSFER_BLOCKED = 'transfer_blocked',
  OTHER_DATABASES_ATTACHED = 'other_databases_attached',
}

const ATTACHMENT_CONSTRAINT_MESSAGES: Record<StorageAttachmentConstraint, string> = {
  [StorageAttachmentConstraint.DELETE_BLOCKED]:
    'storage has attached databases and cannot be deleted',
  [StorageAttachmentConstraint.TRANSFER_BLOCKED]:
    'storage has attached databases and cannot be transferred',
  [StorageAttachmentConstraint.OTHER_DATABASES_ATTACHED]:
    'storage has other attached databases and cannot be transferred',
};

export class StorageAttachmentConstraintException extends ConflictException {
  constructor(readonly constraint: StorageAttachmentConstraint) {
    super(ATTACHMENT_CONSTRAINT_MESSAGES[constraint]);
  }
}

export class StorageConnectionFailedException extends BadRequestException { }
