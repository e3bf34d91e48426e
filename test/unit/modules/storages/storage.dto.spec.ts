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
    parseStorageInput,
    parseTransferStorage,
    parseWorkspaceIdQuery,
    toStorageView,
} from 'src/modules/storages/storage.dto';
import { StorageValidationException } from 'src/modules/storages/storage.errors';
import { Storage } from 'src/modules/storages/storage.types';
import { StorageType } from 'src/modules/storages/storage-type.enum';
import { parseStorageVariant } from 'src/modules/storages/storage-variants';

const WORKSPACE_ID = '5f0c2d7e-9a1b-4c3d-8e6f-7a8b9c0d1e2f';
const STORAGE_ID = 'c3d4e5f6-a7b8-4c9d-8e0f-1a2b3c4d5e6f';

describe('parseStorageInput', () => {
    it('should build a typed input and ignore payloads of other types', () => {
        const input = parseStorageInput({
            workspaceId: WORKSPACE_ID,
            name: '  Offsite  ',
            type: 'S3',
            s3Storage: { s3Bucket: 'backups', s3AccessKey: 'test-access-key', s3SecretKey: 'test-secret' },
            nasStorage: { host: 'ignored' },
        });

        expect(input).toEqual({
            workspaceId: WORKSPACE_ID,
            name: 'Offsite',
            isSystem: false,
            variant: parseStorageVariant(StorageType.S3, {
                s3Bucket: 'backups',
                s3AccessKey: 'test-access-key',
                s3SecretKey: 'test-secret',
            }),
        });
        expect(input).not.toHaveProperty('id');
    });

    it('should keep the id of an existing storage', () => {
        const input = parseStorageInput({
            id: STORAGE_ID,
            workspaceId: WORKSPACE_ID,
            name: 'Disk',
            type: 'LOCAL',
            isSystem: true,
        });

        expect(input.id).toBe(STORAGE_ID);
        expect(input.isSystem).toBe(true);
        expect(input.variant).toEqual({ type: StorageType.LOCAL, config: {} });
    });

    it('should require the workspace', () => {
        expect(() => parseStorageInput({ name: 'Disk', type: 'LOCAL' })).toThrow(
            new StorageValidationException('workspaceId: workspaceId is required'),
        );
    });

    it('should reject unknown storage types', () => {
        expect(() =>
            parseStorageInput({ workspaceId: WORKSPACE_ID, name: 'Disk', type: 'DROPBOX' }),
        ).toThrow(StorageValidationException);
    });

    it('should reject non-object bodies', () => {
        expect(() => parseStorageInput('LOCAL')).toThrow(StorageValidationException);
    });
});

describe('parseTransferStorage', () => {
    it('should require a target workspace id', () => {
        expect(parseTransferStorage({ targetWorkspaceId: WORKSPACE_ID })).toEqual({
            targetWorkspaceId: WORKSPACE_ID,
        });
        expect(() => parseTransferStorage({})).toThrow(
            'targetWorkspaceId: targetWorkspaceId is required',
        );
    });
});

describe('parseWorkspaceIdQuery', () => {
    it('should accept a uuid', () => {
        expect(parseWorkspaceIdQuery(WORKSPACE_ID)).toBe(WORKSPACE_ID);
    });

    it('should tell a missing value from a malformed one', () => {
        expect(() => parseWorkspaceIdQuery(undefined)).toThrow(
            new StorageValidationException('workspace_id is required'),
        );
        expect(() => parseWorkspaceIdQuery('')).toThrow(
            new StorageValidationException('workspace_id is required'),
        );
        expect(() => parseWorkspaceIdQuery('workspace-1')).toThrow(
            new StorageValidationException('invalid workspace_id'),
        );
    });
});

describe('toStorageView', () => {
    const storage: Storage = {
        id: STORAGE_ID,
        workspaceId: WORKSPACE_ID,
        name: 'Offsite',
        isSystem: false,
        lastSaveError: 'S3 connection failed: Forbidden',
        variant: parseStorageVariant(StorageType.S3, { s3Bucket: 'backups' }),
    };

    it('should expose only the payload of the active type', () => {
        expect(toStorageView(storage, { hideAllData: false })).toEqual({
            id: STORAGE_ID,
            workspaceId: WORKSPACE_ID,
            name: 'Offsite',
            type: StorageType.S3,
            isSystem: false,
            lastSaveError: 'S3 connection failed: Forbidden',
            localStorage: null,
            s3Storage: storage.variant.config,
            nasStorage: null,
            azureBlobStorage: null,
            ftpStorage: null,
            sftpStorage: null,
            googleDriveStorage: null,
            rcloneStorage: null,
        });
    });

    it('should null every payload when all data is hidden', () => {
        const view = toStorageView(storage, { hideAllData: true });

        expect(view.type).toBe(StorageType.S3);
        expect(view.s3Storage).toBeNull();
    });
});
