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

import { StorageValidationException } from 'src/modules/storages/storage.errors';
import { StorageType } from 'src/modules/storages/storage-type.enum';
import {
    parseStorageVariant,
    STORAGE_PAYLOAD_KEYS,
    StorageVariantRegistry,
} from 'src/modules/storages/storage-variants';
import { createTestConfig } from '../../helpers/test-config';

describe('parseStorageVariant', () => {
    it('should accept a missing payload for local storage', () => {
        expect(parseStorageVariant(StorageType.LOCAL, null)).toEqual({
            type: StorageType.LOCAL,
            config: {},
        });
    });

    it('should require the payload of every other type', () => {
        expect(() => parseStorageVariant(StorageType.S3, null)).toThrow(
            new StorageValidationException('s3Storage is required for storage type S3'),
        );
        expect(() => parseStorageVariant(StorageType.RCLONE, undefined)).toThrow(
            'rcloneStorage is required for storage type RCLONE',
        );
    });

    it('should fill variant defaults', () => {
        expect(parseStorageVariant(StorageType.SFTP, { host: 'sftp.example.test' })).toEqual({
            type: StorageType.SFTP,
            config: {
                host: 'sftp.example.test',
                port: 22,
                username: '',
                password: '',
                privateKey: '',
                skipHostKeyVerify: false,
                hostKeyFingerprint: '',
                path: '',
            },
        });
    });

    it('should name the offending field', () => {
        expect(() => parseStorageVariant(StorageType.NAS, { host: 'nas.local', port: '445' })).toThrow(
            'nasStorage.port: Expected number, received string',
        );
    });

    it('should map every type to a payload key', () => {
        expect(Object.keys(STORAGE_PAYLOAD_KEYS).sort()).toEqual(Object.values(StorageType).sort());
    });
});

describe('StorageVariantRegistry', () => {
    const registry = new StorageVariantRegistry(createTestConfig());

    it('should dispatch validation to the matching handler', () => {
        const variant = parseStorageVariant(StorageType.FTP, { host: '', username: 'backup' });
        expect(() => registry.validateVariant(variant, false)).toThrow('FTP host is required');
    });

    it('should dispatch hiding to the matching handler', () => {
        const variant = parseStorageVariant(StorageType.GOOGLE_DRIVE, {
            clientId: 'test-client-id',
            clientSecret: 'test-secret',
            tokenJson: '{"refresh_token":"test-refresh-token"}',
        });
        registry.hideVariant(variant);

        expect(variant.config).toEqual({ clientId: 'test-client-id', clientSecret: '', tokenJson: '' });
    });

    describe('mergeVariant', () => {
        it('should update in place and keep omitted secrets when the type is unchanged', () => {
            const current = parseStorageVariant(StorageType.NAS, {
                host: 'nas.local',
                share: 'backups',
                username: 'backup',
                password: 'enc:stored',
            });
            const incoming = parseStorageVariant(StorageType.NAS, {
                host: 'nas2.local',
                share: 'backups',
                username: 'backup',
                password: '',
            });

            const merged = registry.mergeVariant(current, incoming);

            expect(merged.replaced).toBe(false);
            expect(merged.variant).toBe(current);
            expect(merged.variant.config).toEqual(
                expect.objectContaining({ host: 'nas2.local', password: 'enc:stored' }),
            );
        });

        it('should replace the payload when the type changes', () => {
            const current = parseStorageVariant(StorageType.S3, {
                s3Bucket: 'backups',
                s3AccessKey: 'enc:stored',
            });
            const incoming = parseStorageVariant(StorageType.FTP, {
                host: 'ftp.example.test',
                username: 'backup',
            });

            const merged = registry.mergeVariant(current, incoming);

            expect(merged.replaced).toBe(true);
            expect(merged.variant).toBe(incoming);
        });
    });
});
