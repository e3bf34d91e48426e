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

import { Test, TestingModule } from '@nestjs/testing';
import { EventEmitter } from 'events';
import { Actor, UserRole } from 'src/entities/user.entity';
import { StorageValidationException } from 'src/modules/storages/storage.errors';
import { StorageType } from 'src/modules/storages/storage-type.enum';
import { abortOnDisconnect, StoragesController } from 'src/modules/storages/storages.controller';
import { StoragesService } from 'src/modules/storages/storages.service';

const WORKSPACE_ID = '0b7e4a52-1c1f-4a57-9a5e-3f6f2d3c4b5a';
const TARGET_WORKSPACE_ID = '8d2f6c1e-5b4a-4e3d-9c2b-1a0f9e8d7c6b';
const STORAGE_ID = 'c3d4e5f6-a7b8-4c9d-8e0f-1a2b3c4d5e6f';

function fakeConnection(writableFinished = false) {
    return Object.assign(new EventEmitter(), { writableFinished });
}

describe('StoragesController', () => {
    let controller: StoragesController;

    const actor: Actor = { id: 'member-1', role: UserRole.MEMBER };

    const mockStoragesService = {
        saveStorage: jest.fn(),
        getStorages: jest.fn(),
        getStorage: jest.fn(),
        deleteStorage: jest.fn(),
        testStorageConnection: jest.fn(),
        testStorageConnectionDirect: jest.fn(),
        transferStorageToWorkspace: jest.fn(),
    };

    beforeEach(async () => {
        const module: TestingModule = await Test.createTestingModule({
            controllers: [StoragesController],
            providers: [
                {
                    provide: StoragesService,
                    useValue: mockStoragesService,
                },
            ],
        }).compile();

        controller = module.get<StoragesController>(StoragesController);
        jest.clearAllMocks();
    });

    it('should be defined', () => {
        expect(controller).toBeDefined();
    });

    describe('save', () => {
        it('should parse the body and save into its workspace', async () => {
            const view = { id: STORAGE_ID, name: 'Disk' };
            mockStoragesService.saveStorage.mockResolvedValue(view);

            const result = await controller.save(actor, {
                workspaceId: WORKSPACE_ID,
                name: 'Disk',
                type: 'LOCAL',
                localStorage: {},
            });

            expect(result).toBe(view);
            expect(mockStoragesService.saveStorage).toHaveBeenCalledWith(actor, WORKSPACE_ID, {
                workspaceId: WORKSPACE_ID,
                name: 'Disk',
                isSystem: false,
                variant: { type: StorageType.LOCAL, config: {} },
            });
        });

        it('should reject a body without a type payload', async () => {
            await expect(
                controller.save(actor, { workspaceId: WORKSPACE_ID, name: 'Offsite', type: 'S3' }),
            ).rejects.toThrow('s3Storage is required for storage type S3');
            expect(mockStoragesService.saveStorage).not.toHaveBeenCalled();
        });
    });

    describe('list', () => {
        it('should require the workspace query parameter', async () => {
            await expect(controller.list(actor)).rejects.toThrow(
                new StorageValidationException('workspace_id is required'),
            );
        });

        it('should reject a malformed workspace id', async () => {
            await expect(controller.list(actor, 'not-a-uuid')).rejects.toThrow(
                new StorageValidationException('invalid workspace_id'),
            );
            expect(mockStoragesService.getStorages).not.toHaveBeenCalled();
        });

        it('should list the workspace storages', async () => {
            mockStoragesService.getStorages.mockResolvedValue([]);

            await expect(controller.list(actor, WORKSPACE_ID)).resolves.toEqual([]);
            expect(mockStoragesService.getStorages).toHaveBeenCalledWith(actor, WORKSPACE_ID);
        });
    });

    it('should fetch one storage', async () => {
        mockStoragesService.getStorage.mockResolvedValue({ id: STORAGE_ID });

        await expect(controller.get(actor, STORAGE_ID)).resolves.toEqual({ id: STORAGE_ID });
        expect(mockStoragesService.getStorage).toHaveBeenCalledWith(actor, STORAGE_ID);
    });

    it('should delete a storage', async () => {
        mockStoragesService.deleteStorage.mockResolvedValue(undefined);

        await expect(controller.remove(actor, STORAGE_ID)).resolves.toEqual({
            message: 'storage deleted successfully',
        });
    });

    it('should test a stored connection', async () => {
        mockStoragesService.testStorageConnection.mockResolvedValue(undefined);

        await expect(controller.test(actor, STORAGE_ID, fakeConnection())).resolves.toEqual({
            message: 'successful',
        });
        expect(mockStoragesService.testStorageConnection).toHaveBeenCalledWith(
            actor,
            STORAGE_ID,
            expect.any(AbortSignal),
        );
    });

    it('should cancel a stored connection test when the client disconnects', async () => {
        const connection = fakeConnection();
        mockStoragesService.testStorageConnection.mockResolvedValue(undefined);

        await controller.test(actor, STORAGE_ID, connection);
        const signal: AbortSignal = mockStoragesService.testStorageConnection.mock.calls[0][2];
        expect(signal.aborted).toBe(false);

        connection.emit('close');

        expect(signal.aborted).toBe(true);
    });

    it('should test a submitted connection', async () => {
        mockStoragesService.testStorageConnectionDirect.mockResolvedValue(undefined);

        await expect(
            controller.testDirect(actor, {
                workspaceId: WORKSPACE_ID,
                name: 'Backup box',
                type: 'FTP',
                ftpStorage: { host: 'ftp.example.test', username: 'backup', password: 'test-secret' },
            }, fakeConnection()),
        ).resolves.toEqual({ message: 'successful' });
        expect(mockStoragesService.testStorageConnectionDirect).toHaveBeenCalledWith(
            actor,
            expect.objectContaining({
                variant: expect.objectContaining({ type: StorageType.FTP }),
            }),
            expect.any(AbortSignal),
        );
    });

    describe('abortOnDisconnect', () => {
        it('should abort when the connection closes before the response is sent', () => {
            const connection = fakeConnection();
            const signal = abortOnDisconnect(connection);

            connection.emit('close');

            expect(signal.aborted).toBe(true);
        });

        it('should not abort once the response has been sent', () => {
            const connection = fakeConnection(true);
            const signal = abortOnDisconnect(connection);

            connection.emit('close');

            expect(signal.aborted).toBe(false);
        });
    });

    describe('transfer', () => {
        it('should move the storage to the target workspace', async () => {
            mockStoragesService.transferStorageToWorkspace.mockResolvedValue(undefined);

            await expect(
                controller.transfer(actor, STORAGE_ID, { targetWorkspaceId: TARGET_WORKSPACE_ID }),
            ).resolves.toEqual({ message: 'storage transferred successfully' });
            expect(mockStoragesService.transferStorageToWorkspace).toHaveBeenCalledWith(
                actor,
                STORAGE_ID,
                TARGET_WORKSPACE_ID,
            );
        });

        it('should reject a body without a target', async () => {
            await expect(controller.transfer(actor, STORAGE_ID, {})).rejects.toThrow(
                'targetWorkspaceId: targetWorkspaceId is required',
            );
        });
    });
});
