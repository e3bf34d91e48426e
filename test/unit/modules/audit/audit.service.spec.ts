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
import { getRepositoryToken } from '@nestjs/typeorm';
import { AuditLog } from 'src/entities/audit-log.entity';
import { AuditService } from 'src/modules/audit/audit.service';

describe('AuditService', () => {
    let service: AuditService;
    let repo: { create: jest.Mock; save: jest.Mock };

    beforeEach(async () => {
        repo = {
            create: jest.fn((entry: Partial<AuditLog>) => ({ ...entry })),
            save: jest.fn(async (entry: Partial<AuditLog>) => ({ id: 'log-1', ...entry })),
        };

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                AuditService,
                {
                    provide: getRepositoryToken(AuditLog),
                    useValue: repo,
                },
            ],
        }).compile();

        service = module.get<AuditService>(AuditService);
    });

    it('should store the entry', async () => {
        const result = await service.writeAuditLog('Storage created: Offsite', 'u1', 'w1');

        expect(repo.create).toHaveBeenCalledWith({
            message: 'Storage created: Offsite',
            userId: 'u1',
            workspaceId: 'w1',
        });
        expect(result).toEqual({
            id: 'log-1',
            message: 'Storage created: Offsite',
            userId: 'u1',
            workspaceId: 'w1',
        });
    });

    it('should accept entries without a user or workspace', async () => {
        await service.writeAuditLog('Maintenance finished', null, null);

        expect(repo.save).toHaveBeenCalledWith({
            message: 'Maintenance finished',
            userId: null,
            workspaceId: null,
        });
    });

    it('should propagate storage failures', async () => {
        repo.save.mockRejectedValue(new Error('connection lost'));

        await expect(service.writeAuditLog('Storage deleted: Offsite', 'u1', 'w1')).rejects.toThrow(
            'connection lost',
        );
    });
});
