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

import { OAuth2Client } from 'google-auth-library';
import { AesFieldEncryptor } from 'src/common/encryption/aes-field-encryptor';
import {
    DRIVE_ABOUT_URL,
    GoogleDriveStorageConfig,
    googleDriveStorageConfigSchema,
    GoogleDriveStorageHandler,
    parseOAuthToken,
    toCredentials,
} from 'src/modules/storages/variants/google-drive-storage.handler';
import { createTestConfig } from '../../../helpers/test-config';

const mockSetCredentials = jest.fn();
const mockGetAccessToken = jest.fn();
const mockRequest = jest.fn();

jest.mock('google-auth-library', () => ({
    OAuth2Client: jest.fn().mockImplementation(() => ({
        setCredentials: mockSetCredentials,
        getAccessToken: mockGetAccessToken,
        request: mockRequest,
    })),
}));

const STORAGE_ID = '8e4b1c7d-3a9f-4d2e-a6b5-0c1d2e3f4a59';
const TOKEN_JSON = JSON.stringify({
    access_token: 'test-access-token',
    refresh_token: 'test-refresh-token',
    token_type: 'Bearer',
    expiry: '2030-01-01T00:00:00Z',
});

function driveConfig(overrides: Partial<GoogleDriveStorageConfig> = {}): GoogleDriveStorageConfig {
    return {
        ...googleDriveStorageConfigSchema.parse({
            clientId: 'test-client-id',
            clientSecret: 'test-secret',
            tokenJson: TOKEN_JSON,
        }),
        ...overrides,
    };
}

describe('GoogleDriveStorageHandler', () => {
    const handler = new GoogleDriveStorageHandler();
    const encryptor = new AesFieldEncryptor(createTestConfig());
    const context = { encryptor, entityId: STORAGE_ID, timeoutMs: 1000 };

    beforeEach(() => {
        mockGetAccessToken.mockResolvedValue({ token: 'test-access-token' });
        mockRequest.mockResolvedValue({ status: 200, data: {} });
    });

    afterEach(() => {
        jest.clearAllMocks();
    });

    describe('token parsing', () => {
        it('should reject malformed JSON and tokens without credentials', () => {
            expect(parseOAuthToken('not json')).toBeNull();
            expect(parseOAuthToken('{"token_type":"Bearer"}')).toBeNull();
            expect(parseOAuthToken('[]')).toBeNull();
        });

        it('should convert an RFC 3339 expiry to epoch milliseconds', () => {
            const token = parseOAuthToken(TOKEN_JSON);
            expect(token).not.toBeNull();
            expect(token && toCredentials(token)).toEqual({
                access_token: 'test-access-token',
                refresh_token: 'test-refresh-token',
                token_type: 'Bearer',
                scope: undefined,
                expiry_date: 1893456000000,
            });
        });
    });

    describe('validate', () => {
        it('should require the client id', () => {
            expect(() => handler.validate(driveConfig({ clientId: '' }), false)).toThrow(
                'Google Drive client id is required',
            );
        });

        it('should require secret and token on create', () => {
            expect(() => handler.validate(driveConfig({ clientSecret: '' }), true)).toThrow(
                'Google Drive client secret is required',
            );
            expect(() => handler.validate(driveConfig({ tokenJson: '' }), true)).toThrow(
                'Google Drive token JSON is required',
            );
        });

        it('should reject a submitted token that is not OAuth JSON', () => {
            expect(() => handler.validate(driveConfig({ tokenJson: '{"foo":1}' }), false)).toThrow(
                'Google Drive token JSON must contain an access_token or a refresh_token',
            );
        });

        it('should not inspect stored ciphertext', () => {
            const config = driveConfig();
            handler.encryptSensitiveData(config, encryptor, STORAGE_ID);
            expect(() => handler.validate(config, false)).not.toThrow();
        });
    });

    describe('testConnection', () => {
        it('should refresh credentials and query the Drive API', async () => {
            const config = driveConfig();
            handler.encryptSensitiveData(config, encryptor, STORAGE_ID);

            await handler.testConnection(config, context);

            expect(OAuth2Client).toHaveBeenCalledWith({
                clientId: 'test-client-id',
                clientSecret: 'test-secret',
            });
            expect(mockSetCredentials).toHaveBeenCalledWith(
                expect.objectContaining({
                    access_token: 'test-access-token',
                    refresh_token: 'test-refresh-token',
                    expiry_date: 1893456000000,
                }),
            );
            expect(mockRequest).toHaveBeenCalledWith({ url: DRIVE_ABOUT_URL, timeout: 1000 });
        });

        it('should fail when no access token can be obtained', async () => {
            mockGetAccessToken.mockResolvedValueOnce({ token: null });

            await expect(handler.testConnection(driveConfig(), context)).rejects.toThrow(
                'Google Drive connection failed: unable to obtain an access token',
            );
            expect(mockRequest).not.toHaveBeenCalled();
        });

        it('should wrap Drive API errors', async () => {
            mockRequest.mockRejectedValueOnce(new Error('Request had insufficient authentication scopes.'));

            await expect(handler.testConnection(driveConfig(), context)).rejects.toThrow(
                'Google Drive connection failed: Request had insufficient authentication scopes.',
            );
        });
    });
});
