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

import { AesFieldEncryptor } from 'src/common/encryption/aes-field-encryptor';
import { FieldDecryptionException } from 'src/common/encryption/encryption.errors';
import { createTestConfig } from '../../helpers/test-config';

const STORAGE_A = '6d1f4c9e-3b1a-4e55-9b7e-0c2b1f6a9d01';
const STORAGE_B = '0a7c2e4d-8f3b-4c21-a5d6-7e9f1b2c3d04';

describe('AesFieldEncryptor', () => {
    const encryptor = new AesFieldEncryptor(createTestConfig());

    it('should round-trip a value for the same entity', () => {
        const ciphertext = encryptor.encrypt(STORAGE_A, 'test-secret');

        expect(ciphertext.startsWith('enc:')).toBe(true);
        expect(ciphertext).not.toContain('test-secret');
        expect(encryptor.decrypt(STORAGE_A, ciphertext)).toBe('test-secret');
    });

    it('should round-trip an empty string', () => {
        const ciphertext = encryptor.encrypt(STORAGE_A, '');
        expect(encryptor.decrypt(STORAGE_A, ciphertext)).toBe('');
    });

    it('should produce a different ciphertext on every call', () => {
        const first = encryptor.encrypt(STORAGE_A, 'test-secret');
        const second = encryptor.encrypt(STORAGE_A, 'test-secret');

        expect(first).not.toBe(second);
        expect(encryptor.decrypt(STORAGE_A, second)).toBe('test-secret');
    });

    it('should refuse ciphertext copied to another entity', () => {
        const ciphertext = encryptor.encrypt(STORAGE_A, 'test-secret');
        expect(() => encryptor.decrypt(STORAGE_B, ciphertext)).toThrow(FieldDecryptionException);
    });

    it('should refuse ciphertext produced under another master key', () => {
        const other = new AesFieldEncryptor(
            createTestConfig({ STORAGE_ENCRYPTION_KEY: 'another-test-secret-another-test-secret' }),
        );
        const ciphertext = other.encrypt(STORAGE_A, 'test-secret');
        expect(() => encryptor.decrypt(STORAGE_A, ciphertext)).toThrow(FieldDecryptionException);
    });

    it('should refuse values without the marker', () => {
        expect(() => encryptor.decrypt(STORAGE_A, 'test-secret')).toThrow(FieldDecryptionException);
    });

    it('should refuse truncated payloads', () => {
        expect(() => encryptor.decrypt(STORAGE_A, 'enc:AAAA')).toThrow(FieldDecryptionException);
    });

    it('should refuse tampered payloads', () => {
        const ciphertext = encryptor.encrypt(STORAGE_A, 'test-secret');
        const payload = Buffer.from(ciphertext.slice('enc:'.length), 'base64');
        payload[payload.length - 1] ^= 0xff;

        expect(() => encryptor.decrypt(STORAGE_A, 'enc:' + payload.toString('base64'))).toThrow(
            FieldDecryptionException,
        );
    });

    it('should report a generic message without key material', () => {
        expect(() => encryptor.decrypt(STORAGE_A, 'enc:AAAA')).toThrow('Failed to decrypt sensitive field');
    });

    describe('decryptIfEncrypted', () => {
        it('should pass plaintext through', () => {
            expect(encryptor.decryptIfEncrypted(undefined, 'test-secret')).toBe('test-secret');
            expect(encryptor.decryptIfEncrypted(STORAGE_A, '')).toBe('');
        });

        it('should decrypt marked values', () => {
            const ciphertext = encryptor.encrypt(STORAGE_A, 'test-secret');
            expect(encryptor.decryptIfEncrypted(STORAGE_A, ciphertext)).toBe('test-secret');
        });

        it('should refuse marked values without an owner', () => {
            const ciphertext = encryptor.encrypt(STORAGE_A, 'test-secret');
            expect(() => encryptor.decryptIfEncrypted(undefined, ciphertext)).toThrow(
                FieldDecryptionException,
            );
        });
    });
});
