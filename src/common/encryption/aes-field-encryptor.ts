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
import { AppConfigService } from 'src/config/app-config.service';
import { errorMessage } from '../utils/error-message';
import { FieldDecryptionException, FieldEncryptionException } from './encryption.errors';
import { ENCRYPTED_VALUE_PREFIX, FieldEncryptor } from './field-encryptor';

const ALGORITHM: crypto.CipherGCMTypes = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const KEY_INFO = 'storage-field-encryption';

/**
 * AES-256-GCM with a key derived per record (HKDF-SHA256, record id as salt).
 * Stored form: `enc:` + base64(iv | authTag | ciphertext).
 */
@Injectable()
export class AesFieldEncryptor extends FieldEncryptor {
  private readonly logger = new Logger(AesFieldEncryptor.name);

  constructor(private readonly config: AppConfigService) {
    super();
  }

  encrypt(entityId: string, plaintext: string): string {
    try {
      const iv = crypto.randomBytes(IV_LENGTH);
      const cipher = crypto.createCipheriv(ALGORITHM, this.deriveKey(entityId), iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      cipher.setAAD(Buffer.from(entityId, 'utf8'));
      const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
      const payload = Buffer.concat([iv, cipher.getAuthTag(), encrypted]);
      return ENCRYPTED_VALUE_PREFIX + payload.toString('base64');
    } catch (err) {
      this.logger.error(`Field encryption failed for entity ${entityId}: ${errorMessage(err)}`);
      throw new FieldEncryptionException();
    }
  }

  decrypt(entityId: string, ciphertext: string): string {
    if (!this.isEncrypted(ciphertext)) {
      throw new FieldDecryptionException();
    }

    const payload = Buffer.from(ciphertext.slice(ENCRYPTED_VALUE_PREFIX.length), 'base64');
    if (payload.length < IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new FieldDecryptionException();
    }

    const iv = payload.subarray(0, IV_LENGTH);
    const authTag = payload.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const encrypted = payload.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    try {
      const decipher = crypto.createDecipheriv(ALGORITHM, this.deriveKey(entityId), iv, {
        authTagLength: AUTH_TAG_LENGTH,
      });
      decipher.setAAD(Buffer.from(entityId, 'utf8'));
      decipher.setAuthTag(authTag);
      return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
    } catch (err) {
      this.logger.error(`Field decryption failed for entity ${entityId}: ${errorMessage(err)}`);
      throw new FieldDecryptionException();
    }
  }

  private deriveKey(entityId: string): Buffer {
    return Buffer.from(
      crypto.hkdfSync('sha256', this.config.storageEncryptionKey, entityId, KEY_INFO, KEY_LENGTH),
    );
  }
}
