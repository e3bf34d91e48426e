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

import { FieldDecryptionException } from './encryption.errors';

export const ENCRYPTED_VALUE_PREFIX = 'enc:';

export function isEncryptedValue(value: string): boolean {
  return value.startsWith(ENCRYPTED_VALUE_PREFIX);
}

/**
 * Encrypts individual credential fields, binding every ciphertext to the id
 * of the record that owns it.
 */
export abstract class FieldEncryptor {
  abstract encrypt(entityId: string, plaintext: string): string;

  /** Throws FieldDecryptionException for anything that is not our ciphertext. */
  abstract decrypt(entityId: string, ciphertext: string): string;

  isEncrypted(value: string): boolean {
    return isEncryptedValue(value);
  }

  /**
   * Used on ingestion paths where a field may hold either freshly submitted
   * plaintext or ciphertext loaded from the database.
   */
  decryptIfEncrypted(entityId: string | undefined, value: string): string {
    if (!this.isEncrypted(value)) {
      return value;
    }
    if (!entityId) {
      throw new FieldDecryptionException();
    }
    return this.decrypt(entityId, value);
  }
}
