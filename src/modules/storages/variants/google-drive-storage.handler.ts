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

import { Credentials, OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import { isEncryptedValue } from 'src/common/encryption/field-encryptor';
import { StorageType } from '../storage-type.enum';
import { BaseStorageHandler, secretField, textField } from './storage-variant.handler';

export const googleDriveStorageConfigSchema = z.object({
  clientId: textField(),
  clientSecret: secretField(),
  tokenJson: secretField(),
});

export type GoogleDriveStorageConfig = z.infer<typeof googleDriveStorageConfigSchema>;

// Accepts both the google-auth-library shape (expiry_date) and the RFC 3339
// `expiry` written by other OAuth clients.
const oauthTokenSchema = z
  .object({
    access_token: z.string().optional(),
    refresh_token: z.string().optional(),
    token_type: z.string().optional(),
    expiry: z.string().optional(),
    expiry_date: z.number().optional(),
    scope: z.string().optional(),
  })
  .refine((token) => Boolean(token.access_token || token.refresh_token), {
    message: 'token must contain an access_token or a refresh_token',
  });

export type OAuthToken = z.infer<typeof oauthTokenSchema>;

export const DRIVE_ABOUT_URL = 'https://www.googleapis.com/drive/v3/about?fields=user';

export function parseOAuthToken(tokenJson: string): OAuthToken | null {
  let raw: unknown;
  try {
    raw = JSON.parse(tokenJson);
  } catch {
    return null;
  }
  const result = oauthTokenSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export function toCredentials(token: OAuthToken): Credentials {
  const credentials: Credentials = {
    access_token: token.access_token,
    refresh_token: token.refresh_token,
    token_type: token.token_type,
    scope: token.scope,
  };
  if (token.expiry_date !== undefined) {
    credentials.expiry_date = token.expiry_date;
  } else if (token.expiry) {
    const expiry = Date.parse(token.expiry);
    if (!Number.isNaN(expiry)) {
      credentials.expiry_date = expiry;
    }
  }
  return credentials;
}

export class GoogleDriveStorageHandler extends BaseStorageHandler<
  GoogleDriveStorageConfig,
  'clientSecret' | 'tokenJson'
> {
  readonly type = StorageType.GOOGLE_DRIVE;
  protected readonly label = 'Google Drive';
  protected readonly sensitiveFields = ['clientSecret', 'tokenJson'] as const;

  validate(config: GoogleDriveStorageConfig, isNew: boolean): void {
    this.require(config.clientId !== '', 'Google Drive client id is required');
    if (isNew) {
      this.require(config.clientSecret !== '', 'Google Drive client secret is required');
      this.require(config.tokenJson !== '', 'Google Drive token JSON is required');
    }
    // Stored ciphertext was checked when it was first submitted.
    if (config.tokenJson !== '' && !isEncryptedValue(config.tokenJson)) {
      this.require(
        parseOAuthToken(config.tokenJson) !== null,
        'Google Drive token JSON must contain an access_token or a refresh_token',
      );
    }
  }

  protected async checkConnection(
    config: GoogleDriveStorageConfig,
    _signal: AbortSignal,
    timeoutMs: number,
  ): Promise<void> {
    const token = parseOAuthToken(config.tokenJson);
    if (!token) {
      throw new Error('stored token is not valid OAuth token JSON');
    }

    const client = new OAuth2Client({ clientId: config.clientId, clientSecret: config.clientSecret });
    client.setCredentials(toCredentials(token));

    const { token: accessToken } = await client.getAccessToken();
    if (!accessToken) {
      throw new Error('unable to obtain an access token');
    }
    await client.request({ url: DRIVE_ABOUT_URL, timeout: timeoutMs });
  }
}
