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

import * as crypto from 'crypto';
import SftpClient from 'ssh2-sftp-client';
import { z } from 'zod';
import { errorMessage } from 'src/common/utils/error-message';
import { StorageType } from '../storage-type.enum';
import {
  BaseStorageHandler,
  flagField,
  portField,
  secretField,
  textField,
} from './storage-variant.handler';

export const sftpStorageConfigSchema = z.object({
  host: textField(),
  port: portField(22),
  username: textField(),
  password: secretField(),
  privateKey: secretField(),
  skipHostKeyVerify: flagField(),
  hostKeyFingerprint: textField(),
  path: textField(),
});

export type SftpStorageConfig = z.infer<typeof sftpStorageConfigSchema>;

/** OpenSSH style: `SHA256:` + unpadded base64 of the key digest. */
export function hostKeyFingerprint(key: Buffer): string {
  return 'SHA256:' + crypto.createHash('sha256').update(key).digest('base64').replace(/=+$/, '');
}

function normalizeFingerprint(value: string): string {
  const digest = value.trim().replace(/^SHA256:/i, '').replace(/=+$/, '');
  return `SHA256:${digest}`;
}

export class SftpStorageHandler extends BaseStorageHandler<
  SftpStorageConfig,
  'password' | 'privateKey'
> {
  readonly type = StorageType.SFTP;
  protected readonly label = 'SFTP';
  protected readonly sensitiveFields = ['password', 'privateKey'] as const;

  validate(config: SftpStorageConfig, isNew: boolean): void {
    this.require(config.host !== '', 'SFTP host is required');
    this.requirePort(config.port);
    this.require(config.username !== '', 'SFTP username is required');
    if (isNew) {
      this.require(
        config.password !== '' || config.privateKey !== '',
        'SFTP password or private key is required',
      );
    }
  }

  protected async checkConnection(
    config: SftpStorageConfig,
    signal: AbortSignal,
    timeoutMs: number,
  ): Promise<void> {
    const sftp = new SftpClient();
    const options: SftpClient.ConnectOptions = {
      host: config.host,
      port: config.port,
      username: config.username,
      readyTimeout: timeoutMs,
    };
    if (config.password) {
      options.password = config.password;
    }
    if (config.privateKey) {
      options.privateKey = config.privateKey;
    }
    if (!config.skipHostKeyVerify && config.hostKeyFingerprint) {
      const expected = normalizeFingerprint(config.hostKeyFingerprint);
      options.hostVerifier = (key: Buffer): boolean => hostKeyFingerprint(key) === expected;
    }

    const abort = () => {
      sftp.end().catch((err: unknown) => {
        this.logger.debug(`SFTP session close after cancel failed: ${errorMessage(err)}`);
      });
    };
    signal.addEventListener('abort', abort, { once: true });
    let connected = false;
    try {
      await sftp.connect(options);
      connected = true;
      if (config.path) {
        const kind = await sftp.exists(config.path);
        if (kind === false) {
          throw new Error(`path "${config.path}" does not exist`);
        }
      }
    } finally {
      signal.removeEventListener('abort', abort);
      if (connected && !signal.aborted) {
        await sftp.end();
      }
    }
  }
}
