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

import { AccessOptions, Client } from 'basic-ftp';
import { z } from 'zod';
import { StorageType } from '../storage-type.enum';
import {
  BaseStorageHandler,
  flagField,
  portField,
  secretField,
  textField,
} from './storage-variant.handler';

export const ftpStorageConfigSchema = z.object({
  host: textField(),
  port: portField(21),
  username: textField(),
  password: secretField(),
  useSsl: flagField(),
  skipTlsVerify: flagField(),
  path: textField(),
});

export type FtpStorageConfig = z.infer<typeof ftpStorageConfigSchema>;

export class FtpStorageHandler extends BaseStorageHandler<FtpStorageConfig, 'password'> {
  readonly type = StorageType.FTP;
  protected readonly label = 'FTP';
  protected readonly sensitiveFields = ['password'] as const;

  validate(config: FtpStorageConfig, isNew: boolean): void {
    this.require(config.host !== '', 'FTP host is required');
    this.requirePort(config.port);
    this.require(config.username !== '', 'FTP username is required');
    if (isNew) {
      this.require(config.password !== '', 'FTP password is required');
    }
  }

  protected async checkConnection(
    config: FtpStorageConfig,
    signal: AbortSignal,
    timeoutMs: number,
  ): Promise<void> {
    const client = new Client(timeoutMs);
    const close = () => client.close();
    signal.addEventListener('abort', close, { once: true });

    const options: AccessOptions = {
      host: config.host,
      port: config.port,
      user: config.username,
      password: config.password,
      secure: config.useSsl,
      ...(config.useSsl && config.skipTlsVerify
        ? { secureOptions: { rejectUnauthorized: false } }
        : {}),
    };

    try {
      await client.access(options);
      if (config.path) {
        await client.cd(config.path);
      }
    } finally {
      signal.removeEventListener('abort', close);
      client.close();
    }
  }
}
