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

/// <reference path="../../../types/marsaud-smb2.d.ts" />
import SMB2 from '@marsaud/smb2';
import { z } from 'zod';
import { StorageType } from '../storage-type.enum';
import {
  BaseStorageHandler,
  flagField,
  portField,
  secretField,
  textField,
} from './storage-variant.handler';

export const nasStorageConfigSchema = z.object({
  host: textField(),
  port: portField(445),
  share: textField(),
  username: textField(),
  password: secretField(),
  useSsl: flagField(),
  domain: textField(),
  path: textField(),
});

export type NasStorageConfig = z.infer<typeof nasStorageConfigSchema>;

const DEFAULT_DOMAIN = 'WORKGROUP';

/** SMB paths use backslashes and are relative to the share root. */
export function toSmbPath(path: string): string {
  return path.replace(/\//g, '\\').replace(/^\\+|\\+$/g, '');
}

export class NasStorageHandler extends BaseStorageHandler<NasStorageConfig, 'password'> {
  readonly type = StorageType.NAS;
  protected readonly label = 'NAS';
  protected readonly sensitiveFields = ['password'] as const;

  validate(config: NasStorageConfig, isNew: boolean): void {
    this.require(config.host !== '', 'NAS host is required');
    this.requirePort(config.port);
    this.require(config.share !== '', 'NAS share is required');
    this.require(config.username !== '', 'NAS username is required');
    if (isNew) {
      this.require(config.password !== '', 'NAS password is required');
    }
  }

  protected async checkConnection(config: NasStorageConfig, signal: AbortSignal): Promise<void> {
    const client = new SMB2({
      share: `\\\\${config.host}\\${config.share}`,
      domain: config.domain || DEFAULT_DOMAIN,
      username: config.username,
      password: config.password,
      port: config.port,
      autoCloseTimeout: 0,
    });
    const disconnect = () => client.disconnect();
    signal.addEventListener('abort', disconnect, { once: true });
    try {
      await client.readdir(toSmbPath(config.path));
    } finally {
      signal.removeEventListener('abort', disconnect);
      if (!signal.aborted) {
        client.disconnect();
      }
    }
  }
}
