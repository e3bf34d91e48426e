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

import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import * as ini from 'ini';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';
import { z } from 'zod';
import { isEncryptedValue } from 'src/common/encryption/field-encryptor';
import { errorMessage } from 'src/common/utils/error-message';
import { StorageType } from '../storage-type.enum';
import { BaseStorageHandler, secretField, textField } from './storage-variant.handler';

const execFileAsync = promisify(execFile);

export const rcloneStorageConfigSchema = z.object({
  configContent: secretField(),
  remotePath: textField(),
});

export type RcloneStorageConfig = z.infer<typeof rcloneStorageConfigSchema>;

const remoteSectionSchema = z.object({ type: z.string().min(1) }).passthrough();

const SECTION_HEADER = /^\s*\[([^\]]+)\]\s*$/;

/**
 * Names of the `[remote]` sections that declare a backend type, in file order.
 * Headers are split out first because `ini` nests dotted section names and
 * remote names may contain dots.
 */
export function listRcloneRemotes(configContent: string): string[] {
  const sections: { name: string; lines: string[] }[] = [];
  for (const line of configContent.split(/\r?\n/)) {
    const header = SECTION_HEADER.exec(line);
    if (header) {
      sections.push({ name: header[1].trim(), lines: [] });
    } else if (sections.length > 0) {
      sections[sections.length - 1].lines.push(line);
    }
  }
  return sections
    .filter((section) => remoteSectionSchema.safeParse(ini.parse(section.lines.join('\n'))).success)
    .map((section) => section.name);
}

function describeFailure(err: unknown): string {
  if (err instanceof Error && 'stderr' in err && typeof err.stderr === 'string') {
    const stderr = err.stderr.trim();
    if (stderr) return stderr;
  }
  return errorMessage(err);
}

export class RcloneStorageHandler extends BaseStorageHandler<RcloneStorageConfig, 'configContent'> {
  readonly type = StorageType.RCLONE;
  protected readonly label = 'Rclone';
  protected readonly sensitiveFields = ['configContent'] as const;

  constructor(private readonly rcloneBinary: string) {
    super();
  }

  validate(config: RcloneStorageConfig, isNew: boolean): void {
    if (isNew) {
      this.require(config.configContent !== '', 'Rclone config content is required');
    }
    if (config.configContent !== '' && !isEncryptedValue(config.configContent)) {
      this.require(
        listRcloneRemotes(config.configContent).length > 0,
        'Rclone config must define at least one remote with a type',
      );
    }
  }

  protected async checkConnection(
    config: RcloneStorageConfig,
    signal: AbortSignal,
    timeoutMs: number,
  ): Promise<void> {
    const [remote] = listRcloneRemotes(config.configContent);
    if (!remote) {
      throw new Error('config does not define any remote');
    }

    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rclone-test-'));
    try {
      const configFile = path.join(workDir, 'rclone.conf');
      await fs.writeFile(configFile, config.configContent, { mode: 0o600 });
      const target = `${remote}:${config.remotePath.replace(/^\/+/, '')}`;
      try {
        await execFileAsync(
          this.rcloneBinary,
          ['lsf', target, '--config', configFile, '--max-depth', '1'],
          { timeout: timeoutMs, signal },
        );
      } catch (err) {
        throw new Error(describeFailure(err));
      }
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }
}
