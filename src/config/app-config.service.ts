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

import * as path from 'path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export const appEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().default('postgres'),
  POSTGRES_PASSWORD: z.string().default('postgres'),
  POSTGRES_DB: z.string().default('backups'),
  TYPEORM_SYNC: booleanFlag,
  IS_CLOUD: booleanFlag,
  STORAGE_ENCRYPTION_KEY: z
    .string({ required_error: 'STORAGE_ENCRYPTION_KEY is required' })
    .min(32, 'STORAGE_ENCRYPTION_KEY must be at least 32 characters'),
  STORAGE_CONNECTION_TEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOCAL_STORAGE_PATH: z.string().min(1).optional(),
  RCLONE_BINARY: z.string().min(1).default('rclone'),
});

export type AppEnv = z.infer<typeof appEnvSchema>;

export interface DatabaseSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
}

/**
 * Parses the process environment. Throws with every offending key listed so
 * a misconfigured deployment fails at boot rather than on first request.
 */
export function loadAppEnv(source: NodeJS.ProcessEnv): AppEnv {
  const result = appEnvSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return result.data;
}

export class AppConfigService {
  constructor(private readonly env: AppEnv) { }

  get port(): number {
    return this.env.PORT;
  }

  isCloudMode(): boolean {
    return this.env.IS_CLOUD;
  }

  get storageEncryptionKey(): string {
    return this.env.STORAGE_ENCRYPTION_KEY;
  }

  get connectionTestTimeoutMs(): number {
    return this.env.STORAGE_CONNECTION_TEST_TIMEOUT_MS;
  }

  get localStoragePath(): string {
    return this.env.LOCAL_STORAGE_PATH ?? path.join(process.cwd(), 'data', 'backups');
  }

  get rcloneBinary(): string {
    return this.env.RCLONE_BINARY;
  }

  get database(): DatabaseSettings {
    return {
      host: this.env.POSTGRES_HOST,
      port: this.env.POSTGRES_PORT,
      username: this.env.POSTGRES_USER,
      password: this.env.POSTGRES_PASSWORD,
      database: this.env.POSTGRES_DB,
      synchronize: this.env.TYPEORM_SYNC,
    };
  }
}
