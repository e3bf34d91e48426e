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

import { HeadBucketCommand, S3Client, S3ClientConfig } from '@aws-sdk/client-s3';
import * as https from 'https';
import { z } from 'zod';
import { StorageType } from '../storage-type.enum';
import { BaseStorageHandler, flagField, secretField, textField } from './storage-variant.handler';

export const s3StorageConfigSchema = z.object({
  s3Bucket: textField(),
  s3Region: textField(),
  s3AccessKey: secretField(),
  s3SecretKey: secretField(),
  s3Endpoint: textField(),
  s3Prefix: textField(),
  s3UseVirtualHostedStyle: flagField(),
  skipTLSVerify: flagField(),
});

export type S3StorageConfig = z.infer<typeof s3StorageConfigSchema>;

const DEFAULT_REGION = 'us-east-1';

export class S3StorageHandler extends BaseStorageHandler<
  S3StorageConfig,
  's3AccessKey' | 's3SecretKey'
> {
  readonly type = StorageType.S3;
  protected readonly label = 'S3';
  protected readonly sensitiveFields = ['s3AccessKey', 's3SecretKey'] as const;

  validate(config: S3StorageConfig, isNew: boolean): void {
    this.require(config.s3Bucket !== '', 'S3 bucket is required');
    if (isNew) {
      this.require(config.s3AccessKey !== '', 'S3 access key is required');
      this.require(config.s3SecretKey !== '', 'S3 secret key is required');
    }
  }

  protected async checkConnection(config: S3StorageConfig, signal: AbortSignal): Promise<void> {
    const clientConfig: S3ClientConfig = {
      region: config.s3Region || DEFAULT_REGION,
      forcePathStyle: !config.s3UseVirtualHostedStyle,
      credentials: {
        accessKeyId: config.s3AccessKey,
        secretAccessKey: config.s3SecretKey,
      },
      maxAttempts: 1,
    };
    if (config.s3Endpoint) {
      clientConfig.endpoint = config.s3Endpoint;
    }
    if (config.skipTLSVerify) {
      clientConfig.requestHandler = { httpsAgent: new https.Agent({ rejectUnauthorized: false }) };
    }

    const client = new S3Client(clientConfig);
    try {
      await client.send(new HeadBucketCommand({ Bucket: config.s3Bucket }), { abortSignal: signal });
    } finally {
      client.destroy();
    }
  }
}
