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

import 'reflect-metadata';
import { LoggerService } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { AppConfigService } from './config/app-config.service';

type LogLevel = 'info' | 'error' | 'warn' | 'debug' | 'verbose';

function writeJson(level: LogLevel, message: unknown, context?: string, trace?: string) {
  const serialized = message instanceof Error
    ? { message: message.message, stack: message.stack, name: message.name }
    : message;
  const line = JSON.stringify({ level, message: serialized, context, trace, timestamp: new Date().toISOString() });
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
}

// Basic JSON logger for cloud-native environments
const jsonLogger: LoggerService = {
  log: (message: unknown, context?: string) => writeJson('info', message, context),
  error: (message: unknown, trace?: string, context?: string) => writeJson('error', message, context, trace),
  warn: (message: unknown, context?: string) => writeJson('warn', message, context),
  debug: (message: unknown, context?: string) => writeJson('debug', message, context),
  verbose: (message: unknown, context?: string) => writeJson('verbose', message, context),
};

async function bootstrap() {
  const app = await NestFactory.create(
    AppModule,
    process.env.LOG_FORMAT === 'json' ? { logger: jsonLogger } : {},
  );

  // Enable graceful shutdown
  app.enableShutdownHooks();

  const config = app.get(AppConfigService);
  await app.listen(config.port);
}

bootstrap().catch((err: unknown) => {
  console.error('Failed to start application', err);
  process.exit(1);
});
