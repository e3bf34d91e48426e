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

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import { Actor } from '../../entities/user.entity';
import { CurrentActor } from './current-actor.decorator';
import {
  parseStorageInput,
  parseTransferStorage,
  parseWorkspaceIdQuery,
  StorageView,
} from './storage.dto';
import { StoragesService } from './storages.service';

/** The part of the HTTP response used to notice a client that went away. */
export interface ClientConnection {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/** Aborts when the connection closes before the response was sent. */
export function abortOnDisconnect(connection: ClientConnection): AbortSignal {
  const controller = new AbortController();
  connection.once('close', () => {
    if (!connection.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

@Controller('storages')
export class StoragesController {
  constructor(private readonly service: StoragesService) {}

  @Post()
  async save(@CurrentActor() actor: Actor, @Body() body: unknown): Promise<StorageView> {
    const input = parseStorageInput(body);
    return this.service.saveStorage(actor, input.workspaceId, input);
  }

  @Get()
  async list(
    @CurrentActor() actor: Actor,
    @Query('workspace_id') workspaceId?: string,
  ): Promise<StorageView[]> {
    return this.service.getStorages(actor, parseWorkspaceIdQuery(workspaceId));
  }

  @Post('direct-test')
  @HttpCode(200)
  async testDirect(
    @CurrentActor() actor: Actor,
    @Body() body: unknown,
    @Res({ passthrough: true }) connection: ClientConnection,
  ) {
    const input = parseStorageInput(body);
    await this.service.testStorageConnectionDirect(actor, input, abortOnDisconnect(connection));
    return { message: 'successful' };
  }

  @Get(':id')
  async get(
    @CurrentActor() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<StorageView> {
    return this.service.getStorage(actor, id);
  }

  @Delete(':id')
  async remove(@CurrentActor() actor: Actor, @Param('id', ParseUUIDPipe) id: string) {
    await this.service.deleteStorage(actor, id);
    return { message: 'storage deleted successfully' };
  }

  @Post(':id/test')
  @HttpCode(200)
  async test(
    @CurrentActor() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Res({ passthrough: true }) connection: ClientConnection,
  ) {
    await this.service.testStorageConnection(actor, id, abortOnDisconnect(connection));
    return { message: 'successful' };
  }

  @Post(':id/transfer')
  @HttpCode(200)
  async transfer(
    @CurrentActor() actor: Actor,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: unknown,
  ) {
    const { targetWorkspaceId } = parseTransferStorage(body);
    await this.service.transferStorageToWorkspace(actor, id, targetWorkspaceId);
    return { message: 'storage transferred successfully' };
  }
}
