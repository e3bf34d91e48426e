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

import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { z } from 'zod';
import { Actor, UserRole } from '../../entities/user.entity';

const actorSchema = z.object({
  id: z.string().min(1),
  role: z.nativeEnum(UserRole),
});

/** Resolves the authenticated caller placed on `request.user` by the auth guard. */
export function resolveActor(user: unknown): Actor {
  const parsed = actorSchema.safeParse(user);
  if (!parsed.success) {
    throw new UnauthorizedException('Authentication required');
  }
  return parsed.data;
}

export const CurrentActor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Actor =>
    resolveActor(ctx.switchToHttp().getRequest<{ user?: unknown }>().user),
);
