import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import { UnauthorizedError } from '../errors/game-errors.js';
import type { AuthedRequest } from '../guards/auth.guard.js';

export const UserId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const req = ctx.switchToHttp().getRequest<AuthedRequest>();
    if (!req.userId) throw new UnauthorizedError();
    return req.userId;
  },
);
