import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { Request } from 'express';
import { AuthenticatedIdentity } from './application/authenticated-identity';

/**
 * Injects the principal resolved by KratosSessionGuard, or undefined on
 * routes the guard does not protect.
 */
export const AuthIdentity = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedIdentity | undefined =>
    ctx.switchToHttp().getRequest<Request>().authIdentity
);
