import { CanActivate, ExecutionContext, Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { SessionCache } from '../../application/session-cache';
import { KratosClient } from '../../infrastructure/kratos.client';
import { readSessionToken } from '../session-cookie';

/**
 * Rejects requests without a valid Kratos session and attaches the resolved
 * identity to `request.authIdentity`.
 */
@Injectable()
export class KratosSessionGuard implements CanActivate {
  constructor(
    @Inject(KratosClient) private readonly kratosClient: KratosClient,
    @Inject(SessionCache) private readonly sessionCache: SessionCache
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const sessionToken = readSessionToken(request.headers);

    if (!sessionToken) {
      throw new UnauthorizedException('Session token is required');
    }

    const cached = this.sessionCache.read(sessionToken);
    const authIdentity = cached ?? (await this.kratosClient.whoAmI(sessionToken));

    if (!cached) {
      this.sessionCache.write(sessionToken, authIdentity);
    }

    request.authIdentity = authIdentity;
    return true;
  }
}
