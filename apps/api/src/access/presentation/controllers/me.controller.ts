import { Controller, Get, UnauthorizedException, UseGuards } from '@nestjs/common';
import { AuthIdentity } from '../../auth-identity.decorator';
import { KratosSessionGuard } from '../guards/kratos-session.guard';
import { AuthenticatedIdentity } from '../../application/authenticated-identity';

/**
 * Lets a client learn the principal id the registry records for it.
 */
@Controller('me')
@UseGuards(KratosSessionGuard)
export class MeController {
  @Get()
  getProfile(@AuthIdentity() identity: AuthenticatedIdentity | undefined): AuthenticatedIdentity {
    if (!identity) {
      throw new UnauthorizedException('Authenticated identity missing');
    }
    return identity;
  }
}
