import { Module } from '@nestjs/common';
import { KratosSessionGuard } from './guards/kratos-session.guard';
import { KratosClient } from '../infrastructure/kratos.client';
import { MeController } from './controllers/me.controller';
import { SessionCache } from '../application/session-cache';

@Module({
  controllers: [MeController],
  providers: [KratosClient, KratosSessionGuard, SessionCache],
  exports: [KratosClient, KratosSessionGuard, SessionCache],
})
export class AccessModule {}
