import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AccessModule } from './access/presentation/access.module';
import { validateEnvironment } from './platform/config/environment';
import { HealthController } from './platform/presentation/health.controller';
import { VaultDatabaseModule } from './vault/infrastructure/database.module';
import { VaultModule } from './vault/presentation/vault.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    VaultDatabaseModule,
    AccessModule,
    VaultModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
