import { Module } from '@nestjs/common';
import { AccessModule } from '../../access/presentation/access.module';
import { VaultRegistryService } from '../application/vault-registry.service';
import { VaultRegistryRepository } from '../application/ports/vault-registry-repository';
import { VaultDatabaseModule } from '../infrastructure/database.module';
import { KyselyVaultRegistryRepository } from '../infrastructure/kysely-vault-registry.repository';
import { VaultController } from './vault.controller';

@Module({
  imports: [VaultDatabaseModule, AccessModule],
  controllers: [VaultController],
  providers: [
    VaultRegistryService,
    {
      provide: VaultRegistryRepository,
      useClass: KyselyVaultRegistryRepository,
    },
  ],
  exports: [VaultRegistryService],
})
export class VaultModule {}
