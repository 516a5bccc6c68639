import { Module } from '@nestjs/common';
import { DatabaseService } from '../../platform/infrastructure/database/database.service';
import { VaultDatabaseService } from './database.service';

@Module({
  providers: [VaultDatabaseService, { provide: DatabaseService, useExisting: VaultDatabaseService }],
  exports: [VaultDatabaseService, DatabaseService],
})
export class VaultDatabaseModule {}
