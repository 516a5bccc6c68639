import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../platform/infrastructure/database/database.service';
import { VaultDatabase } from './database.types';

@Injectable()
export class VaultDatabaseService extends DatabaseService<VaultDatabase> {}
