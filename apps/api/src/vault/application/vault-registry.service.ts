import { Inject, Injectable, Logger } from '@nestjs/common';
import { VaultRegistryRepository } from './ports/vault-registry-repository';
import { VaultEntry } from '../domain/VaultEntry';
import { VaultMetadata, VaultMetadataInput } from '../domain/VaultMetadata';
import { EntryId } from '../domain/value-objects/EntryId';
import { PrincipalId } from '../domain/value-objects/PrincipalId';
import { PermissionBreachError, VaultEntryAbsentError } from '../domain/vault-errors';

/**
 * Application service exposing every vault registry operation.
 *
 * Mutations take the authenticated caller explicitly; the presentation layer
 * resolves it from the session. Entry ids are accepted as plain numbers so
 * that ids which can never exist are reported the same way as unknown ones.
 */
@Injectable()
export class VaultRegistryService {
  private readonly logger = new Logger(VaultRegistryService.name);

  constructor(@Inject(VaultRegistryRepository) private readonly repository: VaultRegistryRepository) {}

  async createVaultEntry(caller: PrincipalId, input: VaultMetadataInput): Promise<number> {
    const metadata = VaultMetadata.from(input);
    const entry = await this.repository.appendEntry({ metadata, authority: caller });
    this.logger.log(`Created vault entry ${entry.entryId.unwrap()} for ${caller.unwrap()}`);
    return entry.entryId.unwrap();
  }

  async transferMedicalAuthority(caller: PrincipalId, entryId: number, newAuthority: PrincipalId): Promise<true> {
    const id = this.requireEntryId(entryId);
    await this.repository.updateEntry(id, (entry) => entry.transferAuthority(caller, newAuthority));
    this.logger.log(`Transferred vault entry ${entryId} from ${caller.unwrap()} to ${newAuthority.unwrap()}`);
    return true;
  }

  async modifyVaultMetadata(caller: PrincipalId, entryId: number, input: VaultMetadataInput): Promise<true> {
    const id = this.requireEntryId(entryId);
    await this.repository.updateEntry(id, (entry) => entry.revise(caller, input));
    this.logger.debug(`Revised metadata of vault entry ${entryId}`);
    return true;
  }

  async getVaultEntry(entryId: number): Promise<VaultEntry> {
    return this.loadEntry(entryId);
  }

  async getClassificationTags(entryId: number): Promise<string[]> {
    const entry = await this.loadEntry(entryId);
    return entry.metadata.classificationTags.unwrap();
  }

  async getMedicalAuthority(entryId: number): Promise<string> {
    const entry = await this.loadEntry(entryId);
    return entry.medicalAuthority.unwrap();
  }

  async getCreationTimestamp(entryId: number): Promise<number> {
    const entry = await this.loadEntry(entryId);
    return entry.creationTimestamp.unwrap();
  }

  async getEntryPayloadSize(entryId: number): Promise<number> {
    const entry = await this.loadEntry(entryId);
    return entry.metadata.payloadByteSize.unwrap();
  }

  async getDiagnosticSummary(entryId: number): Promise<string> {
    const entry = await this.loadEntry(entryId);
    return entry.metadata.diagnosticNotes.unwrap();
  }

  async getTotalVaultCount(): Promise<number> {
    const state = await this.repository.getState();
    return state.totalVaultEntries;
  }

  /**
   * Look up the stored flag for (entryId, accessorIdentity).
   *
   * @throws {PermissionBreachError} if no row exists for the pair, including
   * when the entry never existed or the accessor is blank
   */
  async checkAccessPermissions(entryId: number, accessorIdentity: string): Promise<boolean> {
    const id = EntryId.tryFrom(entryId);
    const accessor = PrincipalId.tryFrom(accessorIdentity);
    const permission = id && accessor ? await this.repository.findPermission(id, accessor) : null;
    if (!permission) {
      throw new PermissionBreachError(entryId, accessorIdentity);
    }
    return permission.hasAccessRights;
  }

  private async loadEntry(entryId: number): Promise<VaultEntry> {
    const entry = await this.repository.findEntry(this.requireEntryId(entryId));
    if (!entry) {
      throw new VaultEntryAbsentError(entryId);
    }
    return entry;
  }

  private requireEntryId(entryId: number): EntryId {
    const id = EntryId.tryFrom(entryId);
    if (!id) {
      throw new VaultEntryAbsentError(entryId);
    }
    return id;
  }
}
