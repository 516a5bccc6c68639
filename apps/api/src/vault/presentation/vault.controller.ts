import {
  Body,
  Controller,
  Get,
  Inject,
  Logger,
  Param,
  ParseIntPipe,
  Post,
  Put,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import { AuthIdentity } from '../../access/auth-identity.decorator';
import { AuthenticatedIdentity } from '../../access/application/authenticated-identity';
import { KratosSessionGuard } from '../../access/presentation/guards/kratos-session.guard';
import { VaultRegistryService } from '../application/vault-registry.service';
import { isVaultRegistryError } from '../domain/vault-errors';
import { PrincipalId } from '../domain/value-objects/PrincipalId';
import { TransferAuthorityDto } from './dto/TransferAuthorityDto';
import { VaultMetadataDto } from './dto/VaultMetadataDto';
import { validatedBody } from './validated-body';
import { toHttpException } from './vault-http-errors';

@Controller('vault')
export class VaultController {
  private readonly logger = new Logger(VaultController.name);

  constructor(@Inject(VaultRegistryService) private readonly registry: VaultRegistryService) {}

  @Post('entries')
  @UseGuards(KratosSessionGuard)
  async createEntry(
    @Body(validatedBody(VaultMetadataDto)) dto: VaultMetadataDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ) {
    const caller = this.requireCaller(identity);
    const entryId = await this.run('create_vault_entry', () => this.registry.createVaultEntry(caller, dto));
    return { entryId };
  }

  @Post('entries/:entryId/authority')
  @UseGuards(KratosSessionGuard)
  async transferAuthority(
    @Param('entryId', ParseIntPipe) entryId: number,
    @Body(validatedBody(TransferAuthorityDto)) dto: TransferAuthorityDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ) {
    const caller = this.requireCaller(identity);
    const newAuthority = PrincipalId.from(dto.newAuthority);
    const ok = await this.run('transfer_medical_authority', () =>
      this.registry.transferMedicalAuthority(caller, entryId, newAuthority)
    );
    return { ok };
  }

  @Put('entries/:entryId/metadata')
  @UseGuards(KratosSessionGuard)
  async modifyMetadata(
    @Param('entryId', ParseIntPipe) entryId: number,
    @Body(validatedBody(VaultMetadataDto)) dto: VaultMetadataDto,
    @AuthIdentity() identity: AuthenticatedIdentity | undefined
  ) {
    const caller = this.requireCaller(identity);
    const ok = await this.run('modify_vault_metadata', () => this.registry.modifyVaultMetadata(caller, entryId, dto));
    return { ok };
  }

  @Get('count')
  async getTotalVaultCount() {
    const totalVaultEntries = await this.registry.getTotalVaultCount();
    return { totalVaultEntries };
  }

  @Get('entries/:entryId')
  async getEntry(@Param('entryId', ParseIntPipe) entryId: number) {
    const entry = await this.run('get_vault_entry', () => this.registry.getVaultEntry(entryId));
    return {
      entryId: entry.entryId.unwrap(),
      patientHashCode: entry.metadata.patientHashCode.unwrap(),
      medicalAuthority: entry.medicalAuthority.unwrap(),
      payloadByteSize: entry.metadata.payloadByteSize.unwrap(),
      creationTimestamp: entry.creationTimestamp.unwrap(),
      diagnosticNotes: entry.metadata.diagnosticNotes.unwrap(),
      classificationTags: entry.metadata.classificationTags.unwrap(),
    };
  }

  @Get('entries/:entryId/tags')
  async getClassificationTags(@Param('entryId', ParseIntPipe) entryId: number) {
    const classificationTags = await this.run('get_classification_tags', () =>
      this.registry.getClassificationTags(entryId)
    );
    return { classificationTags };
  }

  @Get('entries/:entryId/authority')
  async getMedicalAuthority(@Param('entryId', ParseIntPipe) entryId: number) {
    const medicalAuthority = await this.run('get_medical_authority', () => this.registry.getMedicalAuthority(entryId));
    return { medicalAuthority };
  }

  @Get('entries/:entryId/creation-timestamp')
  async getCreationTimestamp(@Param('entryId', ParseIntPipe) entryId: number) {
    const creationTimestamp = await this.run('get_creation_timestamp', () =>
      this.registry.getCreationTimestamp(entryId)
    );
    return { creationTimestamp };
  }

  @Get('entries/:entryId/payload-size')
  async getEntryPayloadSize(@Param('entryId', ParseIntPipe) entryId: number) {
    const payloadByteSize = await this.run('get_entry_payload_size', () => this.registry.getEntryPayloadSize(entryId));
    return { payloadByteSize };
  }

  @Get('entries/:entryId/diagnostic-summary')
  async getDiagnosticSummary(@Param('entryId', ParseIntPipe) entryId: number) {
    const diagnosticNotes = await this.run('get_diagnostic_summary', () => this.registry.getDiagnosticSummary(entryId));
    return { diagnosticNotes };
  }

  @Get('entries/:entryId/permissions/:accessorIdentity')
  async checkAccessPermissions(
    @Param('entryId', ParseIntPipe) entryId: number,
    @Param('accessorIdentity') accessorIdentity: string
  ) {
    const hasAccessRights = await this.run('check_access_permissions', () =>
      this.registry.checkAccessPermissions(entryId, accessorIdentity)
    );
    return { hasAccessRights };
  }

  private requireCaller(identity: AuthenticatedIdentity | undefined): PrincipalId {
    if (!identity) {
      throw new UnauthorizedException('Authenticated identity missing');
    }
    return PrincipalId.from(identity.id);
  }

  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (isVaultRegistryError(error)) {
        this.logger.warn(`${operation} rejected: ${error.kind} (${error.message})`);
        throw toHttpException(error);
      }
      throw error;
    }
  }
}
