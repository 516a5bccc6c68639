import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  HttpException,
  NotFoundException,
} from '@nestjs/common';
import { VaultErrorKind, VaultRegistryError } from '../domain/vault-errors';

type ExceptionFactory = (body: { error: VaultErrorKind; message: string }) => HttpException;

const exceptionByKind: Record<VaultErrorKind, ExceptionFactory> = {
  CorruptedIdFormat: (body) => new BadRequestException(body),
  OversizedPayload: (body) => new BadRequestException(body),
  ForbiddenTagType: (body) => new BadRequestException(body),
  InvalidAuthToken: (body) => new ForbiddenException(body),
  VaultEntryAbsent: (body) => new NotFoundException(body),
  PermissionBreach: (body) => new NotFoundException(body),
  DuplicateVaultEntry: (body) => new ConflictException(body),
};

export const toHttpException = (error: VaultRegistryError): HttpException =>
  exceptionByKind[error.kind]({ error: error.kind, message: error.message });
