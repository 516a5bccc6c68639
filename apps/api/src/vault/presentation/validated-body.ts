import { Type, ValidationPipe } from '@nestjs/common';

/**
 * Body validation pinned to an explicit DTO class, so it does not depend on
 * emitted parameter metadata.
 */
export const validatedBody = <T>(dto: Type<T>): ValidationPipe =>
  new ValidationPipe({
    expectedType: dto,
    whitelist: true,
    transform: true,
    forbidUnknownValues: false,
  });
