import { IsArray, IsNumber, IsString } from 'class-validator';

/**
 * Shape-only checks: length and range bounds are enforced by the domain so
 * that clients receive the registry's error kind.
 */
export class VaultMetadataDto {
  @IsString()
  patientHashCode!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  payloadByteSize!: number;

  @IsString()
  diagnosticNotes!: string;

  @IsArray()
  @IsString({ each: true })
  classificationTags!: string[];
}
