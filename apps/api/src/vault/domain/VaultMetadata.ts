import { ClassificationTags } from './value-objects/ClassificationTags';
import { DiagnosticNotes } from './value-objects/DiagnosticNotes';
import { PatientHashCode } from './value-objects/PatientHashCode';
import { PayloadByteSize } from './value-objects/PayloadByteSize';

/**
 * Raw metadata fields as they arrive from a caller.
 */
export type VaultMetadataInput = Readonly<{
  patientHashCode: string;
  payloadByteSize: number;
  diagnosticNotes: string;
  classificationTags: readonly string[];
}>;

/**
 * The caller-editable part of a vault entry.
 *
 * Fields are validated in a fixed order (hash, size, notes, tags) and the
 * first violation is the one reported.
 */
export class VaultMetadata {
  private constructor(
    readonly patientHashCode: PatientHashCode,
    readonly payloadByteSize: PayloadByteSize,
    readonly diagnosticNotes: DiagnosticNotes,
    readonly classificationTags: ClassificationTags
  ) {}

  static from(input: VaultMetadataInput): VaultMetadata {
    const patientHashCode = PatientHashCode.from(input.patientHashCode);
    const payloadByteSize = PayloadByteSize.from(input.payloadByteSize);
    const diagnosticNotes = DiagnosticNotes.from(input.diagnosticNotes);
    const classificationTags = ClassificationTags.from(input.classificationTags);
    return new VaultMetadata(patientHashCode, payloadByteSize, diagnosticNotes, classificationTags);
  }
}
