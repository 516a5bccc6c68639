import { LedgerSequence } from './value-objects/LedgerSequence';

export type RegistryState = Readonly<{
  totalVaultEntries: number;
  ledgerSequence: LedgerSequence;
}>;

export const initialRegistryState = (): RegistryState => ({
  totalVaultEntries: 0,
  ledgerSequence: LedgerSequence.zero(),
});
