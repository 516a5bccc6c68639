import { EntryId } from './value-objects/EntryId';
import { PrincipalId } from './value-objects/PrincipalId';

/**
 * Row of the access-permission side table, keyed by (entryId, accessorIdentity).
 * Written for the creator when an entry is created; never read by mutations.
 */
export type AccessPermission = Readonly<{
  entryId: EntryId;
  accessorIdentity: PrincipalId;
  hasAccessRights: boolean;
}>;
