/**
 * Insurance Resolution - Pure Functions
 *
 * An account is insured when it carries the configured insurance tag; the
 * insurer's ERP company id sits in the account extension under a
 * configurable key.
 */

import { ValidationError } from '../errors/sync.js';
import type { HostAccount } from '../types/index.js';

export function hasInsuranceTag(account: Pick<HostAccount, 'tagExternalIds'>, tagExternalId: string | null): boolean {
  if (!tagExternalId) return false;
  return account.tagExternalIds.includes(tagExternalId);
}

/**
 * @returns null when the extension has no value under `extensionName`
 * @throws ValidationError when the stored value is not an integer
 */
export function getInsuranceCompanyId(account: Pick<HostAccount, 'extension'>, extensionName: string): number | null {
  const raw = account.extension[extensionName];
  if (raw === undefined || raw === null || raw === '') return null;

  if (typeof raw === 'number' && Number.isInteger(raw)) return raw;
  if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) return Number(raw.trim());

  throw new ValidationError(`Invalid insurance company id '${String(raw)}' - must be a valid integer`);
}
