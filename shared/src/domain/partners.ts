/**
 * Partner & User Mapping - Pure Functions
 *
 * Builds ERP partner records for patients, suppliers and staff users.
 * Partners are rebuilt on every sync; nothing is cached.
 */

import type { HostOrganization, HostPatient, HostUser } from '../types/index.js';
import type { PartnerData, UserData } from '../schemas/erpRequests.js';
import { formatPaymentDate } from '../utils/dateHelpers.js';

/**
 * Display name of a staff user: prefix, first, last and suffix joined,
 * falling back to the username, then to "-".
 */
export function getFullName(user: Pick<HostUser, 'prefix' | 'firstName' | 'lastName' | 'suffix' | 'username'>): string {
  const name = [user.prefix, user.firstName, user.lastName, user.suffix]
    .map((part) => part?.trim())
    .filter((part): part is string => Boolean(part))
    .join(' ');
  return name || user.username || '-';
}

export function buildPatientPartner(patient: HostPatient, state: string): PartnerData {
  return {
    name: patient.name,
    x_care_id: patient.externalId,
    partner_type: 'person',
    phone: patient.phoneNumber,
    state,
    email: '',
    agent: false,
    ...(patient.gender ? { gender: patient.gender } : {}),
    ...(patient.dateOfBirth ? { birthdate: formatPaymentDate(patient.dateOfBirth) } : {}),
    ...(patient.address ? { street: patient.address } : {}),
  };
}

export function buildSupplierPartner(organization: HostOrganization, defaultState: string): PartnerData {
  const { metadata } = organization;
  return {
    name: organization.name,
    x_care_id: organization.externalId,
    partner_type: 'company',
    email: metadata.email,
    phone: metadata.phone,
    state: metadata.state || defaultState,
    agent: false,
  };
}

/** Staff users are agents; a deleted user is retired rather than removed */
export function buildAgentPartner(user: HostUser, state: string): PartnerData {
  return {
    name: getFullName(user),
    x_care_id: user.externalId,
    partner_type: 'person',
    phone: user.phoneNumber,
    state,
    email: user.email,
    agent: true,
    status: user.deleted ? 'retired' : 'active',
  };
}

export function buildUserData(user: HostUser, state: string): UserData {
  return {
    x_care_id: user.externalId,
    name: getFullName(user),
    login: user.username,
    email: user.email,
    user_type: 'internal',
    phone: user.phoneNumber,
    state,
    partner_data: buildAgentPartner(user, state),
  };
}
