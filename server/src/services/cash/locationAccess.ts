/**
 * Facility and counter authorization for the cash proxy routes
 *
 * Counters are host locations. The caller must have access to the counter's
 * location (superusers always do); this runs before any ERP call.
 */

import type { HostFacility, HostLocation } from '@care-erp/shared';
import type { AuthUser } from '../../middleware/auth.js';
import type { HostRepository } from '../../repositories/hostRepository.js';
import { ForbiddenError, NotFoundError } from '../../utils/errors.js';

export type LocationRepository = Pick<HostRepository, 'findFacility' | 'findLocation' | 'hasLocationAccess'>;

export async function resolveFacility(repository: LocationRepository, facilityExternalId: string): Promise<HostFacility> {
    const facility = await repository.findFacility(facilityExternalId);
    if (!facility) {
        throw new NotFoundError('Facility not found', 'Facility', facilityExternalId);
    }
    return facility;
}

/**
 * @throws NotFoundError when the location is not part of the facility
 * @throws ForbiddenError when the user has no access to it
 */
export async function authorizeLocation(
    repository: LocationRepository,
    user: AuthUser,
    facility: HostFacility,
    locationExternalId: string,
): Promise<HostLocation> {
    const location = await repository.findLocation(facility.externalId, locationExternalId);
    if (!location) {
        throw new NotFoundError(`Location ${locationExternalId} not found in this facility`, 'Location', locationExternalId);
    }

    if (user.isSuperuser) return location;

    const allowed = await repository.hasLocationAccess(user.userExternalId, location.externalId);
    if (!allowed) {
        throw new ForbiddenError(`You do not have access to location ${location.name}`);
    }
    return location;
}

/** Name sent to the ERP for the acting user */
export function displayName(user: AuthUser): string {
    return user.name || user.username;
}
