// Validation for caller-supplied contact and location data
import { EmergencyContact, EmergencyContactInput, GeoLocation, RELATIONSHIPS, Relationship } from '../types';
import { ValidationError } from './errors';

export { ValidationError };

export const MIN_CONTACTS = 1;
export const MAX_CONTACTS = 3;
export const MAX_CONTACT_NAME_LENGTH = 100;

const PHONE_PATTERN = /^\+\d{10,15}$/;
const PHONE_SEPARATORS = /[\s\-.()]/g;

/**
 * Strip common separators and check the `+<countrycode><digits>` shape.
 * Returns null when the number cannot be normalised.
 */
export const normalizePhoneNumber = (raw: string): string | null => {
    const phone = raw.replace(PHONE_SEPARATORS, '');
    return PHONE_PATTERN.test(phone) ? phone : null;
};

export const isValidRelationship = (value: string): value is Relationship => {
    return RELATIONSHIPS.some(relationship => relationship === value);
};

/**
 * Collect every problem with one contact. An empty list means valid.
 */
export const collectContactIssues = (contact: EmergencyContactInput, position: number): string[] => {
    const issues: string[] = [];
    const label = `Contact ${position}`;

    const name = typeof contact.name === 'string' ? contact.name.trim() : '';
    if (!name) {
        issues.push(`${label}: name must not be empty`);
    } else if (name.length > MAX_CONTACT_NAME_LENGTH) {
        issues.push(`${label}: name must be at most ${MAX_CONTACT_NAME_LENGTH} characters`);
    }

    if (typeof contact.phone !== 'string' || normalizePhoneNumber(contact.phone) === null) {
        issues.push(`${label}: phone number must start with + and country code (e.g., +919876543210)`);
    }

    if (typeof contact.relationship !== 'string' || !isValidRelationship(contact.relationship)) {
        issues.push(`${label}: relationship must be one of: ${RELATIONSHIPS.join(', ')}`);
    }

    return issues;
};

/**
 * Validate and normalise a full contact list (1-3 entries). Throws a single
 * ValidationError listing every issue found.
 */
export const validateContactList = (contacts: EmergencyContactInput[]): EmergencyContact[] => {
    if (contacts.length < MIN_CONTACTS || contacts.length > MAX_CONTACTS) {
        throw new ValidationError(`Must provide ${MIN_CONTACTS}-${MAX_CONTACTS} emergency contacts`);
    }

    const issues = contacts.flatMap((contact, index) => collectContactIssues(contact, index + 1));
    if (issues.length > 0) {
        throw new ValidationError(issues.join('; '), issues);
    }

    return contacts.map(contact => {
        const phone = normalizePhoneNumber(contact.phone);
        if (phone === null || !isValidRelationship(contact.relationship)) {
            throw new ValidationError('Contact failed validation');
        }
        return {
            name: contact.name.trim(),
            phone,
            relationship: contact.relationship,
            whatsappEnabled: contact.whatsappEnabled ?? true
        };
    });
};

const isFiniteOrNull = (value: number | null): boolean => value === null || Number.isFinite(value);

export const validateGeoLocation = (location: GeoLocation): GeoLocation => {
    const issues: string[] = [];

    if (!isFiniteOrNull(location.latitude) || (location.latitude !== null && Math.abs(location.latitude) > 90)) {
        issues.push('latitude must be between -90 and 90');
    }
    if (!isFiniteOrNull(location.longitude) || (location.longitude !== null && Math.abs(location.longitude) > 180)) {
        issues.push('longitude must be between -180 and 180');
    }
    if (!isFiniteOrNull(location.accuracy) || (location.accuracy !== null && location.accuracy < 0)) {
        issues.push('accuracy must be a non-negative number');
    }
    if ((location.latitude === null) !== (location.longitude === null)) {
        issues.push('latitude and longitude must be provided together');
    }

    if (issues.length > 0) {
        throw new ValidationError(`Invalid location: ${issues.join(', ')}`, issues);
    }
    return location;
};
