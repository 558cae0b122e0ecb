import { EmergencyContactInput, RELATIONSHIPS } from '../types/Emergency';
import { ValidationError } from '../models/errors';

export const CONTACT_LINE_FORMAT = 'Name, +919876543210, Relationship[, whatsapp|sms]';

const canonicalRelationship = (value: string): string => {
    const match = RELATIONSHIPS.find(relationship => relationship.toLowerCase() === value.toLowerCase());
    return match ?? value;
};

/**
 * Parse one contact per line in the form `Name, phone, Relationship[, channel]`.
 * Only the line shape is checked here; field validation happens on save.
 */
export const parseContactLines = (text: string): EmergencyContactInput[] => {
    const lines = text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);

    const issues: string[] = [];
    const contacts: EmergencyContactInput[] = [];

    lines.forEach((line, index) => {
        const fields = line.split(',').map(field => field.trim());
        if (fields.length < 3 || fields.length > 4) {
            issues.push(`Line ${index + 1}: expected "${CONTACT_LINE_FORMAT}"`);
            return;
        }

        const [name, phone, relationship, channel] = fields;
        let whatsappEnabled = true;
        if (channel !== undefined) {
            const preference = channel.toLowerCase();
            if (preference === 'sms') {
                whatsappEnabled = false;
            } else if (preference !== 'whatsapp') {
                issues.push(`Line ${index + 1}: channel must be whatsapp or sms`);
                return;
            }
        }

        contacts.push({
            name,
            phone,
            relationship: canonicalRelationship(relationship),
            whatsappEnabled
        });
    });

    if (issues.length > 0) {
        throw new ValidationError(issues.join('; '), issues);
    }
    return contacts;
};
