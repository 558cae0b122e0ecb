import { EmergencyContactInput, EmergencyProfile } from '../types/Emergency';
import { NotFoundError } from '../models/errors';
import { validateContactList } from '../models/validation';

/**
 * Emergency contacts per session. A save replaces the whole contact list;
 * profiles are only removed by an explicit delete.
 */
export class EmergencyProfileManager {
    private profiles: Map<string, EmergencyProfile> = new Map();

    /**
     * Validate and store the contact list for a session. Nothing is stored
     * when any contact fails validation.
     */
    saveContacts(sessionId: string, contacts: EmergencyContactInput[], locationPermission: boolean): EmergencyProfile {
        const validated = validateContactList(contacts);
        const existing = this.profiles.get(sessionId);
        const now = new Date();

        const profile: EmergencyProfile = {
            sessionId,
            contacts: validated,
            locationPermission,
            setupCompleted: true,
            createdAt: existing ? existing.createdAt : now,
            updatedAt: now
        };

        this.profiles.set(sessionId, profile);
        return this.copy(profile);
    }

    getProfile(sessionId: string): EmergencyProfile {
        const profile = this.profiles.get(sessionId);
        if (!profile) {
            throw new NotFoundError(`No emergency profile for session: ${sessionId}`);
        }
        return this.copy(profile);
    }

    hasProfile(sessionId: string): boolean {
        return this.profiles.has(sessionId);
    }

    /** Returns false when there was nothing to delete */
    deleteProfile(sessionId: string): boolean {
        return this.profiles.delete(sessionId);
    }

    getContactCount(sessionId: string): number {
        return this.profiles.get(sessionId)?.contacts.length ?? 0;
    }

    private copy(profile: EmergencyProfile): EmergencyProfile {
        return {
            ...profile,
            contacts: profile.contacts.map(contact => ({ ...contact }))
        };
    }
}
