import {
    AlertPayload,
    ChannelAttempt,
    DeliveryChannelName,
    DeliveryOutcome,
    DeliveryStateKind
} from '../types/Alert';
import { EmergencyContact } from '../types/Emergency';
import { DeliveryChannel } from '../types/Integrations';
import { DeliveryMode } from '../config/Config';
import { PreconditionFailedError, TimeoutError, describeError } from '../models/errors';
import { maskPhone } from '../models/utils';
import { withTimeout } from '../utils/timeout';
import { logger } from '../utils/logger';
import { personalize } from './AlertComposer';

const log = logger.child('AlertDispatcher');

/** `fallback` retries over SMS after a failed WhatsApp attempt */
export type ChannelPolicy = 'fallback' | 'whatsapp_only';

export type DeliveryState =
    | { kind: 'PENDING' }
    | { kind: 'WHATSAPP_ATTEMPTED' }
    | { kind: 'FAILED_WHATSAPP'; errorDetail: string }
    | { kind: 'SMS_ATTEMPTED'; previousError?: string }
    | { kind: 'SENT'; channel: DeliveryChannelName }
    | { kind: 'SIMULATED'; channel: DeliveryChannelName }
    | { kind: 'FAILED'; errorDetail: string };

export type TerminalDeliveryState = Extract<DeliveryState, { kind: 'SENT' | 'SIMULATED' | 'FAILED' }>;

export type DeliveryEvent =
    | { type: 'advance' }
    | { type: 'succeeded' }
    | { type: 'simulated' }
    | { type: 'failed'; errorDetail: string };

export interface TransitionContext {
    whatsappEnabled: boolean;
    whatsappAvailable: boolean;
    smsAvailable: boolean;
    policy: ChannelPolicy;
}

export const NO_CHANNEL_DETAIL = 'no delivery channel available';
export const TIMEOUT_DETAIL = 'timeout';

const ADVANCE: DeliveryEvent = { type: 'advance' };

export const isTerminalState = (state: DeliveryState): state is TerminalDeliveryState => {
    return state.kind === 'SENT' || state.kind === 'SIMULATED' || state.kind === 'FAILED';
};

const toDeliveryEvent = (attempt: ChannelAttempt): DeliveryEvent => {
    switch (attempt.status) {
        case 'sent':
            return { type: 'succeeded' };
        case 'simulated':
            return { type: 'simulated' };
        case 'failed':
            return { type: 'failed', errorDetail: attempt.errorDetail ?? 'delivery failed' };
    }
};

const invalidTransition = (state: DeliveryState, event: DeliveryEvent): Error => {
    return new Error(`Invalid delivery transition: ${event.type} in state ${state.kind}`);
};

const smsAllowed = (context: TransitionContext): boolean => {
    return context.smsAvailable && context.policy === 'fallback';
};

/**
 * Delivery state machine for one contact. Pure: the next state depends only
 * on the current state, the event and the channel context.
 */
export const transition = (state: DeliveryState, event: DeliveryEvent, context: TransitionContext): DeliveryState => {
    switch (state.kind) {
        case 'PENDING':
            if (event.type !== 'advance') {
                throw invalidTransition(state, event);
            }
            if (context.whatsappEnabled && context.whatsappAvailable) {
                return { kind: 'WHATSAPP_ATTEMPTED' };
            }
            if (smsAllowed(context)) {
                return { kind: 'SMS_ATTEMPTED' };
            }
            return { kind: 'FAILED', errorDetail: NO_CHANNEL_DETAIL };

        case 'WHATSAPP_ATTEMPTED':
            switch (event.type) {
                case 'succeeded':
                    return { kind: 'SENT', channel: 'whatsapp' };
                case 'simulated':
                    return { kind: 'SIMULATED', channel: 'whatsapp' };
                case 'failed':
                    return { kind: 'FAILED_WHATSAPP', errorDetail: event.errorDetail };
                default:
                    throw invalidTransition(state, event);
            }

        case 'FAILED_WHATSAPP':
            if (event.type !== 'advance') {
                throw invalidTransition(state, event);
            }
            if (smsAllowed(context)) {
                return { kind: 'SMS_ATTEMPTED', previousError: state.errorDetail };
            }
            return { kind: 'FAILED', errorDetail: state.errorDetail };

        case 'SMS_ATTEMPTED':
            switch (event.type) {
                case 'succeeded':
                    return { kind: 'SENT', channel: 'sms' };
                case 'simulated':
                    return { kind: 'SIMULATED', channel: 'sms' };
                case 'failed':
                    return { kind: 'FAILED', errorDetail: event.errorDetail };
                default:
                    throw invalidTransition(state, event);
            }

        default:
            throw invalidTransition(state, event);
    }
};

export interface AlertDispatcherOptions {
    whatsapp: DeliveryChannel | null;
    sms: DeliveryChannel | null;
    mode: DeliveryMode;
    deliveryTimeoutMs: number;
    policy?: ChannelPolicy;
}

export interface DispatchOptions {
    policy?: ChannelPolicy;
}

/**
 * Sends a composed alert to every contact, WhatsApp first with SMS as the
 * fallback. Contacts are handled concurrently; results come back in the
 * order the contacts were given. Delivery problems end up in the outcomes,
 * they are never thrown.
 *
 * A timed-out attempt aborts its channel call, but a message the provider had
 * already accepted may still be delivered, so a contact can receive both the
 * WhatsApp and the SMS copy.
 */
export class AlertDispatcher {
    private whatsapp: DeliveryChannel | null;
    private sms: DeliveryChannel | null;
    private mode: DeliveryMode;
    private deliveryTimeoutMs: number;
    private policy: ChannelPolicy;

    constructor(options: AlertDispatcherOptions) {
        this.whatsapp = options.whatsapp;
        this.sms = options.sms;
        this.mode = options.mode;
        this.deliveryTimeoutMs = options.deliveryTimeoutMs;
        this.policy = options.policy ?? 'fallback';
    }

    getMode(): DeliveryMode {
        return this.mode;
    }

    async dispatch(
        payload: AlertPayload,
        contacts: EmergencyContact[],
        options: DispatchOptions = {}
    ): Promise<DeliveryOutcome[]> {
        if (contacts.length === 0) {
            throw new PreconditionFailedError('No emergency contacts to alert');
        }
        if (!payload.body.trim()) {
            throw new PreconditionFailedError('Alert message body is empty');
        }

        const policy = options.policy ?? this.policy;
        return Promise.all(contacts.map(contact => this.deliverToContact(payload, contact, policy)));
    }

    private async deliverToContact(
        payload: AlertPayload,
        contact: EmergencyContact,
        policy: ChannelPolicy
    ): Promise<DeliveryOutcome> {
        const context: TransitionContext = {
            whatsappEnabled: contact.whatsappEnabled,
            whatsappAvailable: this.isChannelAvailable(this.whatsapp),
            smsAvailable: this.isChannelAvailable(this.sms),
            policy
        };
        const body = personalize(payload, contact);
        const attempts: ChannelAttempt[] = [];
        const states: DeliveryStateKind[] = ['PENDING'];

        let state = transition({ kind: 'PENDING' }, ADVANCE, context);
        states.push(state.kind);

        while (!isTerminalState(state)) {
            let event: DeliveryEvent = ADVANCE;
            if (state.kind === 'WHATSAPP_ATTEMPTED' || state.kind === 'SMS_ATTEMPTED') {
                const channel: DeliveryChannelName = state.kind === 'WHATSAPP_ATTEMPTED' ? 'whatsapp' : 'sms';
                const attempt = await this.attempt(channel, contact, body, payload.alertId);
                attempts.push(attempt);
                event = toDeliveryEvent(attempt);
            }
            state = transition(state, event, context);
            states.push(state.kind);
        }

        const outcome = this.toOutcome(contact, state, attempts, states);
        if (outcome.status === 'failed') {
            log.warn('Alert delivery failed', {
                alertId: payload.alertId,
                phone: maskPhone(contact.phone),
                errorDetail: outcome.errorDetail
            });
        } else {
            log.info('Alert delivered', {
                alertId: payload.alertId,
                phone: maskPhone(contact.phone),
                channel: outcome.channel,
                status: outcome.status
            });
        }
        return outcome;
    }

    private async attempt(
        channelName: DeliveryChannelName,
        contact: EmergencyContact,
        body: string,
        alertId: string
    ): Promise<ChannelAttempt> {
        if (this.mode === 'simulated') {
            log.info(`[SIMULATED] ${channelName} alert to ${contact.name}`, {
                alertId,
                phone: maskPhone(contact.phone)
            });
            return { channel: channelName, status: 'simulated' };
        }

        const channel = channelName === 'whatsapp' ? this.whatsapp : this.sms;
        if (!channel) {
            return { channel: channelName, status: 'failed', errorDetail: `${channelName} channel not configured` };
        }

        try {
            const receipt = await withTimeout(
                `${channelName} delivery`,
                this.deliveryTimeoutMs,
                signal => channel.send(contact.phone, body, signal)
            );
            return { channel: channelName, status: 'sent', providerMessageId: receipt.providerMessageId };
        } catch (error) {
            const errorDetail = error instanceof TimeoutError ? TIMEOUT_DETAIL : describeError(error);
            log.debug(`${channelName} attempt failed`, { alertId, errorDetail });
            return { channel: channelName, status: 'failed', errorDetail };
        }
    }

    private isChannelAvailable(channel: DeliveryChannel | null): boolean {
        if (this.mode === 'simulated') {
            return true;
        }
        return channel !== null && channel.isAvailable();
    }

    private toOutcome(
        contact: EmergencyContact,
        state: TerminalDeliveryState,
        attempts: ChannelAttempt[],
        states: DeliveryStateKind[]
    ): DeliveryOutcome {
        const base = { contactName: contact.name, phone: contact.phone, attempts, states };
        switch (state.kind) {
            case 'SENT':
                return { ...base, channel: state.channel, status: 'sent' };
            case 'SIMULATED':
                return { ...base, channel: state.channel, status: 'simulated' };
            case 'FAILED': {
                const last = attempts[attempts.length - 1];
                return { ...base, channel: last ? last.channel : null, status: 'failed', errorDetail: state.errorDetail };
            }
        }
    }
}
