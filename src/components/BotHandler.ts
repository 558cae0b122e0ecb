import { Telegraf, Context } from 'telegraf';
import { GeoLocation } from '../types/Alert';
import { formatHelplineBlock } from '../config/helplines';
import { getCrisisResources } from '../config/prompts';
import { isSupportedLanguage } from '../config/languages';
import { describeError } from '../models/errors';
import { parseContactLines } from '../utils/contactParser';
import { logger } from '../utils/logger';
import { TurnResult, UtteranceInput } from '../managers';
import { AppContext } from './AppContext';
import {
    HELP_TEXT,
    SETUP_CONTACTS_TEXT,
    describeErrorForUser,
    formatAlertResult,
    formatHistory,
    formatLanguages,
    formatOutcome,
    formatProfile,
    formatSetupStatus
} from './replies';

const log = logger.child('BotHandler');

const GENERIC_ERROR_REPLY = 'Sorry, something went wrong. Please try again later.';
const HISTORY_LIMIT = 20;

// Bot Handler Component - Telegram front end for conversations and escalation
export class BotHandler {
    private context: AppContext;
    private bot: Telegraf<Context> | null = null;
    private chatSessions: Map<number, string> = new Map();
    private chatLocations: Map<number, GeoLocation> = new Map();

    constructor(context: AppContext) {
        this.context = context;
    }

    async initialize(): Promise<void> {
        logger.setLevel(this.context.config.logLevel);

        this.bot = new Telegraf(this.context.config.botToken);

        this.bot.catch(async (error: unknown, ctx) => {
            log.error('Telegram bot error', { message: describeError(error) });
            try {
                await ctx.reply(describeErrorForUser(error) ?? GENERIC_ERROR_REPLY);
            } catch (replyError) {
                log.warn('Could not deliver error reply', { message: describeError(replyError) });
            }
        });

        this.registerCommandHandlers();
        this.registerMessageHandlers();

        // launch() only settles once polling stops
        this.bot.launch().catch(error => {
            log.error('Telegram polling stopped', { message: describeError(error) });
        });
        log.info('Bot launched', { deliveryMode: this.context.escalation.getDeliveryMode() });
    }

    async shutdown(): Promise<void> {
        if (this.bot) {
            this.bot.stop();
            this.bot = null;
        }
    }

    private registerCommandHandlers(): void {
        if (!this.bot) {
            throw new Error('BotHandler not initialized.');
        }

        const bot = this.bot;
        const { sessionManager, escalation } = this.context;

        bot.start(async ctx => {
            if (!ctx.chat) return;

            this.ensureSession(ctx.chat.id);
            await ctx.reply(
                'Hi, I am here to listen. Send me a text or voice message about how you are feeling.\n\n' +
                'You can also register trusted contacts to alert in an emergency with /setup_contacts. Type /help for all commands.'
            );
        });

        bot.help(async ctx => {
            await ctx.reply(HELP_TEXT);
        });

        bot.command('helplines', async ctx => {
            await ctx.reply(formatHelplineBlock());
        });

        bot.command('language', async ctx => {
            if (!ctx.chat) return;

            const sessionId = this.ensureSession(ctx.chat.id);
            const code = this.extractCommandText(ctx.message.text, 'language').toLowerCase();
            if (!code) {
                await ctx.reply(formatLanguages(sessionManager.getSession(sessionId).language));
                return;
            }
            if (!isSupportedLanguage(code)) {
                await ctx.reply(`Unsupported language: ${code}\n\n${formatLanguages(sessionManager.getSession(sessionId).language)}`);
                return;
            }

            await sessionManager.runExclusive(sessionId, async () => {
                sessionManager.setLanguage(sessionId, code);
            });
            await ctx.reply(`Language set to ${code}.`);
        });

        bot.command('setup_contacts', async ctx => {
            if (!ctx.chat) return;

            const body = this.extractCommandText(ctx.message.text, 'setup_contacts');
            if (!body) {
                await ctx.reply(SETUP_CONTACTS_TEXT);
                return;
            }

            const sessionId = this.ensureSession(ctx.chat.id);
            const contacts = parseContactLines(body);
            const profile = escalation.saveEmergencyContacts(sessionId, contacts, this.chatLocations.has(ctx.chat.id));
            await ctx.reply(`Saved ✅\n\n${formatProfile(profile)}\n\nUse /test_alert 1 to check that contact 1 receives alerts.`);
        });

        bot.command('contacts', async ctx => {
            if (!ctx.chat) return;

            const sessionId = this.ensureSession(ctx.chat.id);
            const status = escalation.checkEmergencySetup(sessionId);
            if (!status.setupCompleted) {
                await ctx.reply(formatSetupStatus(status));
                return;
            }
            await ctx.reply(formatProfile(escalation.getEmergencyContacts(sessionId)));
        });

        bot.command('check_setup', async ctx => {
            if (!ctx.chat) return;

            const sessionId = this.ensureSession(ctx.chat.id);
            await ctx.reply(formatSetupStatus(escalation.checkEmergencySetup(sessionId)));
        });

        bot.command('remove_contacts', async ctx => {
            if (!ctx.chat) return;

            const sessionId = this.ensureSession(ctx.chat.id);
            escalation.deleteEmergencyContacts(sessionId);
            await ctx.reply('Emergency contacts deleted.');
        });

        bot.command('alert', async ctx => {
            if (!ctx.chat) return;

            const sessionId = this.ensureSession(ctx.chat.id);
            const result = await escalation.triggerEmergencyAlert(sessionId, {
                location: this.resolveLocation(ctx.chat.id, this.extractCommandText(ctx.message.text, 'alert')),
                userName: ctx.from?.first_name
            });
            await ctx.reply(formatAlertResult(result));
            await ctx.reply(getCrisisResources(sessionManager.getSession(sessionId).language));
        });

        bot.command('test_alert', async ctx => {
            if (!ctx.chat) return;

            const sessionId = this.ensureSession(ctx.chat.id);
            const position = parseInt(this.extractCommandText(ctx.message.text, 'test_alert') || '1', 10);
            const outcome = await escalation.sendTestAlert(sessionId, position - 1, {
                userName: ctx.from?.first_name
            });
            await ctx.reply(`Test alert result:\n${formatOutcome(outcome)}`);
        });

        bot.command('history', async ctx => {
            if (!ctx.chat) return;

            const sessionId = this.ensureSession(ctx.chat.id);
            await ctx.reply(formatHistory(sessionManager.getRecentMessages(sessionId, HISTORY_LIMIT)));
        });

        bot.command('clear', async ctx => {
            if (!ctx.chat) return;

            const previous = this.chatSessions.get(ctx.chat.id);
            const next = this.startFreshSession(ctx.chat.id);

            if (previous && escalation.checkEmergencySetup(previous).setupCompleted) {
                const profile = escalation.getEmergencyContacts(previous);
                escalation.saveEmergencyContacts(next, profile.contacts, profile.locationPermission);
                escalation.deleteEmergencyContacts(previous);
            }
            if (previous && sessionManager.hasSession(previous)) {
                await sessionManager.clear(previous);
            }

            await ctx.reply('Conversation cleared. Your emergency contacts are kept.');
        });
    }

    private registerMessageHandlers(): void {
        if (!this.bot) {
            throw new Error('BotHandler not initialized.');
        }

        const bot = this.bot;

        bot.on('text', async ctx => {
            if (ctx.message.text.startsWith('/')) {
                return;
            }

            const sessionId = this.ensureSession(ctx.chat.id);
            const result = await this.context.orchestrator.submitUtterance(sessionId, {
                kind: 'text',
                text: ctx.message.text
            });
            await this.deliverTurn(ctx, sessionId, result);
        });

        bot.on('voice', async ctx => {
            const sessionId = this.ensureSession(ctx.chat.id);
            const voice = ctx.message.voice;

            const maxBytes = this.context.config.maxAudioSizeMb * 1024 * 1024;
            if (voice.file_size !== undefined && voice.file_size > maxBytes) {
                await ctx.reply(`Audio file too large. Maximum size: ${this.context.config.maxAudioSizeMb}MB`);
                return;
            }

            const link = await ctx.telegram.getFileLink(voice.file_id);
            const response = await fetch(link);
            if (!response.ok) {
                throw new Error(`Voice download failed with status ${response.status}`);
            }

            const input: UtteranceInput = {
                kind: 'audio',
                audio: Buffer.from(await response.arrayBuffer()),
                filename: 'voice.ogg'
            };
            const result = await this.context.orchestrator.submitUtterance(sessionId, input);
            await ctx.reply(`🎙️ "${result.transcription}"`);
            await this.deliverTurn(ctx, sessionId, result);
        });

        bot.on('location', async ctx => {
            const { latitude, longitude, horizontal_accuracy } = ctx.message.location;
            this.chatLocations.set(ctx.chat.id, {
                latitude,
                longitude,
                accuracy: horizontal_accuracy ?? null
            });
            await ctx.reply('Location saved. It will be included if you send an alert with /alert.');
        });
    }

    private async deliverTurn(ctx: Context, sessionId: string, result: TurnResult): Promise<void> {
        await ctx.reply(result.replyText);

        if (result.replyAudio) {
            await ctx.replyWithVoice({ source: result.replyAudio });
        }

        if (result.isCrisis) {
            const setup = this.context.escalation.checkEmergencySetup(sessionId);
            await ctx.reply(
                setup.setupCompleted
                    ? 'If you want, I can alert your emergency contacts right now. Send /alert (share your location first to include it).'
                    : 'You can register someone you trust to be alerted in an emergency with /setup_contacts.'
            );
        }
    }

    private ensureSession(chatId: number): string {
        const existing = this.chatSessions.get(chatId);
        if (existing && this.context.sessionManager.hasSession(existing)) {
            return existing;
        }
        return this.startFreshSession(chatId);
    }

    private startFreshSession(chatId: number): string {
        const session = this.context.sessionManager.createSession();
        this.chatSessions.set(chatId, session.sessionId);
        return session.sessionId;
    }

    private resolveLocation(chatId: number, address: string): GeoLocation | null {
        const shared = this.chatLocations.get(chatId);
        if (shared) {
            return address ? { ...shared, address } : shared;
        }
        if (address) {
            return { latitude: null, longitude: null, accuracy: null, address };
        }
        return null;
    }

    private extractCommandText(text: string | undefined, command: string): string {
        if (!text) return '';
        const trimmed = text.replace(new RegExp(`^/${command}(@\\w+)?`), '').trim();
        return trimmed;
    }
}
