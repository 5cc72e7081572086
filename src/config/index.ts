/**
 * Bot configuration loaded once from the environment
 */
import { match, P } from 'ts-pattern';
import { AppError } from '../shared/errors';
import { isReactionEmoji, type ReactionEmoji } from '../telegram/reaction-emoji';

export interface BotConfig {
    readonly token: string;
    /** Sticker file_unique_id values that trigger a reaction */
    readonly targetStickerIds: ReadonlySet<string>;
    readonly reactionEmoji: ReactionEmoji;
    /** Text sent as a reply to every matched sticker */
    readonly replyText: string;
    /** Long-poll wait per getUpdates cycle */
    readonly pollTimeoutSeconds: number;
    /** Discard updates queued while the bot was offline */
    readonly dropPendingUpdates: boolean;
}

export const DEFAULT_REACTION_EMOJI: ReactionEmoji = '👎';
export const DEFAULT_REPLY_TEXT = 'Хейтер обнаружен! Атакую!';
export const DEFAULT_POLL_TIMEOUT_SECONDS = 20;

// getUpdates accepts timeouts up to 50 seconds
const MAX_POLL_TIMEOUT_SECONDS = 50;

const requireToken = (raw: string | undefined): string => {
    const token = raw?.trim();
    if (!token) {
        throw AppError.validation('BOT_TOKEN must be provided');
    }
    return token;
};

export const parseStickerIds = (raw: string | undefined): ReadonlySet<string> => {
    const ids = (raw ?? '')
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0);

    if (ids.length === 0) {
        throw AppError.validation('TARGET_STICKER_IDS must list at least one sticker file_unique_id');
    }
    return new Set(ids);
};

// keyboards append U+FE0F to ❤, ☃, ✍ and 🕊; the Bot API wants the bare glyph
const EMOJI_VARIATION_SELECTOR = /\uFE0F/g;

const parseReactionEmoji = (raw: string | undefined): ReactionEmoji => {
    const emoji = raw?.trim().replace(EMOJI_VARIATION_SELECTOR, '');
    if (!emoji) return DEFAULT_REACTION_EMOJI;

    if (!isReactionEmoji(emoji)) {
        throw AppError.validation(`REACTION_EMOJI ${emoji} is not a Telegram reaction emoji`);
    }
    return emoji;
};

const parsePollTimeout = (raw: string | undefined): number => {
    const value = raw?.trim();
    if (!value) return DEFAULT_POLL_TIMEOUT_SECONDS;

    const seconds = Number(value);
    if (!Number.isInteger(seconds) || seconds < 0 || seconds > MAX_POLL_TIMEOUT_SECONDS) {
        throw AppError.validation(
            `POLL_TIMEOUT_SECONDS must be an integer between 0 and ${MAX_POLL_TIMEOUT_SECONDS}, got "${value}"`
        );
    }
    return seconds;
};

const parseFlag = (name: string, raw: string | undefined, fallback: boolean): boolean => {
    return match(raw?.trim().toLowerCase())
        .with(P.union(undefined, ''), () => fallback)
        .with(P.union('true', '1'), () => true)
        .with(P.union('false', '0'), () => false)
        .otherwise((value) => {
            throw AppError.validation(`${name} must be true or false, got "${value}"`);
        });
};

/**
 * Build the immutable bot configuration from environment variables
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): BotConfig => {
    const replyText = env.REPLY_TEXT?.trim() || DEFAULT_REPLY_TEXT;

    return Object.freeze({
        token: requireToken(env.BOT_TOKEN),
        targetStickerIds: parseStickerIds(env.TARGET_STICKER_IDS),
        reactionEmoji: parseReactionEmoji(env.REACTION_EMOJI),
        replyText,
        pollTimeoutSeconds: parsePollTimeout(env.POLL_TIMEOUT_SECONDS),
        dropPendingUpdates: parseFlag('DROP_PENDING_UPDATES', env.DROP_PENDING_UPDATES, true),
    });
};
