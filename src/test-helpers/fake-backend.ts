/**
 * In-memory ChatBackend and Logger for tests
 */
import type { LogLevel, Logger } from '../shared/logger';
import { err } from '../shared/result';
import {
    ActionFailure,
    type ActionFailureKind,
    type ActionResult,
    type BotIdentity,
    type ChatBackend,
    type InboundUpdate,
    type MessageRef,
    type PollOptions,
} from '../telegram/backend';
import type { ReactionEmoji } from '../telegram/reaction-emoji';

export type BackendCall =
    | { method: 'setReaction'; chatId: number; messageId: number; emoji: ReactionEmoji; isBig: boolean }
    | { method: 'sendReply'; chatId: number; text: string; replyTo: number };

export interface FakeBackend extends ChatBackend {
    /** Outbound actions in call order */
    calls: BackendCall[];
    polls: PollOptions[];
    discardedPending: number;
    identity: BotIdentity | Error;
    /** Batches returned by successive getUpdates calls */
    batches: InboundUpdate[][];
    /** Thrown by getUpdates once the batches run out */
    pollError?: Error;
    /** Called when getUpdates runs out of batches and no pollError is set */
    onDrained?: () => void;
    reactionFailure?: ActionFailure;
    replyFailure?: ActionFailure;
}

export const failure = (kind: ActionFailureKind, message: string = kind): ActionFailure =>
    new ActionFailure(kind, message, 'test');

export const createFakeBackend = (): FakeBackend => {
    const backend: FakeBackend = {
        calls: [],
        polls: [],
        discardedPending: 0,
        identity: { id: 1, username: 'sticker_test_bot' },
        batches: [],

        getMe: async () => {
            if (backend.identity instanceof Error) throw backend.identity;
            return backend.identity;
        },

        discardPendingUpdates: async () => {
            backend.discardedPending++;
        },

        getUpdates: async (options) => {
            backend.polls.push(options);
            const next = backend.batches.shift();
            if (next) return next;
            if (backend.pollError) throw backend.pollError;
            backend.onDrained?.();
            return [];
        },

        setReaction: async (target: MessageRef, emoji, isBig): Promise<ActionResult> => {
            backend.calls.push({ method: 'setReaction', ...target, emoji, isBig });
            return backend.reactionFailure ? err(backend.reactionFailure) : [null, true];
        },

        sendReply: async (target: MessageRef, text): Promise<ActionResult> => {
            backend.calls.push({
                method: 'sendReply',
                chatId: target.chatId,
                text,
                replyTo: target.messageId,
            });
            return backend.replyFailure ? err(backend.replyFailure) : [null, true];
        },
    };
    return backend;
};

export interface LogEntry {
    level: LogLevel;
    message: string;
}

export const createRecordingLogger = (): Logger & { entries: LogEntry[] } => {
    const entries: LogEntry[] = [];
    return {
        entries,
        info: (message) => entries.push({ level: 'info', message }),
        warn: (message) => entries.push({ level: 'warn', message }),
        error: (message) => entries.push({ level: 'error', message }),
    };
};

export const stickerUpdate = (
    updateId: number,
    chatId: number,
    messageId: number,
    fileUniqueId: string
): InboundUpdate => ({
    updateId,
    message: { chatId, messageId, sticker: { fileUniqueId } },
});

export const textUpdate = (updateId: number, chatId: number, messageId: number): InboundUpdate => ({
    updateId,
    message: { chatId, messageId },
});
