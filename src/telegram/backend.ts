/**
 * Messaging backend capability used by the poller and the reactor
 */
import { AppError } from '../shared/errors';
import type { Result } from '../shared/result';
import type { ReactionEmoji } from './reaction-emoji';

export interface BotIdentity {
    id: number;
    username: string;
}

export interface InboundSticker {
    /** Stable across bots, unlike file_id */
    fileUniqueId: string;
}

export interface InboundMessage {
    chatId: number;
    messageId: number;
    sticker?: InboundSticker;
}

export interface InboundUpdate {
    updateId: number;
    message?: InboundMessage;
}

export interface MessageRef {
    chatId: number;
    messageId: number;
}

export type ActionFailureKind =
    | 'permission-denied'
    | 'unsupported-reaction'
    | 'target-gone'
    | 'backend-error'
    | 'unexpected';

export class ActionFailure extends AppError {
    constructor(
        public readonly kind: ActionFailureKind,
        message: string,
        /** Bot API method that failed */
        public readonly method: string
    ) {
        super(message, kind);
        this.name = 'ActionFailure';
    }
}

export type ActionResult = Result<true, ActionFailure>;

export interface PollOptions {
    /** First update_id to return; omitted on the first cycle */
    offset?: number;
    timeoutSeconds: number;
}

export interface ChatBackend {
    getMe: () => Promise<BotIdentity>;
    discardPendingUpdates: () => Promise<void>;
    getUpdates: (options: PollOptions, signal?: AbortSignal) => Promise<InboundUpdate[]>;
    setReaction: (target: MessageRef, emoji: ReactionEmoji, isBig: boolean) => Promise<ActionResult>;
    sendReply: (target: MessageRef, text: string) => Promise<ActionResult>;
}
