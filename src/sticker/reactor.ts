/**
 * Reacts to a matched sticker: emoji reaction first, then the canned reply
 */
import { match } from 'ts-pattern';
import type { Logger } from '../shared/logger';
import { isErr } from '../shared/result';
import type { ActionFailure, ActionFailureKind, ChatBackend, MessageRef } from '../telegram/backend';
import type { ReactionEmoji } from '../telegram/reaction-emoji';

export type ReactionStage = 'reaction' | 'reply';

export type ReactionOutcome =
    | { status: 'reacted' }
    | { status: 'failed'; stage: ReactionStage; kind: ActionFailureKind };

export interface StickerReactor {
    react: (target: MessageRef) => Promise<ReactionOutcome>;
}

export interface StickerReactorOptions {
    backend: ChatBackend;
    reactionEmoji: ReactionEmoji;
    replyText: string;
    logger: Logger;
}

export const createStickerReactor = ({
    backend,
    reactionEmoji,
    replyText,
    logger,
}: StickerReactorOptions): StickerReactor => {
    // Same lines whichever stage failed
    const reportFailure = (target: MessageRef, failure: ActionFailure): void => {
        match(failure.kind)
            .with('permission-denied', () =>
                logger.warn(
                    `Bot lacks permission to add reactions or send messages in chat ${target.chatId}`
                )
            )
            .with('unsupported-reaction', () =>
                logger.warn(`Emoji ${reactionEmoji} not supported for reactions`)
            )
            .with('target-gone', () =>
                logger.warn(
                    `Message ${target.messageId} in chat ${target.chatId} too old or deleted`
                )
            )
            .with('backend-error', () =>
                logger.error(`Failed to add reaction or send message: ${failure.message}`)
            )
            .with('unexpected', () =>
                logger.error(`Unexpected error adding reaction or sending message: ${failure.message}`)
            )
            .exhaustive();
    };

    const fail = (target: MessageRef, stage: ReactionStage, failure: ActionFailure): ReactionOutcome => {
        reportFailure(target, failure);
        return { status: 'failed', stage, kind: failure.kind };
    };

    return {
        react: async (target) => {
            const reaction = await backend.setReaction(target, reactionEmoji, false);
            if (isErr(reaction)) {
                return fail(target, 'reaction', reaction[0]);
            }

            logger.info(`✅ Reaction added successfully: ${reactionEmoji}`);

            const reply = await backend.sendReply(target, replyText);
            if (isErr(reply)) {
                return fail(target, 'reply', reply[0]);
            }

            return { status: 'reacted' };
        },
    };
};
