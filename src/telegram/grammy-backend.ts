/**
 * ChatBackend implementation on top of grammy's raw Bot API client
 */
import type { Api } from 'grammy';
import type { Update } from 'grammy/types';
import { match, P } from 'ts-pattern';
import { getErrorMessage } from '../shared/errors';
import { to, isErr, err } from '../shared/result';
import {
    ActionFailure,
    type ActionFailureKind,
    type ActionResult,
    type ChatBackend,
    type InboundUpdate,
} from './backend';

export type TelegramApi = Pick<
    Api,
    'getMe' | 'deleteWebhook' | 'getUpdates' | 'setMessageReaction' | 'sendMessage'
>;

// grammy's CommonJS typings take abort-controller's AbortSignal; Node's global one is the same object at runtime
type GrammySignal = Parameters<TelegramApi['getUpdates']>[1];

const PERMISSION_DENIED = /not enough rights|CHAT_WRITE_FORBIDDEN|CHAT_SEND_PLAIN_FORBIDDEN|Forbidden/;
const UNSUPPORTED_REACTION = /REACTION_INVALID|REACTION_EMPTY/;
const TARGET_GONE =
    /message to react not found|message to be replied not found|message not found|MESSAGE_ID_INVALID/;

/**
 * Map a failed Bot API call to a failure kind.
 * Error codes are checked before the description text.
 */
export const classifyActionError = (error: unknown): ActionFailureKind => {
    return match<unknown, ActionFailureKind>(error)
        .with({ error_code: 403 }, () => 'permission-denied')
        .with({ description: P.string.regex(PERMISSION_DENIED) }, () => 'permission-denied')
        .with({ description: P.string.regex(UNSUPPORTED_REACTION) }, () => 'unsupported-reaction')
        .with({ description: P.string.regex(TARGET_GONE) }, () => 'target-gone')
        .with({ error_code: P.number }, () => 'backend-error')
        .otherwise(() => 'unexpected');
};

export const toInboundUpdate = (update: Update): InboundUpdate => {
    const message = update.message;
    if (!message) {
        return { updateId: update.update_id };
    }

    return {
        updateId: update.update_id,
        message: {
            chatId: message.chat.id,
            messageId: message.message_id,
            sticker: message.sticker
                ? { fileUniqueId: message.sticker.file_unique_id }
                : undefined,
        },
    };
};

const runAction = async (method: string, call: Promise<unknown>): Promise<ActionResult> => {
    const result = await to<unknown, unknown>(call);

    if (isErr(result)) {
        const error = result[0];
        return err(new ActionFailure(classifyActionError(error), getErrorMessage(error), method));
    }

    return [null, true];
};

export const createGrammyBackend = (api: TelegramApi): ChatBackend => ({
    getMe: async () => {
        const me = await api.getMe();
        return { id: me.id, username: me.username };
    },

    discardPendingUpdates: async () => {
        await api.deleteWebhook({ drop_pending_updates: true });
    },

    getUpdates: async ({ offset, timeoutSeconds }, signal) => {
        const updates = await api.getUpdates(
            { offset, timeout: timeoutSeconds, allowed_updates: ['message'] },
            signal as GrammySignal
        );
        return updates.map(toInboundUpdate);
    },

    setReaction: ({ chatId, messageId }, emoji, isBig) =>
        runAction(
            'setMessageReaction',
            api.setMessageReaction(chatId, messageId, [{ type: 'emoji', emoji }], { is_big: isBig })
        ),

    sendReply: ({ chatId, messageId }, text) =>
        runAction(
            'sendMessage',
            api.sendMessage(chatId, text, { reply_parameters: { message_id: messageId } })
        ),
});
