/**
 * Sticker bot lifecycle: identity lookup, startup logging and the poll loop
 */
import type { BotConfig } from './config';
import { getErrorMessage } from './shared/errors';
import type { Logger } from './shared/logger';
import { to, isErr } from './shared/result';
import { createStickerDispatcher } from './sticker/dispatcher';
import { createStickerReactor } from './sticker/reactor';
import type { ChatBackend } from './telegram/backend';
import { runPolling } from './telegram/poller';

export interface StickerBotOptions {
    config: BotConfig;
    backend: ChatBackend;
    logger: Logger;
}

export interface StickerBot {
    /**
     * Resolves once the signal aborts; rejects when polling fails
     */
    start: (signal: AbortSignal) => Promise<void>;
}

export const createStickerBot = ({ config, backend, logger }: StickerBotOptions): StickerBot => {
    const reactor = createStickerReactor({
        backend,
        reactionEmoji: config.reactionEmoji,
        replyText: config.replyText,
        logger,
    });
    const dispatch = createStickerDispatcher({
        targets: config.targetStickerIds,
        reactor,
        logger,
    });

    // bot keeps running without its identity
    const logIdentity = async (): Promise<void> => {
        const result = await to(backend.getMe());
        if (isErr(result)) {
            logger.error(`Failed to get bot info: ${getErrorMessage(result[0])}`);
            return;
        }
        logger.info(`Bot started: @${result[1].username}`);
    };

    return {
        start: async (signal) => {
            await logIdentity();
            logger.info(`Watching for sticker IDs: ${[...config.targetStickerIds].join(', ')}`);
            logger.info(`Will react with: ${config.reactionEmoji}`);
            logger.info('🚀 Auto-react bot is running...');
            logger.info("Add me to groups and I'll automatically react to your target stickers!");

            const result = await to(
                runPolling({
                    backend,
                    timeoutSeconds: config.pollTimeoutSeconds,
                    dropPendingUpdates: config.dropPendingUpdates,
                    onMessage: dispatch,
                    signal,
                })
            );

            if (isErr(result)) {
                logger.error(`Bot error: ${getErrorMessage(result[0])}`);
                throw result[0];
            }

            logger.info('Bot stopped by user');
        },
    };
};
