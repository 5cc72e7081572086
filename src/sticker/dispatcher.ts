/**
 * Filters inbound messages down to the target stickers
 */
import type { Logger } from '../shared/logger';
import type { InboundMessage } from '../telegram/backend';
import type { StickerReactor } from './reactor';

export const isTargetSticker = (
    message: InboundMessage,
    targets: ReadonlySet<string>
): boolean => {
    const sticker = message.sticker;
    return sticker !== undefined && targets.has(sticker.fileUniqueId);
};

export interface StickerDispatcherOptions {
    targets: ReadonlySet<string>;
    reactor: StickerReactor;
    logger: Logger;
}

export type MessageHandler = (message: InboundMessage) => Promise<void>;

export const createStickerDispatcher = ({
    targets,
    reactor,
    logger,
}: StickerDispatcherOptions): MessageHandler => {
    return async (message) => {
        if (!isTargetSticker(message, targets)) return;

        logger.info(`Target sticker detected in chat ${message.chatId}`);
        await reactor.react({ chatId: message.chatId, messageId: message.messageId });
    };
};
