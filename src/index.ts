import 'dotenv/config';
import { Api } from 'grammy';
import { createStickerBot } from './bot';
import { loadConfig } from './config';
import { createLogger } from './shared/logger';
import { createGrammyBackend } from './telegram/grammy-backend';

const config = loadConfig();
const logger = createLogger('sticker-bot');

const bot = createStickerBot({
    config,
    backend: createGrammyBackend(new Api(config.token)),
    logger,
});

// Ctrl+C / docker stop end the poll loop cleanly
const controller = new AbortController();
process.once('SIGINT', () => controller.abort());
process.once('SIGTERM', () => controller.abort());

// start polling
bot.start(controller.signal).catch((error) => {
    console.error(error);
    process.exitCode = 1;
});
