declare global {
    namespace NodeJS {
        interface ProcessEnv {
            BOT_TOKEN?: string
            // comma-separated sticker file_unique_id values
            TARGET_STICKER_IDS?: string
            REACTION_EMOJI?: string
            REPLY_TEXT?: string
            POLL_TIMEOUT_SECONDS?: string
            DROP_PENDING_UPDATES?: string
        }
    }
}

export { }
