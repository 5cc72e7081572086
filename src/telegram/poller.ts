/**
 * Long-poll receive loop
 */
import { to, isErr } from '../shared/result';
import type { ChatBackend, InboundMessage } from './backend';

export interface PollingOptions {
    backend: ChatBackend;
    timeoutSeconds: number;
    dropPendingUpdates: boolean;
    onMessage: (message: InboundMessage) => Promise<void>;
    /** Aborting ends the loop, including a poll that is still waiting */
    signal: AbortSignal;
}

/**
 * Poll until the signal aborts. Messages are handled one at a time, in
 * arrival order. Any failure other than an abort is rethrown.
 */
export const runPolling = async ({
    backend,
    timeoutSeconds,
    dropPendingUpdates,
    onMessage,
    signal,
}: PollingOptions): Promise<void> => {
    if (dropPendingUpdates) {
        await backend.discardPendingUpdates();
    }

    let offset: number | undefined;

    while (!signal.aborted) {
        const result = await to(backend.getUpdates({ offset, timeoutSeconds }, signal));

        if (isErr(result)) {
            if (signal.aborted) return;
            throw result[0];
        }

        for (const update of result[1]) {
            if (update.message) {
                await onMessage(update.message);
            }
            offset = update.updateId + 1;
        }
    }
};
