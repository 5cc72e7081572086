import { beforeEach, describe, expect, it } from 'vitest';
import {
    createFakeBackend,
    stickerUpdate,
    textUpdate,
    type FakeBackend,
} from '../test-helpers/fake-backend';
import type { InboundMessage } from './backend';
import { runPolling } from './poller';

describe('runPolling', () => {
    let backend: FakeBackend;
    let controller: AbortController;
    let received: InboundMessage[];

    const onMessage = async (message: InboundMessage): Promise<void> => {
        received.push(message);
    };

    beforeEach(() => {
        backend = createFakeBackend();
        controller = new AbortController();
        received = [];
        backend.onDrained = () => controller.abort();
    });

    it('discards the backlog before the first poll', async () => {
        await runPolling({
            backend,
            timeoutSeconds: 20,
            dropPendingUpdates: true,
            onMessage,
            signal: controller.signal,
        });

        expect(backend.discardedPending).toBe(1);
    });

    it('keeps the backlog when asked to', async () => {
        await runPolling({
            backend,
            timeoutSeconds: 20,
            dropPendingUpdates: false,
            onMessage,
            signal: controller.signal,
        });

        expect(backend.discardedPending).toBe(0);
    });

    it('advances the offset past every handled update', async () => {
        backend.batches = [
            [stickerUpdate(10, 42, 7, 'AgADZwADuRtZCw'), textUpdate(11, 42, 8)],
            [{ updateId: 15 }],
        ];

        await runPolling({
            backend,
            timeoutSeconds: 20,
            dropPendingUpdates: true,
            onMessage,
            signal: controller.signal,
        });

        expect(backend.polls).toEqual([
            { offset: undefined, timeoutSeconds: 20 },
            { offset: 12, timeoutSeconds: 20 },
            { offset: 16, timeoutSeconds: 20 },
        ]);
    });

    it('hands messages over in arrival order', async () => {
        backend.batches = [
            [textUpdate(1, 42, 100), stickerUpdate(2, 42, 101, 'unknown123')],
            [stickerUpdate(3, 43, 5, 'AgADZwADuRtZCw')],
        ];

        await runPolling({
            backend,
            timeoutSeconds: 20,
            dropPendingUpdates: true,
            onMessage,
            signal: controller.signal,
        });

        expect(received.map((message) => message.messageId)).toEqual([100, 101, 5]);
    });

    it('rethrows poll failures', async () => {
        backend.pollError = new Error('Bad Gateway');

        await expect(
            runPolling({
                backend,
                timeoutSeconds: 20,
                dropPendingUpdates: true,
                onMessage,
                signal: controller.signal,
            })
        ).rejects.toThrow('Bad Gateway');
    });

    it('stops cleanly when aborted mid-poll', async () => {
        backend.getUpdates = (_options, signal) =>
            new Promise((_resolve, reject) => {
                signal?.addEventListener('abort', () => reject(new Error('Request aborted')));
            });

        const polling = runPolling({
            backend,
            timeoutSeconds: 20,
            dropPendingUpdates: false,
            onMessage,
            signal: controller.signal,
        });
        controller.abort();

        await expect(polling).resolves.toBeUndefined();
    });
});
