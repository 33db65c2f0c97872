import { EventEmitter } from 'node:events';
import type { RequestId } from '../id/RequestIdAllocator.js';
import type { GroupId } from '../ledger/groupLedger.js';
import type { Identity } from '../auth/roleRegistry.js';
import type { Clock } from '../clock/clock.js';
import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('RevealEvents');

export interface RevealEventMap {
    RevealRequested: { groupId: GroupId; requester: Identity; requestId: RequestId };
    RevealCompleted: { groupId: GroupId; requestId: RequestId; count: number; sum: number };
    RevealFailed: { requestId: RequestId; groupId: GroupId; reason: string };
    RevealTimedOut: { requestId: RequestId; groupId: GroupId };
    RefundClaimed: { groupId: GroupId; requestId: RequestId; claimant: Identity };
}

export type RevealEventName = keyof RevealEventMap;

export type RevealEvent = {
    [K in RevealEventName]: { readonly type: K; readonly payload: RevealEventMap[K]; readonly emittedAt: number }
}[RevealEventName];

export type RevealEventListener = (event: RevealEvent) => void | Promise<void>;

const ANY = '*';

/**
 * Fire-and-forget notification bus for external observers.
 * A listener that throws or rejects is logged; the emitting operation is unaffected.
 */
export class RevealEventBus {
    private readonly emitter = new EventEmitter();

    constructor(private readonly clock: Clock) {
        this.emitter.setMaxListeners(0);
    }

    on<K extends RevealEventName>(type: K, listener: (payload: RevealEventMap[K]) => void | Promise<void>): () => void {
        const wrapped = (payload: RevealEventMap[K]) => this.invoke(type, () => listener(payload));
        this.emitter.on(type, wrapped);
        return () => {
            this.emitter.off(type, wrapped);
        };
    }

    onAny(listener: RevealEventListener): () => void {
        const wrapped = (event: RevealEvent) => this.invoke(event.type, () => listener(event));
        this.emitter.on(ANY, wrapped);
        return () => {
            this.emitter.off(ANY, wrapped);
        };
    }

    emit<K extends RevealEventName>(type: K, payload: RevealEventMap[K]): void {
        const frozen = Object.freeze({ ...payload });
        logger.info({ event: type, ...payload }, 'Reveal event');
        this.emitter.emit(type, frozen);
        this.emitter.emit(ANY, Object.freeze({ type, payload: frozen, emittedAt: this.clock.now() }));
    }

    private invoke(type: RevealEventName, call: () => void | Promise<void>): void {
        try {
            const result = call();
            if (result instanceof Promise) {
                result.catch((error: unknown) => this.report(type, error));
            }
        } catch (error: unknown) {
            this.report(type, error);
        }
    }

    private report(type: RevealEventName, error: unknown): void {
        logger.error({
            event: type,
            error: error instanceof Error ? error.message : String(error)
        }, 'Reveal event listener failed');
    }
}
