import type { CollisionKind } from 'game/collision';
import type { TilePosition } from 'util/wrap';

export type GamePhase = 'title' | 'play' | 'game-over';

export interface PelletEatenPayload {
    readonly sessionId: string;
    readonly level: number;
    readonly tile: TilePosition;
    readonly scoreAwarded: number;
    readonly totalScore: number;
    readonly pelletsRemaining: number;
}

export interface LifeLostPayload {
    readonly sessionId: string;
    readonly level: number;
    readonly livesRemaining: number;
    readonly pursuerId: string;
    readonly collision: CollisionKind;
}

export interface GameOverPayload {
    readonly sessionId: string;
    readonly level: number;
    readonly finalScore: number;
}

export interface LevelAdvancedPayload {
    readonly sessionId: string;
    readonly fromLevel: number;
    readonly toLevel: number;
    readonly wrapped: boolean;
}

export interface PhaseChangedPayload {
    readonly sessionId: string;
    readonly from: GamePhase;
    readonly to: GamePhase;
}

export interface SessionResetPayload {
    readonly sessionId: string;
    readonly previousScore: number;
}

export interface GridChaseEventMap {
    readonly PelletEaten: PelletEatenPayload;
    readonly LifeLost: LifeLostPayload;
    readonly GameOver: GameOverPayload;
    readonly LevelAdvanced: LevelAdvancedPayload;
    readonly PhaseChanged: PhaseChangedPayload;
    readonly SessionReset: SessionResetPayload;
}

export type GridChaseEventName = keyof GridChaseEventMap;

export interface EventEnvelope<EventName extends GridChaseEventName> {
    readonly type: EventName;
    readonly timestamp: number;
    readonly payload: GridChaseEventMap[EventName];
}

export type AnyEventEnvelope = { [Name in GridChaseEventName]: EventEnvelope<Name> }[GridChaseEventName];

export type EventListener<EventName extends GridChaseEventName> = (event: EventEnvelope<EventName>) => void;

export interface GridChaseEventBus {
    publish<EventName extends GridChaseEventName>(
        this: void,
        type: EventName,
        payload: GridChaseEventMap[EventName],
        timestamp?: number,
    ): void;
    subscribe<EventName extends GridChaseEventName>(
        this: void,
        type: EventName,
        listener: EventListener<EventName>,
    ): () => void;
    /** Receives every event regardless of type, in publish order. */
    subscribeAll(this: void, listener: (event: AnyEventEnvelope) => void): () => void;
    clear(this: void): void;
    listenerCount(this: void, type: GridChaseEventName): number;
}

export interface EventBusOptions {
    readonly now?: () => number;
}

type InternalListener = EventListener<GridChaseEventName>;

type ListenerRegistry = Map<GridChaseEventName, Set<InternalListener>>;

const ensureListenerSet = (registry: ListenerRegistry, type: GridChaseEventName): Set<InternalListener> => {
    const existing = registry.get(type);
    if (existing) {
        return existing;
    }

    const created = new Set<InternalListener>();
    registry.set(type, created);
    return created;
};

export const createEventBus = (options: EventBusOptions = {}): GridChaseEventBus => {
    const registry: ListenerRegistry = new Map();
    const wildcard = new Set<(event: AnyEventEnvelope) => void>();
    const resolveNow = options.now ?? Date.now;

    const publish: GridChaseEventBus['publish'] = (type, payload, timestamp = resolveNow()) => {
        const envelope: EventEnvelope<typeof type> = { type, payload, timestamp };

        const listeners = registry.get(type);
        if (listeners) {
            for (const listener of [...listeners]) {
                listener(envelope);
            }
        }

        for (const listener of [...wildcard]) {
            listener(envelope as AnyEventEnvelope);
        }
    };

    const subscribe: GridChaseEventBus['subscribe'] = (type, listener) => {
        const listeners = ensureListenerSet(registry, type);
        listeners.add(listener as InternalListener);
        return () => {
            listeners.delete(listener as InternalListener);
            if (listeners.size === 0) {
                registry.delete(type);
            }
        };
    };

    const subscribeAll: GridChaseEventBus['subscribeAll'] = (listener) => {
        wildcard.add(listener);
        return () => {
            wildcard.delete(listener);
        };
    };

    const clear: GridChaseEventBus['clear'] = () => {
        registry.clear();
        wildcard.clear();
    };

    return {
        publish,
        subscribe,
        subscribeAll,
        clear,
        listenerCount: (type) => registry.get(type)?.size ?? 0,
    };
};
