import type { EventEnvelope } from "../event/types";

/**
 * Anything that can sit in a subscriber list.
 *
 * `onInit` / `onDestroy` belong to the owning component; the dispatcher only ever
 * calls `onNotify`. Declared with method syntax so an observer of a narrower
 * event type still fits a list of `Observer<EventEnvelope>`.
 */
export interface Observer<TEvent = EventEnvelope> {
    onNotify(event: TEvent): void;
    onInit(): void;
    onDestroy(): void;
    /** Optional liveness probe; `false` makes a still-subscribed observer stale. */
    isAlive?(): boolean;
}

export type ObserverConfig<TEvent = EventEnvelope> = {
    /** Label used in diagnostics and FSM errors. */
    name?: string;
    onNotify: (event: TEvent) => void;
    onInit?: () => void;
    onDestroy?: () => void;
};
