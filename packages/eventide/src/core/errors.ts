import type { EventCategory } from "./event/types";

export type EventideErrorCode =
    | "INVALID_OBSERVER"
    | "ILLEGAL_TRANSITION"
    | "SCOPE_DISPOSED"
    | "INVALID_CONFIG"
    | "STALE_OBSERVER"
    | "DELIVERY_FAILED";

/** Base class for every error the dispatcher raises. `code` is stable across releases. */
export class EventideError extends Error {
    constructor(
        public readonly code: EventideErrorCode,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class InvalidObserverError extends EventideError {
    constructor(category: EventCategory) {
        super("INVALID_OBSERVER", `Cannot subscribe to "${category}": observer must implement onNotify()`);
    }
}

export class IllegalTransitionError extends EventideError {
    constructor(
        public readonly from: string,
        public readonly to: string,
        public readonly machine: string,
    ) {
        super("ILLEGAL_TRANSITION", `Illegal transition: "${from}" → "${to}" for "${machine}"`);
    }
}

export class ScopeDisposedError extends EventideError {
    constructor(ownerId: string) {
        super("SCOPE_DISPOSED", `Scope "${ownerId}" is disposed and cannot subscribe`);
    }
}

export class InvalidConfigError extends EventideError {
    constructor(message: string) {
        super("INVALID_CONFIG", `[eventide] defineDispatcher: ${message}`);
    }
}

/**
 * Raised at delivery time when a subscriber entry no longer points at a live observer:
 * either it was garbage-collected, or it reports itself destroyed but was never unsubscribed.
 */
export class StaleObserverError extends EventideError {
    constructor(
        public readonly category: EventCategory,
        public readonly reason: "collected" | "destroyed",
    ) {
        super(
            "STALE_OBSERVER",
            reason === "collected"
                ? `Observer of "${category}" was garbage-collected while still subscribed`
                : `Observer of "${category}" was destroyed without unsubscribing`,
        );
    }
}

/** One failed delivery inside a fan-out. */
export type ObserverFailure = {
    category: EventCategory;
    /** Position of the subscriber in the fan-out, in registration order. */
    index: number;
    error: unknown;
};

/** Thrown after fan-out under the `"aggregate"` failure policy. */
export class DeliveryError extends EventideError {
    constructor(
        public readonly category: EventCategory,
        public readonly failures: readonly ObserverFailure[],
    ) {
        super(
            "DELIVERY_FAILED",
            `${failures.length} observer(s) of "${category}" failed`,
            { cause: failures[0]?.error },
        );
    }
}
