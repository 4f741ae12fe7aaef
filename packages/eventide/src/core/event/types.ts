/** Dispatch key. Two events of the same logical category always share one. */
export type EventCategory = string;

/**
 * An event value as it travels through `publish`.
 *
 * Frozen on creation; the dispatcher neither copies nor keeps it past the call.
 */
export type EventEnvelope<T = unknown> = {
    readonly category: EventCategory;
    readonly payload: T;
};

/**
 * Public interface returned by {@link createEvent}.
 *
 * The definition is the single source of its category: `of()` stamps `id` onto every
 * envelope it builds, so routing never inspects the payload.
 */
export interface CreatedEvent<T = void> {
    readonly id: EventCategory;
    readonly defaults: T | undefined;
    of(...args: undefined extends T ? [payload?: T] : [payload: T]): EventEnvelope<T>;
}

/**
 * Definition created with defaults: `of()` may always be called without a payload.
 *
 * Assignable to {@link CreatedEvent}, so it subscribes and publishes like any other definition.
 */
export interface DefaultedEvent<T> {
    readonly id: EventCategory;
    readonly defaults: T;
    of(payload?: T): EventEnvelope<T>;
}

/** Payload type carried by an event definition. */
export type EventPayload<E> = E extends CreatedEvent<infer T> ? T : never;

/** Either an explicit tag or a definition whose `id` is the tag. */
export type EventKey<T = unknown> = EventCategory | CreatedEvent<T>;

/** Envelope type a definition's `of()` produces. */
export type EventOf<E> = EventEnvelope<EventPayload<E>>;
