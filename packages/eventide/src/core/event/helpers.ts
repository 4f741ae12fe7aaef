import type { CreatedEvent, DefaultedEvent, EventCategory, EventEnvelope, EventKey } from "./types";

/** Builds a frozen envelope for an explicit category tag. */
export function envelope<T>(category: EventCategory, payload: T): EventEnvelope<T> {
    return Object.freeze({ category, payload });
}

/**
 * Creates a typed event definition.
 *
 * @overload Explicit generic — `createEvent<{ amount: number }>("damage")`
 * @overload Infer from defaults — `createEvent("damage", { amount: 0 })`
 */
export function createEvent<T = void>(id: EventCategory): CreatedEvent<T>;
export function createEvent<T>(id: EventCategory, defaults: T): DefaultedEvent<T>;
export function createEvent<T>(id: EventCategory, defaults?: T): CreatedEvent<T> {
    if (!id || id.trim().length === 0) throw new Error("createEvent: id is required");
    return Object.freeze({
        id,
        defaults,
        of(...args: [payload?: T]): EventEnvelope<T> {
            // `of()` with no argument falls back to the defaults the definition was created with.
            const payload = args.length > 0 ? args[0] : defaults;
            return envelope(id, payload as T);
        },
    });
}

/** Resolves the category tag of a subscribe/unsubscribe key. */
export function categoryOf(key: EventKey): EventCategory {
    return typeof key === "string" ? key : key.id;
}
