import { defineDispatcher } from "../../config/define-dispatcher";
import { categoryOf } from "../event/helpers";
import type { CreatedEvent, EventCategory, EventEnvelope, EventKey } from "../event/types";
import type { Observer } from "../observer/types";
import { Dispatcher } from "./dispatcher";

let instance: Dispatcher | null = null;

/**
 * Process-wide dispatcher behind the free `subscribe` / `unsubscribe` / `publish` functions.
 *
 * Built on first use from the environment (`NODE_ENV`, `EVENTIDE_*`). Its registry
 * follows the usual lazy lifecycle: allocated on the first subscribe anywhere in the
 * process, released when the last subscription goes.
 */
export function getDefaultDispatcher(): Dispatcher {
    if (!instance) {
        instance = new Dispatcher(defineDispatcher({ name: "default" }));
    }
    return instance;
}

/** Forgets the process-wide dispatcher; the next call builds a fresh one. */
export function resetDefaultDispatcher(): void {
    instance = null;
}

export function subscribe<T>(event: CreatedEvent<T>, observer: Observer<EventEnvelope<T>>): void;
export function subscribe(category: EventCategory, observer: Observer): void;
export function subscribe(key: EventKey, observer: Observer): void {
    getDefaultDispatcher().subscribe(categoryOf(key), observer);
}

export function unsubscribe<T>(event: CreatedEvent<T>, observer: Observer<EventEnvelope<T>>): void;
export function unsubscribe(category: EventCategory, observer: Observer): void;
export function unsubscribe(key: EventKey, observer: Observer): void {
    getDefaultDispatcher().unsubscribe(categoryOf(key), observer);
}

export function publish<T>(event: EventEnvelope<T>): void {
    getDefaultDispatcher().publish(event);
}
