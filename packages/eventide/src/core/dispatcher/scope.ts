import { ScopeDisposedError } from "../errors";
import { categoryOf } from "../event/helpers";
import type { CreatedEvent, EventCategory, EventEnvelope, EventKey } from "../event/types";
import type { Observer } from "../observer/types";
import type { Dispatcher } from "./dispatcher";

type ScopedSubscription = {
    category: EventCategory;
    observer: Observer;
};

/**
 * Subscriptions made on behalf of one owner.
 *
 * - `subscribe(...)` -> forwards to the dispatcher and records the pair, unless it
 *   was already subscribed outside the scope
 * - `unsubscribe(...)` -> forwards and forgets the pair
 * - `dispose()` -> unsubscribes every recorded pair, then refuses new subscriptions
 *
 * `publish` is forwarded untouched; scoping only concerns what the owner listens to.
 */
export class ObserverScope {
    private readonly owned: ScopedSubscription[] = [];
    private disposed = false;

    constructor(
        private readonly dispatcher: Dispatcher,
        public readonly ownerId: string,
    ) {}

    get isDisposed(): boolean {
        return this.disposed;
    }

    /** Number of subscriptions this scope currently holds. */
    get size(): number {
        return this.owned.length;
    }

    subscribe<T>(event: CreatedEvent<T>, observer: Observer<EventEnvelope<T>>): void;
    subscribe(category: EventCategory, observer: Observer): void;
    subscribe(key: EventKey, observer: Observer): void {
        if (this.disposed) throw new ScopeDisposedError(this.ownerId);

        const category = categoryOf(key);
        // A pair subscribed outside the scope stays with whoever subscribed it.
        const foreign = this.dispatcher.isSubscribed(category, observer) && !this.owns(category, observer);
        this.dispatcher.subscribe(category, observer);
        if (!foreign && !this.owns(category, observer)) {
            this.owned.push({ category, observer });
        }
    }

    unsubscribe<T>(event: CreatedEvent<T>, observer: Observer<EventEnvelope<T>>): void;
    unsubscribe(category: EventCategory, observer: Observer): void;
    unsubscribe(key: EventKey, observer: Observer): void {
        const category = categoryOf(key);
        this.dispatcher.unsubscribe(category, observer);
        const index = this.indexOf(category, observer);
        if (index !== -1) this.owned.splice(index, 1);
    }

    publish<T>(event: EventEnvelope<T>): void {
        this.dispatcher.publish(event);
    }

    /** Unsubscribes everything this scope subscribed. Idempotent. */
    dispose(): void {
        if (this.disposed) return;
        this.disposed = true;
        for (const { category, observer } of this.owned.splice(0)) {
            this.dispatcher.unsubscribe(category, observer);
        }
    }

    private owns(category: EventCategory, observer: Observer): boolean {
        return this.indexOf(category, observer) !== -1;
    }

    private indexOf(category: EventCategory, observer: Observer): number {
        return this.owned.findIndex((sub) => sub.category === category && sub.observer === observer);
    }
}
