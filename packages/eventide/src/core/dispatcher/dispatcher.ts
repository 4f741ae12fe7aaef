import { defineDispatcher } from "../../config/define-dispatcher";
import type { DispatcherConfig } from "../../config/types";
import { DeliveryError, InvalidObserverError, type ObserverFailure, StaleObserverError } from "../errors";
import { categoryOf } from "../event/helpers";
import type { CreatedEvent, EventCategory, EventEnvelope, EventKey } from "../event/types";
import type { Observer } from "../observer/types";
import { DetachOutcome, type RegistryState } from "../registry/enums";
import { resolveSubscriber, SubscriberRegistry } from "../registry/registry";
import type { Subscriber } from "../registry/types";
import type { TransitionListener } from "../state-machine/types";
import type { LoggerContext } from "../types";
import { ObserverScope } from "./scope";

/**
 * Synchronous, category-keyed publish/subscribe.
 *
 * Owns one {@link SubscriberRegistry}. Soft conditions (duplicate subscribe,
 * unknown handle on unsubscribe, publish without subscribers) go to the
 * diagnostics logger and never throw.
 */
export class Dispatcher {
    private readonly registry: SubscriberRegistry;
    private readonly logger: LoggerContext;
    private readonly pending: Array<() => void> = [];
    private depth = 0;

    constructor(public readonly config: DispatcherConfig = defineDispatcher()) {
        // Finalization callbacks run as their own jobs, never inside a synchronous fan-out.
        this.registry = new SubscriberRegistry(`${config.name} registry`, () => this.sweep());
        this.logger = config.logger;
    }

    get state(): RegistryState {
        return this.registry.state.current;
    }

    /** True while at least one publish is delivering. */
    get isDispatching(): boolean {
        return this.depth > 0;
    }

    onStateChange(listener: TransitionListener<RegistryState>): () => void {
        return this.registry.state.onTransition(listener);
    }

    subscribe<T>(event: CreatedEvent<T>, observer: Observer<EventEnvelope<T>>): void;
    subscribe(category: EventCategory, observer: Observer): void;
    subscribe(key: EventKey, observer: Observer): void {
        const category = categoryOf(key);
        if (!observer || typeof observer.onNotify !== "function") {
            throw new InvalidObserverError(category);
        }
        this.mutate("subscribe", category, () => {
            if (!this.registry.attach(category, observer)) {
                this.logger.warn(
                    "duplicate-subscription",
                    `Observer is already subscribed to "${category}"; an unsubscribe was probably missed`,
                    { category },
                );
            }
        });
    }

    unsubscribe<T>(event: CreatedEvent<T>, observer: Observer<EventEnvelope<T>>): void;
    unsubscribe(category: EventCategory, observer: Observer): void;
    unsubscribe(key: EventKey, observer: Observer): void {
        const category = categoryOf(key);
        this.mutate("unsubscribe", category, () => {
            const outcome = this.registry.detach(category, observer);
            if (outcome === DetachOutcome.UNINITIALIZED) {
                this.logger.warn(
                    "detach-uninitialized",
                    `Nothing to detach from: no subscriptions exist (category "${category}")`,
                    { category },
                );
            } else if (outcome === DetachOutcome.MISSING) {
                this.logger.warn(
                    "detach-missing",
                    `Observer is not subscribed to "${category}"; if it was attached elsewhere it may leak`,
                    { category },
                );
            }
        });
    }

    /**
     * Detaches `observer` from every category.
     *
     * @returns Removed subscriptions; 0 when the call was deferred until fan-out ends.
     */
    unsubscribeAll(observer: Observer): number {
        let removed = 0;
        this.mutate("unsubscribeAll", undefined, () => {
            removed = this.registry.detachAll(observer);
        });
        return removed;
    }

    /**
     * Drops entries whose observer was garbage-collected or destroyed without unsubscribing.
     *
     * @returns Removed entries; 0 when the call was deferred until fan-out ends.
     */
    sweep(): number {
        let removed = 0;
        this.mutate("sweep", undefined, () => {
            removed = this.registry.sweep();
            if (removed > 0) {
                this.logger.warn("stale-swept", `Removed ${removed} stale subscriber(s)`, { removed });
            }
        });
        return removed;
    }

    /** Delivers `event` to every subscriber of `event.category`, in registration order. */
    publish<T>(event: EventEnvelope<T>): void {
        const { category } = event;
        if (!this.registry.isInitialized) {
            if (this.config.traceUnrouted) {
                this.logger.trace("publish-uninitialized", `No subscriptions exist; "${category}" dropped`, {
                    category,
                });
            }
            return;
        }

        // Under "defer" no mutation can land mid-fan-out, so the live list is stable.
        const entries: readonly Subscriber[] =
            this.config.reentrancy === "snapshot" ? this.registry.snapshot(category) : this.registry.view(category);
        if (entries.length === 0) {
            if (this.config.traceUnrouted) {
                this.logger.trace("publish-unrouted", `No subscribers for "${category}"`, { category });
            }
            return;
        }

        const failures: ObserverFailure[] = [];
        this.depth++;
        try {
            for (const [index, entry] of entries.entries()) {
                const resolved = resolveSubscriber(entry);
                if (resolved.observer === null) {
                    this.fail(failures, { category, index, error: new StaleObserverError(category, resolved.stale) });
                    continue;
                }
                try {
                    resolved.observer.onNotify(event);
                } catch (error) {
                    this.fail(failures, { category, index, error });
                }
            }
        } finally {
            this.depth--;
            if (this.depth === 0) this.flush();
        }

        if (failures.length > 0) {
            throw new DeliveryError(category, failures);
        }
    }

    isSubscribed(key: EventKey, observer: Observer): boolean {
        return this.registry.has(categoryOf(key), observer);
    }

    subscriberCount(key: EventKey): number {
        return this.registry.size(categoryOf(key));
    }

    categories(): EventCategory[] {
        return this.registry.categories();
    }

    /** Owner-scoped view that remembers what it subscribed, for one-call teardown. */
    scope(ownerId: string): ObserverScope {
        return new ObserverScope(this, ownerId);
    }

    private mutate(operation: string, category: EventCategory | undefined, apply: () => void): void {
        if (this.config.reentrancy === "defer" && this.depth > 0) {
            this.logger.debug("mutation-deferred", `${operation} queued until fan-out completes`, {
                operation,
                category,
            });
            this.pending.push(apply);
            return;
        }
        apply();
    }

    private flush(): void {
        while (this.pending.length > 0) {
            const batch = this.pending.splice(0);
            for (const apply of batch) apply();
        }
    }

    /** Applies the failure policy to one failed delivery. Collects only under "aggregate". */
    private fail(failures: ObserverFailure[], failure: ObserverFailure): void {
        if (this.config.failurePolicy === "propagate") throw failure.error;

        const { category, index, error } = failure;
        if (error instanceof StaleObserverError) {
            this.logger.error("stale-observer", error.message, { category, index, reason: error.reason });
        } else {
            this.logger.error("observer-failure", `Observer #${index} of "${category}" threw`, {
                category,
                index,
                error,
            });
        }
        this.notifyErrorHook(failure);
        if (this.config.failurePolicy === "aggregate") failures.push(failure);
    }

    /** A throwing `onError` is logged and never cuts the fan-out short. */
    private notifyErrorHook(failure: ObserverFailure): void {
        const { onError } = this.config;
        if (!onError) return;
        try {
            onError(failure);
        } catch (error) {
            this.logger.error("error-hook-failure", `onError threw while handling a failure of "${failure.category}"`, {
                category: failure.category,
                index: failure.index,
                error,
            });
        }
    }
}
