import type { EventCategory } from "../event/types";
import type { Observer } from "../observer/types";
import { StateMachine } from "../state-machine/state-machine";
import { DetachOutcome, RegistryState } from "./enums";
import type { ResolvedSubscriber, Subscriber } from "./types";

const TRANSITIONS: Record<RegistryState, RegistryState[]> = {
    [RegistryState.UNINITIALIZED]: [RegistryState.ACTIVE],
    [RegistryState.ACTIVE]: [RegistryState.ACTIVE, RegistryState.UNINITIALIZED],
};

/** Looks through a weak entry: the observer if it is still usable, or why it is not. */
export function resolveSubscriber(entry: Subscriber): ResolvedSubscriber {
    const observer = entry.deref();
    if (!observer) return { observer: null, stale: "collected" };
    if (observer.isAlive && !observer.isAlive()) return { observer: null, stale: "destroyed" };
    return { observer, stale: null };
}

/**
 * Category → ordered subscriber list.
 *
 * The table is allocated on the first attach and released as soon as the last
 * category empties, so an idle registry holds nothing. Only attach/detach/sweep
 * move the state machine; reads never do.
 *
 * When `onCollected` is given, the runtime reports each subscribed observer it
 * garbage-collects, so the owner can sweep the dead entry outside of any fan-out.
 */
export class SubscriberRegistry {
    public readonly state: StateMachine<RegistryState>;
    private table: Map<EventCategory, Subscriber[]> | null = null;
    private readonly finalizer: FinalizationRegistry<EventCategory> | null;

    constructor(name = "registry", onCollected?: (category: EventCategory) => void) {
        this.state = new StateMachine<RegistryState>({
            transitions: TRANSITIONS,
            initial: RegistryState.UNINITIALIZED,
            name,
        });
        this.finalizer = onCollected ? new FinalizationRegistry(onCollected) : null;
    }

    get isInitialized(): boolean {
        return this.table !== null;
    }

    /** Appends `observer` to `category`. Returns `false` if it was already there. */
    attach(category: EventCategory, observer: Observer): boolean {
        if (!this.table) {
            this.table = new Map();
        }
        this.state.transition(RegistryState.ACTIVE);

        let list = this.table.get(category);
        if (!list) {
            list = [];
            this.table.set(category, list);
        }
        if (list.some((entry) => entry.deref() === observer)) return false;

        const entry = new WeakRef(observer);
        list.push(entry);
        this.finalizer?.register(observer, category, entry);
        return true;
    }

    detach(category: EventCategory, observer: Observer): DetachOutcome {
        if (!this.table) return DetachOutcome.UNINITIALIZED;

        const list = this.table.get(category);
        const index = list ? list.findIndex((entry) => entry.deref() === observer) : -1;
        if (!list || index === -1) return DetachOutcome.MISSING;

        const [entry] = list.splice(index, 1);
        if (entry) this.finalizer?.unregister(entry);
        this.compact(category, list);
        return DetachOutcome.REMOVED;
    }

    /** Removes `observer` from every category. Returns how many entries went. */
    detachAll(observer: Observer): number {
        return this.removeWhere((entry) => entry.deref() === observer);
    }

    /** Drops entries whose observer was collected or reports itself destroyed. */
    sweep(): number {
        return this.removeWhere((entry) => resolveSubscriber(entry).stale !== null);
    }

    /** Copy of the category's list, safe to iterate while the registry changes. */
    snapshot(category: EventCategory): Subscriber[] {
        return this.table?.get(category)?.slice() ?? [];
    }

    /** The live list itself; callers must not mutate the registry while iterating it. */
    view(category: EventCategory): readonly Subscriber[] {
        return this.table?.get(category) ?? [];
    }

    has(category: EventCategory, observer: Observer): boolean {
        return this.view(category).some((entry) => entry.deref() === observer);
    }

    size(category: EventCategory): number {
        return this.view(category).length;
    }

    categories(): EventCategory[] {
        return this.table ? [...this.table.keys()] : [];
    }

    private removeWhere(predicate: (entry: Subscriber) => boolean): number {
        if (!this.table) return 0;
        let removed = 0;
        for (const [category, list] of [...this.table]) {
            const kept: Subscriber[] = [];
            for (const entry of list) {
                if (!predicate(entry)) {
                    kept.push(entry);
                } else {
                    this.finalizer?.unregister(entry);
                }
            }
            if (kept.length === list.length) continue;
            removed += list.length - kept.length;
            list.splice(0, list.length, ...kept);
            this.compact(category, list);
        }
        return removed;
    }

    /** Drops an emptied category, then the whole table once it has no categories left. */
    private compact(category: EventCategory, list: Subscriber[]): void {
        if (!this.table) return;
        if (list.length === 0) {
            this.table.delete(category);
        }
        if (this.table.size === 0) {
            this.table = null;
            this.state.transition(RegistryState.UNINITIALIZED);
        }
    }
}
