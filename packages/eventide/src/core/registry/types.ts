import type { Observer } from "../observer/types";

/** Non-owning registry entry. The registry never keeps an observer alive. */
export type Subscriber = WeakRef<Observer>;

export type StaleReason = "collected" | "destroyed";

/** Outcome of resolving one entry at delivery time. */
export type ResolvedSubscriber = { observer: Observer; stale: null } | { observer: null; stale: StaleReason };
