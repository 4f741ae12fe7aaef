import type { EventEnvelope } from "../event/types";
import { StateMachine } from "../state-machine/state-machine";
import { ObserverStatus } from "./enums";
import type { Observer, ObserverConfig } from "./types";

const TRANSITIONS: Record<ObserverStatus, ObserverStatus[]> = {
    [ObserverStatus.CREATED]: [ObserverStatus.ACTIVE, ObserverStatus.DESTROYED],
    [ObserverStatus.ACTIVE]: [ObserverStatus.DESTROYED],
    [ObserverStatus.DESTROYED]: [],
};

/**
 * Ready-made observer with a tracked lifecycle.
 *
 * Lifecycle: Created → Active (`onInit`) → Destroyed (`onDestroy`).
 * A Created unit may be destroyed without ever being initialized; `onDestroy`
 * then skips the user hook. Once Destroyed, `isAlive()` is false, so a dispatcher
 * that still holds it reports a stale observer instead of delivering.
 */
export class ObserverUnit<TEvent = EventEnvelope> implements Observer<TEvent> {
    public readonly state: StateMachine<ObserverStatus>;

    constructor(private readonly config: ObserverConfig<TEvent>) {
        this.state = new StateMachine<ObserverStatus>({
            transitions: TRANSITIONS,
            initial: ObserverStatus.CREATED,
            name: `observer "${this.name}"`,
        });
    }

    get name(): string {
        return this.config.name ?? "anonymous";
    }

    get status(): ObserverStatus {
        return this.state.current;
    }

    onInit(): void {
        this.state.transition(ObserverStatus.ACTIVE);
        this.config.onInit?.();
    }

    onDestroy(): void {
        const wasActive = this.state.is(ObserverStatus.ACTIVE);
        this.state.transition(ObserverStatus.DESTROYED);
        if (wasActive) this.config.onDestroy?.();
    }

    onNotify(event: TEvent): void {
        this.config.onNotify(event);
    }

    isAlive(): boolean {
        return !this.state.is(ObserverStatus.DESTROYED);
    }
}
