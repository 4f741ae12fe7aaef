import { IllegalTransitionError } from "../errors";
import type { StateMachineConfig, TransitionListener } from "./types";

/**
 * Table-driven FSM shared by the registry and observer lifecycles.
 *
 * A self-transition is legal only when the table lists it.
 */
export class StateMachine<TState extends string> {
    private _current: TState;
    private readonly _transitions: Record<TState, readonly TState[]>;
    private readonly _name: string;
    private readonly _listeners: Set<TransitionListener<TState>> = new Set();

    constructor(config: StateMachineConfig<TState>) {
        this._current = config.initial;
        this._transitions = config.transitions;
        this._name = config.name ?? "StateMachine";
    }

    get current(): TState {
        return this._current;
    }

    get name(): string {
        return this._name;
    }

    is(state: TState): boolean {
        return this._current === state;
    }

    transition(target: TState): void {
        if (!this.canTransition(target)) {
            throw new IllegalTransitionError(this._current, target, this._name);
        }
        const from = this._current;
        this._current = target;
        if (from === target) return;
        for (const listener of this._listeners) {
            listener(from, target);
        }
    }

    canTransition(target: TState): boolean {
        return this._transitions[this._current].includes(target);
    }

    onTransition(cb: TransitionListener<TState>): () => void {
        this._listeners.add(cb);
        return () => {
            this._listeners.delete(cb);
        };
    }
}
