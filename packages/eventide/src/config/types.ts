import type { ObserverFailure } from "../core/errors";
import type { LoggerContext } from "../core/types";

/**
 * What a failing subscriber does to the rest of a fan-out.
 *
 * - `propagate`: the error leaves `publish` at once; later subscribers are skipped.
 * - `isolate`: each failure is logged and handed to `onError`; delivery continues.
 * - `aggregate`: delivery continues, then one `DeliveryError` lists every failure.
 */
export type FailurePolicy = "propagate" | "isolate" | "aggregate";

/**
 * How subscribe/unsubscribe behave while a publish is iterating.
 *
 * - `snapshot`: fan-out walks a copy taken at its start; mutations land immediately
 *   and show from the next publish on.
 * - `defer`: mutations are queued and applied once the outermost publish returns.
 */
export type ReentrancyPolicy = "snapshot" | "defer";

export type FailureHandler = (failure: ObserverFailure) => void;

export type DefineDispatcherInput = {
    /** Label used in diagnostics and registry FSM errors. */
    name?: string;
    failurePolicy?: FailurePolicy;
    reentrancy?: ReentrancyPolicy;
    /** Log `publish-uninitialized` / `publish-unrouted` at trace level. */
    traceUnrouted?: boolean;
    /** Master switch for the diagnostics channel. Off routes everything to `silentLogger`. */
    diagnostics?: boolean;
    logger?: LoggerContext;
    onError?: FailureHandler;
};

export type DispatcherConfig = {
    readonly name: string;
    readonly failurePolicy: FailurePolicy;
    readonly reentrancy: ReentrancyPolicy;
    readonly traceUnrouted: boolean;
    readonly diagnostics: boolean;
    readonly logger: LoggerContext;
    readonly onError: FailureHandler | undefined;
};

/** Environment variables the config layer reads. */
export type ConfigEnv = {
    NODE_ENV?: string;
    EVENTIDE_DIAGNOSTICS?: string;
    EVENTIDE_TRACE?: string;
};
