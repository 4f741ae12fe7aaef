// ── Config ──────────────────────────────────────────────────────────
export { defineDispatcher } from "./config/define-dispatcher";
export type {
    ConfigEnv,
    DefineDispatcherInput,
    DispatcherConfig,
    FailureHandler,
    FailurePolicy,
    ReentrancyPolicy,
} from "./config/types";
// ── Dispatcher ──────────────────────────────────────────────────────
export { getDefaultDispatcher, publish, resetDefaultDispatcher, subscribe, unsubscribe } from "./core/dispatcher/default";
export { Dispatcher } from "./core/dispatcher/dispatcher";
export { createDispatcher } from "./core/dispatcher/helpers";
export { ObserverScope } from "./core/dispatcher/scope";
// ── Errors ──────────────────────────────────────────────────────────
export {
    DeliveryError,
    EventideError,
    IllegalTransitionError,
    InvalidConfigError,
    InvalidObserverError,
    ScopeDisposedError,
    StaleObserverError,
} from "./core/errors";
export type { EventideErrorCode, ObserverFailure } from "./core/errors";
// ── Events ──────────────────────────────────────────────────────────
export { categoryOf, createEvent, envelope } from "./core/event/helpers";
export type { CreatedEvent, DefaultedEvent, EventCategory, EventEnvelope, EventKey, EventOf, EventPayload } from "./core/event/types";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export type { ConsoleHandlerOptions } from "./core/logger/console-handler";
export { Logger, silentLogger } from "./core/logger/logger";
export type { LogEntry, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
// ── Observer ────────────────────────────────────────────────────────
export { ObserverStatus } from "./core/observer/enums";
export { createObserver } from "./core/observer/helpers";
export { ObserverUnit } from "./core/observer/observer";
export type { Observer, ObserverConfig } from "./core/observer/types";
// ── Registry ────────────────────────────────────────────────────────
export { DetachOutcome, RegistryState } from "./core/registry/enums";
export { SubscriberRegistry } from "./core/registry/registry";
// ── State machine ───────────────────────────────────────────────────
export { StateMachine } from "./core/state-machine/state-machine";
export type { StateMachineConfig, TransitionListener } from "./core/state-machine/types";
