import { isUndefined, omitBy } from "es-toolkit";
import { InvalidConfigError } from "../core/errors";
import { createConsoleHandler } from "../core/logger/console-handler";
import { Logger, silentLogger } from "../core/logger/logger";
import type { LoggerContext } from "../core/types";
import type {
    ConfigEnv,
    DefineDispatcherInput,
    DispatcherConfig,
    FailurePolicy,
    ReentrancyPolicy,
} from "./types";

const FAILURE_POLICIES: readonly FailurePolicy[] = ["propagate", "isolate", "aggregate"];
const REENTRANCY_POLICIES: readonly ReentrancyPolicy[] = ["snapshot", "defer"];

const TRUTHY = new Set(["1", "true", "yes", "on"]);
const FALSY = new Set(["0", "false", "no", "off"]);

function readFlag(env: ConfigEnv, key: "EVENTIDE_DIAGNOSTICS" | "EVENTIDE_TRACE"): boolean | undefined {
    const raw = env[key]?.toLowerCase().trim();
    if (raw === undefined || raw === "") return undefined;
    if (TRUTHY.has(raw)) return true;
    if (FALSY.has(raw)) return false;
    throw new InvalidConfigError(`${key} must be one of 1/true/yes/on or 0/false/no/off, got "${env[key]}"`);
}

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
    return allowed.some((candidate) => candidate === value);
}

function createDefaultLogger(trace: boolean): LoggerContext {
    const logger = new Logger();
    logger.addHandler(createConsoleHandler({ minLevel: trace ? "trace" : "debug" }));
    return logger;
}

/**
 * Validates dispatcher options and fills the rest from the environment.
 *
 * Precedence: explicit input, then `EVENTIDE_*` variables, then defaults.
 * Diagnostics default on everywhere except `NODE_ENV=production`.
 *
 * @throws {InvalidConfigError} On an unknown policy, an empty name, or an unparsable env flag.
 */
export function defineDispatcher(input: DefineDispatcherInput = {}, env: ConfigEnv = process.env): DispatcherConfig {
    const given = omitBy(input, isUndefined);

    if (given.failurePolicy !== undefined && !isOneOf(FAILURE_POLICIES, given.failurePolicy)) {
        throw new InvalidConfigError(
            `unknown failurePolicy "${given.failurePolicy}" (expected ${FAILURE_POLICIES.join(", ")})`,
        );
    }
    if (given.reentrancy !== undefined && !isOneOf(REENTRANCY_POLICIES, given.reentrancy)) {
        throw new InvalidConfigError(
            `unknown reentrancy "${given.reentrancy}" (expected ${REENTRANCY_POLICIES.join(", ")})`,
        );
    }
    if (given.name !== undefined && given.name.trim().length === 0) {
        throw new InvalidConfigError("name must not be empty");
    }

    const diagnostics = given.diagnostics ?? readFlag(env, "EVENTIDE_DIAGNOSTICS") ?? env.NODE_ENV !== "production";
    const traceUnrouted = given.traceUnrouted ?? readFlag(env, "EVENTIDE_TRACE") ?? false;

    let logger: LoggerContext = silentLogger;
    if (diagnostics) {
        logger = given.logger ?? createDefaultLogger(traceUnrouted);
    }

    return Object.freeze({
        name: given.name ?? "dispatcher",
        failurePolicy: given.failurePolicy ?? "isolate",
        reentrancy: given.reentrancy ?? "snapshot",
        traceUnrouted,
        diagnostics,
        logger,
        onError: given.onError,
    });
}
