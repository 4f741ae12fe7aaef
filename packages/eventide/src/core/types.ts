/**
 * Diagnostics channel the dispatcher writes to.
 *
 * `code` is a short, stable identifier (`duplicate-subscription`, `detach-missing`, ...)
 * so handlers can filter without parsing `message`.
 */
export interface LoggerContext {
    trace(code: string, message: string, details?: Record<string, unknown>): void;
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}
