import { defineDispatcher } from "../../config/define-dispatcher";
import type { DefineDispatcherInput } from "../../config/types";
import { Dispatcher } from "./dispatcher";

/**
 * Creates a {@link Dispatcher} with its own registry.
 *
 * @param input - Options; anything left out comes from the environment, then defaults.
 * @throws {InvalidConfigError} If `input` fails validation.
 */
export function createDispatcher(input: DefineDispatcherInput = {}): Dispatcher {
    return new Dispatcher(defineDispatcher(input));
}
