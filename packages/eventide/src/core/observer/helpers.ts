import type { EventEnvelope } from "../event/types";
import { ObserverUnit } from "./observer";
import type { ObserverConfig } from "./types";

/**
 * Creates an {@link ObserverUnit} from callbacks.
 *
 * Type the callback from a definition with `createObserver<EventOf<typeof Damage>>({ ... })`.
 *
 * @throws If `config.onNotify` is not a function.
 */
export function createObserver<TEvent = EventEnvelope>(config: ObserverConfig<TEvent>): ObserverUnit<TEvent> {
    if (typeof config.onNotify !== "function") {
        throw new Error("createObserver: onNotify is required");
    }
    return new ObserverUnit(config);
}
