/**
 * Contract: ObserverScope -- owner-scoped subscriptions.
 *
 * Sections:
 *   1. Forwarding
 *   2. Bookkeeping
 *   3. dispose()
 */
import { describe, expect, it, vi } from "vitest";
import { ScopeDisposedError } from "../errors";
import { createEvent } from "../event/helpers";
import { RegistryState } from "../registry/enums";
import { createDispatcher } from "./helpers";

const Damage = createEvent<{ amount: number }>("damage");
const Heal = createEvent<{ amount: number }>("heal");

function setup() {
    return createDispatcher({ diagnostics: false });
}

function spy() {
    return { onNotify: vi.fn(), onInit: vi.fn(), onDestroy: vi.fn() };
}

describe("ObserverScope", () => {
    // -- 1. Forwarding --
    describe("Forwarding", () => {
        it("subscribe and publish go through the dispatcher", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            const o1 = spy();
            hud.subscribe(Damage, o1);
            hud.publish(Damage.of({ amount: 2 }));
            expect(o1.onNotify).toHaveBeenCalledWith({ category: "damage", payload: { amount: 2 } });
            expect(dispatcher.isSubscribed(Damage, o1)).toBe(true);
        });

        it("events published elsewhere reach scoped observers", () => {
            const dispatcher = setup();
            const o1 = spy();
            dispatcher.scope("hud").subscribe("damage", o1);
            dispatcher.publish(Damage.of({ amount: 1 }));
            expect(o1.onNotify).toHaveBeenCalledOnce();
        });
    });

    // -- 2. Bookkeeping --
    describe("Bookkeeping", () => {
        it("records each distinct pair once", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            const o1 = spy();
            hud.subscribe(Damage, o1);
            hud.subscribe(Damage, o1);
            hud.subscribe(Heal, o1);
            expect(hud.size).toBe(2);
        });

        it("unsubscribe forgets the pair", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            const o1 = spy();
            hud.subscribe(Damage, o1);
            hud.unsubscribe(Damage, o1);
            expect(hud.size).toBe(0);
            expect(dispatcher.state).toBe(RegistryState.UNINITIALIZED);
        });
    });

    // -- 3. dispose() --
    describe("dispose()", () => {
        it("unsubscribes everything the scope made and nothing else", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            const mine = spy();
            const theirs = spy();
            hud.subscribe(Damage, mine);
            hud.subscribe(Heal, mine);
            dispatcher.subscribe(Damage, theirs);

            hud.dispose();
            expect(hud.isDisposed).toBe(true);
            expect(hud.size).toBe(0);
            expect(dispatcher.isSubscribed(Damage, mine)).toBe(false);
            expect(dispatcher.isSubscribed(Heal, mine)).toBe(false);
            expect(dispatcher.isSubscribed(Damage, theirs)).toBe(true);
        });

        it("leaves a pair subscribed before the scope repeated it", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            const shared = spy();
            dispatcher.subscribe(Damage, shared);
            hud.subscribe(Damage, shared);
            expect(hud.size).toBe(0);

            hud.dispose();
            expect(dispatcher.isSubscribed(Damage, shared)).toBe(true);
            expect(dispatcher.state).toBe(RegistryState.ACTIVE);
        });

        it("returns the registry to uninitialized when the scope held the last subscriptions", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            hud.subscribe(Damage, spy());
            hud.dispose();
            expect(dispatcher.state).toBe(RegistryState.UNINITIALIZED);
        });

        it("is idempotent", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            hud.subscribe(Damage, spy());
            hud.dispose();
            expect(() => hud.dispose()).not.toThrow();
        });

        it("refuses new subscriptions after dispose", () => {
            const dispatcher = setup();
            const hud = dispatcher.scope("hud");
            hud.dispose();
            expect(() => hud.subscribe(Damage, spy())).toThrow(ScopeDisposedError);
            expect(() => hud.subscribe(Damage, spy())).toThrow('Scope "hud" is disposed and cannot subscribe');
        });
    });
});
