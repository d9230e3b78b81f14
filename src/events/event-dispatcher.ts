import { InvalidArgument } from "../errors";
import { Trace } from "../util/trace";

export type EventHandler<T = unknown> = (payload: T) => void | Promise<void>;

/**
 * Maps event names to their handlers.
 *
 * Firing never waits for handlers and never throws: each handler runs on
 * its own microtask, and a handler that throws or rejects is logged without
 * affecting the others. Names are compared lower-cased.
 */
export class EventDispatcher {
    private readonly handlers = new Map<string, EventHandler[]>();

    /**
     * Register a handler for an event.
     *
     * @param eventName Name of the event, in any case
     * @param handler Function to invoke with the event payload
     */
    register(eventName: string, handler?: EventHandler): void {
        if (typeof handler !== "function") {
            throw new InvalidArgument(`A handler function is required to register for "${eventName}"`);
        }
        const name = normalize(eventName);
        const list = this.handlers.get(name);
        if (list) {
            list.push(handler);
        }
        else {
            this.handlers.set(name, [handler]);
        }
    }

    /**
     * Remove one handler, or every handler for the event when none is given.
     */
    unregister(eventName: string, handler?: EventHandler): void {
        const name = normalize(eventName);
        if (!handler) {
            this.handlers.delete(name);
            return;
        }
        const list = this.handlers.get(name);
        if (!list) {
            return;
        }
        const remaining = list.filter(h => h !== handler);
        if (remaining.length > 0) {
            this.handlers.set(name, remaining);
        }
        else {
            this.handlers.delete(name);
        }
    }

    fire(eventName: string, payload: unknown): void {
        const name = normalize(eventName);
        const list = this.handlers.get(name);
        if (!list) {
            return;
        }
        // Snapshot so that handlers registering or removing handlers do not
        // change who receives this firing.
        for (const handler of [...list]) {
            Promise.resolve()
                .then(() => handler(payload))
                .catch(error => {
                    Trace.warn(`Error in event handler for ${name}`);
                    Trace.error(error);
                });
        }
    }

    eventNames(): string[] {
        return [...this.handlers.keys()];
    }

    handlersFor(eventName: string): EventHandler[] {
        return [...(this.handlers.get(normalize(eventName)) ?? [])];
    }

    clear(): void {
        this.handlers.clear();
    }
}

function normalize(eventName: string): string {
    return eventName.toLowerCase();
}
