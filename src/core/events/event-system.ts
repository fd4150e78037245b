import { describeError } from "../errors/errors";
import { Logger } from "../logger/logger";

/* ---------- Types ---------- */
type Callback<Props> = (props: Props) => void;

type Listeners<Events> = {
    [K in keyof Events]: Set<Callback<Events[K]>>;
};

/* ---------- Interfaces ---------- */
interface EventSystemProps {
    /**
     * @description
     * Where listener failures are reported.
     */
    logger?: Logger;
}

/**
 * @description
 * A callback-based event handling system designed to simplify
 * event-driven programming.
 *
 * A throwing listener is logged and skipped; the remaining listeners
 * still run and the emitter never sees the exception.
 *
 * @example
 * ```ts
 * type SessionEvents = { assetAssigned: { owner: bigint } };
 * const events = new EventSystem<SessionEvents>();
 * events.on("assetAssigned", ({ owner }) => render(owner));
 * ```
 */
export class EventSystem<Events extends { [K in keyof Events]: unknown }> {
    /**
     * @private
     * @description
     * The map of registered events and their callbacks.
    */
    private callbacks: Partial<Listeners<Events>> = {};

    private logger: Logger;

    constructor({ logger }: EventSystemProps = {}) {
        this.logger = logger ?? new Logger("EventSystem");
    }

    private listeners<Name extends keyof Events>(name: Name): Set<Callback<Events[Name]>> {
        let set = this.callbacks[name];
        if (!set) {
            set = new Set();
            this.callbacks[name] = set;
        }
        return set;
    }

    /**
     * @description
     * Registers a callback for an event.
     *
     * @param name Event name
     * @param callback Callback to run when the event is emitted
     * @returns Unsubscribe function
     */
    on<Name extends keyof Events>(name: Name, callback: Callback<Events[Name]>): () => void {
        this.listeners(name).add(callback);
        return () => this.off(name, callback);
    }

    /**
     * @description
     * Registers a callback for an event that runs only once.
     */
    once<Name extends keyof Events>(name: Name, callback: Callback<Events[Name]>): () => void {
        const wrapper: Callback<Events[Name]> = (props) => {
            this.off(name, wrapper);
            callback(props);
        };

        return this.on(name, wrapper);
    }

    /**
     * @description
     * Emits an event, running all registered callbacks.
     */
    emit<Name extends keyof Events>(name: Name, data: Events[Name]): void {
        const callbacks = this.callbacks[name];
        if (!callbacks) return;

        for (const callback of [...callbacks]) {
            try {
                callback(data);
            } catch (error) {
                this.logger.error(`Error in "${String(name)}" listener: ${describeError(error)}`);
            }
        }
    }

    /**
     * @description
     * Removes a callback from an event.
     */
    off<Name extends keyof Events>(name: Name, callback: Callback<Events[Name]>): void {
        this.callbacks[name]?.delete(callback);
    }

    /**
     * @description
     * Removes all callbacks, or only those of one event.
     */
    clear(name?: keyof Events): void {
        if (name !== undefined) {
            this.callbacks[name]?.clear();
            return;
        }

        this.callbacks = {};
    }

    /**
     * @description
     * Number of callbacks registered for an event.
     */
    listenerCount(name: keyof Events): number {
        return this.callbacks[name]?.size ?? 0;
    }
}
