import { Channel, Guild, Snowflake, StateCache, User } from './cache/state-cache';
import { InvalidArgument } from './errors';
import { EventDispatcher, EventHandler } from './events/event-dispatcher';
import { BackoffStrategy } from './gateway/backoff';
import { Gateway, GatewayState, GatewayStateChangeEvent } from './gateway/gateway';
import { PresenceOptions } from './gateway/messages';
import { TransportFactory } from './gateway/transport';
import { RestClient, RestClientConfig } from './http/rest-client';
import { Trace } from './util/trace';

export type ClientConfig = {
    token: string,
    intents?: number,
    gatewayUrl?: string,
    apiBaseUrl?: string,
    clientName?: string,
    largeThreshold?: number,
    requestTimeoutMs?: number,
    transportFactory?: TransportFactory,
    reconnectBackoff?: BackoffStrategy,
    sessionBackoff?: BackoffStrategy,
    fetch?: RestClientConfig['fetch']
};

/**
 * Entry point for a bot: register handlers, then `run` to connect.
 *
 * Handlers and cached state belong to the client and survive reconnects;
 * each call to `run` starts a fresh gateway.
 */
export class Client {
    readonly events = new EventDispatcher();
    readonly rest: RestClient;

    private readonly cache = new StateCache();
    private gateway: Gateway | null = null;
    private readonly stateHandlers: ((event: GatewayStateChangeEvent) => void)[] = [];

    constructor(private readonly config: ClientConfig) {
        if (typeof config.token !== 'string' || config.token.trim().length === 0) {
            throw new InvalidArgument('Token cannot be empty');
        }
        this.rest = new RestClient(config.token, {
            baseUrl: config.apiBaseUrl,
            requestTimeoutMs: config.requestTimeoutMs,
            fetch: config.fetch
        });
    }

    /**
     * Connect to the gateway. Returns once the connection is being opened;
     * listen for `ready` to know when the session is established.
     */
    run(): void {
        if (this.gateway) {
            this.gateway.stop();
        }
        this.gateway = new Gateway(
            {
                token: this.config.token,
                intents: this.config.intents,
                url: this.config.gatewayUrl,
                clientName: this.config.clientName,
                largeThreshold: this.config.largeThreshold,
                transportFactory: this.config.transportFactory,
                reconnectBackoff: this.config.reconnectBackoff,
                sessionBackoff: this.config.sessionBackoff
            },
            this.events,
            this.cache,
            {
                onStateChange: (event) => this.notifyStateChange(event)
            }
        );
        this.gateway.start();
    }

    stop(): void {
        this.gateway?.stop();
    }

    /**
     * Register a handler for a gateway event, such as `message_create`.
     */
    on(eventName: string, handler: EventHandler): void {
        this.events.register(eventName, handler);
    }

    off(eventName: string, handler?: EventHandler): void {
        this.events.unregister(eventName, handler);
    }

    emit(eventName: string, payload: unknown): void {
        this.events.fire(eventName, payload);
    }

    onStateChange(handler: (event: GatewayStateChangeEvent) => void): void {
        this.stateHandlers.push(handler);
    }

    private notifyStateChange(event: GatewayStateChangeEvent): void {
        for (const handler of this.stateHandlers) {
            try {
                handler(event);
            }
            catch (error) {
                Trace.warn(`Error in state change handler for ${event.currentState}`);
                Trace.error(error);
            }
        }
    }

    updatePresence(options: PresenceOptions = {}): boolean {
        return this.gateway?.updatePresence(options) ?? false;
    }

    get ready(): boolean {
        return this.gateway?.ready ?? false;
    }

    get state(): GatewayState {
        return this.gateway?.getState() ?? GatewayState.Disconnected;
    }

    get user(): User | null {
        return this.cache.user;
    }

    get guilds(): ReadonlyMap<Snowflake, Guild> {
        return this.cache.guilds;
    }

    get channels(): ReadonlyMap<Snowflake, Channel> {
        return this.cache.channels;
    }
}
