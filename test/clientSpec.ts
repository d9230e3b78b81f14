import { Client, FixedBackoff, GatewayState, GatewayStateChangeEvent, InvalidArgument, MemoryTracer, Trace } from "@src";
import { MockTransportFactory, openAndHello, readyData, sendReady, waitForCondition } from "./gateway/test-helpers";

function flushHandlers(): Promise<void> {
    return new Promise<void>(resolve => setImmediate(resolve));
}

describe("Client", () => {
    let factory: MockTransportFactory;
    let client: Client;

    beforeEach(() => {
        Trace.configure(new MemoryTracer());
        factory = new MockTransportFactory();
        client = new Client({
            token: "test-token",
            intents: 513,
            apiBaseUrl: "http://localhost:8080/api",
            transportFactory: factory.create
        });
    });

    afterEach(() => {
        client.stop();
        Trace.off();
    });

    it("should require a token", () => {
        expect(() => new Client({ token: "  " })).toThrow(InvalidArgument);
        expect(() => new Client({ token: "" })).toThrow("Token cannot be empty");
    });

    it("should start disconnected", () => {
        expect(client.state).toBe(GatewayState.Disconnected);
        expect(client.ready).toBe(false);
        expect(client.user).toBeNull();
    });

    it("should deliver READY to handlers and cache the user", async () => {
        const onReady = jest.fn();
        client.on("ready", onReady);

        client.run();
        openAndHello(factory.latest);
        sendReady(factory.latest);
        await flushHandlers();

        expect(onReady).toHaveBeenCalledWith(readyData);
        expect(client.ready).toBe(true);
        expect(client.state).toBe(GatewayState.Connected);
        expect(client.user).toEqual({ id: "100", username: "test-bot" });
        expect([...client.guilds.keys()]).toEqual(["200"]);
    });

    it("should keep channels from guild events", () => {
        client.run();
        openAndHello(factory.latest);
        sendReady(factory.latest);

        factory.latest.simulateEnvelope({
            op: 0,
            s: 2,
            t: "GUILD_CREATE",
            d: { id: "200", name: "Test Guild", channels: [{ id: "300", name: "general" }] }
        });

        expect(client.channels.get("300")).toEqual({ id: "300", name: "general" });
        expect(client.guilds.get("200")).toMatchObject({ name: "Test Guild" });
    });

    it("should report state changes", () => {
        const changes: GatewayStateChangeEvent[] = [];
        client.onStateChange(event => { changes.push(event); });

        client.run();
        factory.latest.simulateOpen();

        expect(changes).toEqual([
            { previousState: GatewayState.Disconnected, currentState: GatewayState.Connecting },
            { previousState: GatewayState.Connecting, currentState: GatewayState.AwaitingHello }
        ]);
    });

    it("should keep reconnecting when a state change handler throws", async () => {
        const resilient = new Client({
            token: "test-token",
            transportFactory: factory.create,
            reconnectBackoff: new FixedBackoff(10)
        });
        const later = jest.fn();
        resilient.onStateChange(event => {
            if (event.currentState === GatewayState.Disconnected) {
                throw new Error("handler failed");
            }
        });
        resilient.onStateChange(later);

        try {
            resilient.run();
            factory.latest.simulateClose(1006);
            await waitForCondition(() => factory.sockets.length === 2);
        }
        finally {
            resilient.stop();
        }

        expect(later).toHaveBeenCalledWith({
            previousState: GatewayState.Connecting,
            currentState: GatewayState.Disconnected
        });
    });

    it("should replace the gateway when run again", async () => {
        const onMessage = jest.fn();
        client.on("message_create", onMessage);

        client.run();
        const first = factory.latest;
        client.run();
        const second = factory.latest;

        expect(first.closedWith).toEqual({ code: 1000, reason: "Client stopped" });
        expect(factory.sockets).toHaveLength(2);

        openAndHello(second);
        second.simulateEnvelope({ op: 0, s: 1, t: "MESSAGE_CREATE", d: { content: "hi" } });
        await flushHandlers();

        expect(onMessage).toHaveBeenCalledWith({ content: "hi" });
    });

    it("should allow stop before run", () => {
        expect(() => client.stop()).not.toThrow();
        expect(client.state).toBe(GatewayState.Disconnected);
    });

    it("should stop the connection", () => {
        client.run();
        openAndHello(factory.latest);
        sendReady(factory.latest);

        client.stop();
        client.stop();

        expect(client.ready).toBe(false);
        expect(client.state).toBe(GatewayState.Disconnected);
        expect(factory.latest.closedWith).toEqual({ code: 1000, reason: "Client stopped" });
    });

    it("should not send presence before running", () => {
        expect(client.updatePresence({ status: "dnd" })).toBe(false);
    });

    it("should send presence once connected", () => {
        client.run();
        openAndHello(factory.latest);

        expect(client.updatePresence({ status: "dnd" })).toBe(true);
        expect(factory.latest.sentWithOpcode(3)).toEqual([{
            op: 3,
            d: { since: null, activities: [], status: "dnd", afk: false }
        }]);
    });

    it("should emit to registered handlers and stop after off", async () => {
        const handler = jest.fn();
        client.on("custom_event", handler);

        client.emit("CUSTOM_EVENT", 1);
        await flushHandlers();
        client.off("custom_event", handler);
        client.emit("custom_event", 2);
        await flushHandlers();

        expect(handler.mock.calls).toEqual([[1]]);
    });

    it("should point the REST caller at the configured API", () => {
        expect(client.rest.buildUrl("/gateway/bot")).toBe("http://localhost:8080/api/gateway/bot");
    });
});
