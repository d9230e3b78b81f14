/**
 * Gateway
 *
 * Owns the real-time connection to the platform: opens the socket, answers
 * hello with identify or resume, keeps the heartbeat going, records the
 * session and sequence, forwards dispatches, and reconnects whenever the
 * connection is lost until it is explicitly stopped.
 */

import { parseReady, StateCache } from '../cache/state-cache';
import { Trace } from '../util/trace';
import { BackoffStrategy, ExponentialBackoff, RandomBackoff } from './backoff';
import { HeartbeatScheduler } from './heartbeat';
import {
  DEFAULT_GATEWAY_URL,
  Envelope,
  IdentifyPayload,
  normalizeEventName,
  Opcode,
  presencePayload,
  PresenceOptions,
  ResumePayload
} from './messages';
import { PayloadCodec } from './payload-codec';
import { createWsTransport, TransportCloseEvent, TransportFactory, TransportFrame, TransportSocket } from './transport';

export enum GatewayState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  AwaitingHello = 'awaiting-hello',
  Identifying = 'identifying',
  Resuming = 'resuming',
  Connected = 'connected',
  Reconnecting = 'reconnecting'
}

export interface GatewayStateChangeEvent {
  previousState: GatewayState;
  currentState: GatewayState;
}

export interface GatewayOptions {
  /** Bot token sent with identify and resume */
  token: string;
  /** Bitmask of event categories to receive */
  intents?: number;
  /** Gateway endpoint, including version and encoding */
  url?: string;
  /** Reported as the browser and device in identify */
  clientName?: string;
  /** Member count above which a guild is sent without its offline members */
  largeThreshold?: number;
  /** Opens the socket for each new connection */
  transportFactory?: TransportFactory;
  /** Delays between attempts after a lost connection */
  reconnectBackoff?: BackoffStrategy;
  /** Delay before re-identifying after an invalid session or a reconnect request */
  sessionBackoff?: BackoffStrategy;
}

export interface GatewayCallbacks {
  onStateChange?: (event: GatewayStateChangeEvent) => void;
}

/**
 * Where dispatched events go.
 */
export interface EventSink {
  fire(eventName: string, payload: unknown): void;
}

/** Closing with this code keeps the session resumable on the server. */
export const RESUMABLE_CLOSE_CODE = 4000;
const NORMAL_CLOSE_CODE = 1000;

/** Close codes after which the session cannot be resumed. */
const NON_RESUMABLE_CLOSE_CODES = new Set([
  4007, // invalid sequence sent on resume
  4009  // session timed out
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One physical socket and everything negotiated on it. Replaced, never
 * reused, on every reconnect.
 */
class Connection {
  readonly codec = new PayloadCodec();
  readonly heartbeat: HeartbeatScheduler;

  constructor(
    readonly socket: TransportSocket,
    onHeartbeat: (connection: Connection) => void,
    onHeartbeatTimeout: (connection: Connection) => void
  ) {
    this.heartbeat = new HeartbeatScheduler({
      sendHeartbeat: () => onHeartbeat(this),
      onTimeout: () => onHeartbeatTimeout(this)
    });
  }

  close(code: number, reason: string): void {
    this.heartbeat.stop();
    this.codec.reset();
    try {
      this.socket.close(code, reason);
    } catch (error) {
      Trace.warn(`Failed to close gateway socket: ${describe(error)}`);
    }
  }
}

export class Gateway {
  private state: GatewayState = GatewayState.Disconnected;
  private connection: Connection | null = null;
  private currentSessionId: string | null = null;
  private currentSequence: number | null = null;
  private isReady = false;
  private stopped = false;
  private reconnectAttempt = 0;
  private pendingTimer: NodeJS.Timeout | null = null;

  private readonly options: Required<GatewayOptions>;

  constructor(
    options: GatewayOptions,
    private readonly events: EventSink,
    private readonly cache: StateCache,
    private readonly callbacks: GatewayCallbacks = {}
  ) {
    this.options = {
      token: options.token,
      intents: options.intents ?? 0,
      url: options.url ?? DEFAULT_GATEWAY_URL,
      clientName: options.clientName ?? 'chat-gateway',
      largeThreshold: options.largeThreshold ?? 250,
      transportFactory: options.transportFactory ?? createWsTransport,
      reconnectBackoff: options.reconnectBackoff ?? new ExponentialBackoff(),
      sessionBackoff: options.sessionBackoff ?? new RandomBackoff(1000, 6000)
    };
  }

  get sessionId(): string | null {
    return this.currentSessionId;
  }

  get sequence(): number | null {
    return this.currentSequence;
  }

  get ready(): boolean {
    return this.isReady;
  }

  get awaitingAck(): boolean {
    return this.connection?.heartbeat.awaitingAck ?? false;
  }

  get heartbeatIntervalMs(): number | null {
    const interval = this.connection?.heartbeat.interval ?? 0;
    return interval > 0 ? interval : null;
  }

  getState(): GatewayState {
    return this.state;
  }

  /**
   * Open the connection. Returns as soon as the socket is being opened;
   * readiness is reported through the `ready` event.
   */
  start(): void {
    if (this.stopped) {
      throw new Error('Gateway has been stopped and cannot be restarted');
    }
    if (this.connection || this.pendingTimer) {
      return;
    }
    this.openConnection();
  }

  /**
   * Close the connection for good. Safe to call any number of times.
   */
  stop(): void {
    if (this.stopped) {
      this.isReady = false;
      return;
    }
    this.stopped = true;
    this.cancelPendingTimer();

    const connection = this.connection;
    this.connection = null;
    if (connection) {
      connection.close(NORMAL_CLOSE_CODE, 'Client stopped');
    }
    this.isReady = false;
    this.setState(GatewayState.Disconnected);
    Trace.info('Gateway stopped');
  }

  /**
   * Send a presence update. Returns false when there is no open socket.
   */
  updatePresence(options: PresenceOptions = {}): boolean {
    const connection = this.connection;
    if (!connection || !connection.socket.isOpen) {
      Trace.warn('Cannot update presence: gateway is not connected');
      return false;
    }
    return this.send(connection, Opcode.PresenceUpdate, presencePayload(options));
  }

  private openConnection(): void {
    this.setState(GatewayState.Connecting);

    let socket: TransportSocket;
    try {
      socket = this.options.transportFactory(this.options.url);
    } catch (error) {
      Trace.error(error);
      this.scheduleReconnect();
      return;
    }

    const connection = new Connection(
      socket,
      (c) => this.sendHeartbeat(c),
      (c) => this.handleHeartbeatTimeout(c)
    );
    this.connection = connection;

    socket.onOpen(() => this.whenCurrent(connection, () => this.handleOpen()));
    socket.onMessage((frame) => this.whenCurrent(connection, () => this.handleFrame(connection, frame)));
    socket.onClose((event) => this.whenCurrent(connection, () => this.handleClose(connection, event)));
    socket.onError((error) => this.whenCurrent(connection, () => {
      Trace.warn(`Gateway socket error: ${error.message}`);
    }));
  }

  /**
   * Ignore anything a replaced or stopped connection still reports.
   */
  private whenCurrent(connection: Connection, action: () => void): void {
    if (this.stopped || this.connection !== connection) {
      return;
    }
    try {
      action();
    } catch (error) {
      Trace.error(error);
    }
  }

  private handleOpen(): void {
    this.setState(GatewayState.AwaitingHello);
  }

  private handleFrame(connection: Connection, frame: TransportFrame): void {
    const envelope = connection.codec.decode(frame);
    if (!envelope) {
      return;
    }

    if (envelope.s !== undefined) {
      this.recordSequence(envelope.s);
    }

    switch (envelope.op) {
      case Opcode.Hello:
        this.handleHello(connection, envelope.d);
        break;
      case Opcode.HeartbeatAck:
        this.handleHeartbeatAck(connection);
        break;
      case Opcode.Heartbeat:
        connection.heartbeat.beatNow();
        break;
      case Opcode.Dispatch:
        this.handleDispatch(envelope);
        break;
      case Opcode.InvalidSession:
        this.handleInvalidSession(connection, envelope.d === true);
        break;
      case Opcode.Reconnect:
        this.handleReconnectRequest(connection);
        break;
      default:
        Trace.info(`Ignoring gateway opcode ${envelope.op}`);
    }
  }

  private recordSequence(sequence: number): void {
    if (this.currentSequence === null || sequence > this.currentSequence) {
      this.currentSequence = sequence;
    }
  }

  private handleHello(connection: Connection, data: unknown): void {
    const interval = isRecord(data) ? data.heartbeat_interval : undefined;
    if (typeof interval !== 'number' || interval <= 0) {
      Trace.warn('Dropping hello without a valid heartbeat_interval');
      return;
    }

    connection.heartbeat.start(interval);

    if (this.canResume()) {
      this.resume(connection);
    } else {
      this.identify(connection);
    }
  }

  private handleHeartbeatAck(connection: Connection): void {
    const roundTripMs = connection.heartbeat.acknowledge();
    if (roundTripMs !== null) {
      Trace.metric('Gateway heartbeat acknowledged', { roundTripMs });
    }
  }

  private handleDispatch(envelope: Envelope): void {
    const eventName = envelope.t;
    if (eventName === undefined) {
      Trace.warn('Dropping dispatch without an event name');
      return;
    }
    const data = envelope.d;

    switch (eventName) {
      case 'READY':
        this.handleReady(data);
        break;
      case 'RESUMED':
        this.markConnected();
        Trace.info(`Gateway resumed session ${this.currentSessionId}`);
        break;
      case 'GUILD_CREATE':
        this.updateCache(eventName, () => this.cache.addGuild(data));
        break;
      case 'CHANNEL_CREATE':
      case 'CHANNEL_UPDATE':
        this.updateCache(eventName, () => this.cache.upsertChannel(data));
        break;
      case 'CHANNEL_DELETE':
        this.updateCache(eventName, () => this.cache.removeChannel(data));
        break;
    }

    this.events.fire(normalizeEventName(eventName), data);
  }

  private handleReady(data: unknown): void {
    if (this.state !== GatewayState.Identifying) {
      Trace.warn(`Ignoring READY session while ${this.state}`);
      return;
    }
    try {
      const ready = parseReady(data);
      this.currentSessionId = ready.sessionId;
      this.cache.applyReady(ready);
    } catch (error) {
      Trace.warn(`Malformed READY: ${describe(error)}`);
      return;
    }
    this.markConnected();
    Trace.info(`Gateway ready with session ${this.currentSessionId}`);
  }

  private markConnected(): void {
    this.isReady = true;
    this.reconnectAttempt = 0;
    this.setState(GatewayState.Connected);
  }

  private updateCache(eventName: string, update: () => void): void {
    try {
      update();
    } catch (error) {
      Trace.warn(`Cache not updated for ${eventName}: ${describe(error)}`);
    }
  }

  private handleInvalidSession(connection: Connection, resumable: boolean): void {
    this.isReady = false;

    if (resumable) {
      Trace.info('Gateway session invalidated; resuming');
      if (this.canResume()) {
        this.resume(connection);
      } else {
        this.identify(connection);
      }
      return;
    }

    this.invalidateSession();
    const delayMs = this.options.sessionBackoff.delayFor(0);
    Trace.info(`Gateway session invalidated; identifying again in ${delayMs}ms`);
    this.schedule(delayMs, () => {
      if (this.connection !== connection) {
        return;
      }
      if (connection.socket.isOpen) {
        this.identify(connection);
      } else {
        this.dropConnection(connection, NORMAL_CLOSE_CODE, 'Session invalidated');
        this.openConnection();
      }
    });
  }

  private handleReconnectRequest(connection: Connection): void {
    this.dropConnection(connection, RESUMABLE_CLOSE_CODE, 'Reconnect requested');
    const delayMs = this.options.sessionBackoff.delayFor(0);
    Trace.info(`Gateway asked to reconnect; reconnecting in ${delayMs}ms`);
    this.setState(GatewayState.Reconnecting);
    this.schedule(delayMs, () => this.openConnection());
  }

  private handleHeartbeatTimeout(connection: Connection): void {
    if (this.stopped || this.connection !== connection) {
      return;
    }
    Trace.warn('Heartbeat acknowledgement not received; reconnecting');
    this.dropConnection(connection, RESUMABLE_CLOSE_CODE, 'Heartbeat timeout');
    this.scheduleReconnect();
  }

  private handleClose(connection: Connection, event: TransportCloseEvent): void {
    connection.heartbeat.stop();
    connection.codec.reset();
    this.connection = null;
    this.isReady = false;

    if (NON_RESUMABLE_CLOSE_CODES.has(event.code)) {
      this.invalidateSession();
    }

    Trace.info(`Gateway closed (${event.code}${event.reason ? `: ${event.reason}` : ''})`);
    this.setState(GatewayState.Disconnected);
    this.scheduleReconnect();
  }

  private identify(connection: Connection): void {
    this.setState(GatewayState.Identifying);
    const payload: IdentifyPayload = {
      token: this.options.token,
      intents: this.options.intents,
      properties: {
        os: process.platform,
        browser: this.options.clientName,
        device: this.options.clientName
      },
      compress: true,
      large_threshold: this.options.largeThreshold
    };
    this.send(connection, Opcode.Identify, payload);
  }

  /**
   * Resuming needs both the session and the last sequence it saw.
   */
  private canResume(): boolean {
    return this.currentSessionId !== null && this.currentSequence !== null;
  }

  private resume(connection: Connection): void {
    const sessionId = this.currentSessionId;
    const sequence = this.currentSequence;
    if (sessionId === null || sequence === null) {
      this.identify(connection);
      return;
    }
    this.setState(GatewayState.Resuming);
    const payload: ResumePayload = {
      token: this.options.token,
      session_id: sessionId,
      seq: sequence
    };
    this.send(connection, Opcode.Resume, payload);
  }

  private sendHeartbeat(connection: Connection): void {
    if (this.stopped || this.connection !== connection) {
      connection.heartbeat.stop();
      return;
    }
    this.send(connection, Opcode.Heartbeat, this.currentSequence);
  }

  private send(connection: Connection, op: Opcode, data?: unknown): boolean {
    try {
      connection.socket.send(connection.codec.encode(op, data));
      return true;
    } catch (error) {
      Trace.warn(`Failed to send opcode ${op}: ${describe(error)}`);
      return false;
    }
  }

  /**
   * Forget the session so that the next handshake is a fresh identify.
   */
  private invalidateSession(): void {
    this.currentSessionId = null;
    this.currentSequence = null;
  }

  private dropConnection(connection: Connection, code: number, reason: string): void {
    if (this.connection === connection) {
      this.connection = null;
    }
    this.isReady = false;
    connection.close(code, reason);
  }

  private scheduleReconnect(): void {
    const delayMs = this.options.reconnectBackoff.delayFor(this.reconnectAttempt);
    this.reconnectAttempt++;
    Trace.counter('gateway.reconnect.attempt', this.reconnectAttempt);
    this.setState(GatewayState.Reconnecting);
    this.schedule(delayMs, () => this.openConnection());
  }

  private schedule(delayMs: number, action: () => void): void {
    this.cancelPendingTimer();
    this.pendingTimer = setTimeout(() => {
      this.pendingTimer = null;
      if (this.stopped) {
        return;
      }
      try {
        action();
      } catch (error) {
        Trace.error(error);
      }
    }, delayMs);
  }

  private cancelPendingTimer(): void {
    if (this.pendingTimer) {
      clearTimeout(this.pendingTimer);
      this.pendingTimer = null;
    }
  }

  private setState(newState: GatewayState): void {
    const previousState = this.state;
    if (previousState === newState) {
      return;
    }
    this.state = newState;

    try {
      this.callbacks.onStateChange?.({
        previousState,
        currentState: newState
      });
    } catch (error) {
      Trace.warn(`State change handler failed on ${previousState} -> ${newState}`);
      Trace.error(error);
    }
  }
}
