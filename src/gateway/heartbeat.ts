import { InvalidArgument } from '../errors';

export interface HeartbeatCallbacks {
  /** Write one heartbeat to the socket */
  sendHeartbeat: () => void;
  /** A heartbeat came due while the previous one was still unacknowledged */
  onTimeout: () => void;
}

/**
 * Heartbeat Scheduler
 *
 * Sends a heartbeat every interval and watches for its acknowledgement.
 * If the next heartbeat comes due before the previous one was acknowledged,
 * the scheduler stops itself and reports a timeout. One scheduler belongs
 * to one connection.
 */
export class HeartbeatScheduler {
  private timer: NodeJS.Timeout | null = null;
  private intervalMs = 0;
  private pendingAck = false;
  private lastSentAt: number | null = null;

  constructor(private readonly callbacks: HeartbeatCallbacks) { }

  get running(): boolean {
    return this.timer !== null;
  }

  get awaitingAck(): boolean {
    return this.pendingAck;
  }

  get interval(): number {
    return this.intervalMs;
  }

  /**
   * Begin the loop. The first heartbeat goes out one full interval from now.
   */
  start(intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new InvalidArgument(`Heartbeat interval must be a positive number, got ${intervalMs}`);
    }
    this.stop();
    this.intervalMs = intervalMs;
    this.pendingAck = false;
    this.lastSentAt = null;
    this.timer = setInterval(() => this.tick(), intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Record the acknowledgement. Returns the round trip in milliseconds, or
   * null if no heartbeat was outstanding.
   */
  acknowledge(): number | null {
    const roundTrip = this.pendingAck && this.lastSentAt !== null
      ? Date.now() - this.lastSentAt
      : null;
    this.pendingAck = false;
    return roundTrip;
  }

  /**
   * Send a heartbeat immediately, outside the regular schedule.
   */
  beatNow(): void {
    this.beat();
  }

  private tick(): void {
    if (this.pendingAck) {
      this.stop();
      this.callbacks.onTimeout();
      return;
    }
    this.beat();
  }

  private beat(): void {
    this.pendingAck = true;
    this.lastSentAt = Date.now();
    this.callbacks.sendHeartbeat();
  }
}
