/**
 * Test helpers for gateway tests
 */

import { Deflate } from 'pako';
import { Envelope } from '../../src/gateway/messages';
import { parseEnvelope } from '../../src/gateway/payload-codec';
import { TransportCloseEvent, TransportFactory, TransportFrame, TransportSocket } from '../../src/gateway/transport';

const Z_SYNC_FLUSH = 2;

/**
 * In-memory socket driven by the test. Closing it reports the close event
 * synchronously, the way a socket that is already gone would.
 */
export class MockTransportSocket implements TransportSocket {
  isOpen = false;
  readonly sent: string[] = [];
  closedWith: TransportCloseEvent | null = null;

  private readonly openListeners: (() => void)[] = [];
  private readonly messageListeners: ((frame: TransportFrame) => void)[] = [];
  private readonly closeListeners: ((event: TransportCloseEvent) => void)[] = [];
  private readonly errorListeners: ((error: Error) => void)[] = [];

  constructor(readonly url: string) { }

  send(text: string): void {
    if (!this.isOpen) {
      throw new Error('Socket is not open');
    }
    this.sent.push(text);
  }

  close(code = 1000, reason = ''): void {
    this.simulateClose(code, reason);
  }

  onOpen(listener: () => void): void {
    this.openListeners.push(listener);
  }

  onMessage(listener: (frame: TransportFrame) => void): void {
    this.messageListeners.push(listener);
  }

  onClose(listener: (event: TransportCloseEvent) => void): void {
    this.closeListeners.push(listener);
  }

  onError(listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  simulateOpen(): void {
    this.isOpen = true;
    this.openListeners.forEach(listener => listener());
  }

  simulateMessage(frame: TransportFrame): void {
    this.messageListeners.forEach(listener => listener(frame));
  }

  simulateEnvelope(envelope: { op: number; s?: number | null; t?: string | null; d?: unknown }): void {
    this.simulateMessage(JSON.stringify(envelope));
  }

  simulateClose(code: number, reason = ''): void {
    if (this.closedWith) {
      return;
    }
    this.closedWith = { code, reason };
    this.isOpen = false;
    this.closeListeners.forEach(listener => listener({ code, reason }));
  }

  simulateError(error: Error): void {
    this.errorListeners.forEach(listener => listener(error));
  }

  sentEnvelopes(): Envelope[] {
    return this.sent.map(text => parseEnvelope(JSON.parse(text)));
  }

  sentWithOpcode(op: number): Envelope[] {
    return this.sentEnvelopes().filter(envelope => envelope.op === op);
  }
}

/**
 * Hands out a fresh mock socket for every connection the gateway opens.
 */
export class MockTransportFactory {
  readonly sockets: MockTransportSocket[] = [];

  readonly create: TransportFactory = (url) => {
    const socket = new MockTransportSocket(url);
    this.sockets.push(socket);
    return socket;
  };

  get latest(): MockTransportSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error('No socket has been opened');
    }
    return socket;
  }
}

export const HEARTBEAT_INTERVAL = 41250;

export const readyData = {
  v: 10,
  session_id: 'session-1',
  user: { id: '100', username: 'test-bot' },
  guilds: [{ id: '200', unavailable: true }]
};

export function openAndHello(socket: MockTransportSocket, interval = HEARTBEAT_INTERVAL): void {
  socket.simulateOpen();
  socket.simulateEnvelope({ op: 10, s: null, t: null, d: { heartbeat_interval: interval } });
}

export function sendReady(socket: MockTransportSocket, sequence = 1): void {
  socket.simulateEnvelope({ op: 0, s: sequence, t: 'READY', d: readyData });
}

/**
 * A zlib stream compressor that emits one sync-flushed frame per message,
 * as the server does with transport compression.
 */
export function createCompressor(): (text: string) => Uint8Array {
  const deflater = new Deflate();
  return (text) => {
    deflater.push(text, Z_SYNC_FLUSH);
    const result = deflater.result;
    if (!(result instanceof Uint8Array)) {
      throw new Error('Expected binary compressor output');
    }
    return result;
  };
}

/**
 * Wait for a condition to become true
 */
export async function waitForCondition(
  predicate: () => boolean,
  timeoutMs = 5000,
  intervalMs = 10
): Promise<void> {
  const start = Date.now();
  return new Promise<void>((resolve, reject) => {
    const check = () => {
      if (predicate()) {
        return resolve();
      }
      if (Date.now() - start > timeoutMs) {
        return reject(new Error(`Timeout waiting for condition after ${timeoutMs}ms`));
      }
      setTimeout(check, intervalMs);
    };
    check();
  });
}
