/**
 * Transport Socket
 *
 * The gateway only talks to the network through this interface, so tests
 * and alternative runtimes can substitute their own socket.
 */

import WebSocket from 'ws';

/** Text frames arrive as strings, binary frames as bytes. */
export type TransportFrame = string | Uint8Array;

export interface TransportCloseEvent {
  code: number;
  reason: string;
}

export interface TransportSocket {
  readonly isOpen: boolean;
  send(text: string): void;
  close(code?: number, reason?: string): void;
  onOpen(listener: () => void): void;
  onMessage(listener: (frame: TransportFrame) => void): void;
  onClose(listener: (event: TransportCloseEvent) => void): void;
  onError(listener: (error: Error) => void): void;
}

export type TransportFactory = (url: string) => TransportSocket;

const textDecoder = new TextDecoder();

function toBytes(data: WebSocket.RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

/**
 * Transport over the `ws` package.
 */
export class WsTransportSocket implements TransportSocket {
  private readonly socket: WebSocket;

  constructor(url: string) {
    this.socket = new WebSocket(url);
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(text: string): void {
    this.socket.send(text);
  }

  close(code?: number, reason?: string): void {
    if (this.socket.readyState === WebSocket.CONNECTING) {
      // Closing before the handshake completes would raise; terminate instead.
      this.socket.terminate();
      return;
    }
    this.socket.close(code, reason);
  }

  onOpen(listener: () => void): void {
    this.socket.on('open', () => listener());
  }

  onMessage(listener: (frame: TransportFrame) => void): void {
    this.socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      const bytes = toBytes(data);
      listener(isBinary ? bytes : textDecoder.decode(bytes));
    });
  }

  onClose(listener: (event: TransportCloseEvent) => void): void {
    this.socket.on('close', (code: number, reason: Buffer) => {
      listener({ code, reason: reason.toString() });
    });
  }

  onError(listener: (error: Error) => void): void {
    this.socket.on('error', (error: Error) => listener(error));
  }
}

export const createWsTransport: TransportFactory = (url) => new WsTransportSocket(url);
