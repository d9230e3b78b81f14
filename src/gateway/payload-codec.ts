/**
 * Payload Codec
 *
 * Turns gateway envelopes into socket frames and back. Text frames are
 * plain JSON. Binary frames belong to one continuous zlib stream for the
 * lifetime of a connection, so each codec owns a single inflater and must
 * never be shared between connections.
 */

import { Inflate } from 'pako';
import { Trace } from '../util/trace';
import { Envelope } from './messages';
import { TransportFrame } from './transport';

const SYNC_FLUSH_SUFFIX = [0x00, 0x00, 0xff, 0xff];
const Z_SYNC_FLUSH = 2;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate the envelope shape, keeping only the fields that are present.
 */
export function parseEnvelope(value: unknown): Envelope {
  if (!isRecord(value)) throw new Error("Expected the envelope to be an object.");
  if (!Number.isInteger(value.op)) throw new Error("Expected an integer 'op' property.");
  const envelope: Envelope = { op: Number(value.op) };
  if (value.s !== undefined && value.s !== null) {
    if (!Number.isInteger(value.s)) throw new Error("Expected 's' to be an integer.");
    envelope.s = Number(value.s);
  }
  if (value.t !== undefined && value.t !== null) {
    if (typeof value.t !== 'string') throw new Error("Expected 't' to be a string.");
    envelope.t = value.t;
  }
  if (value.d !== undefined) {
    envelope.d = value.d;
  }
  return envelope;
}

export function encodeEnvelope(op: number, data?: unknown): string {
  const envelope: Envelope = { op };
  if (data !== undefined) {
    envelope.d = data;
  }
  return JSON.stringify(envelope);
}

function endsWithSyncFlush(chunk: Uint8Array): boolean {
  if (chunk.length < SYNC_FLUSH_SUFFIX.length) {
    return false;
  }
  const offset = chunk.length - SYNC_FLUSH_SUFFIX.length;
  return SYNC_FLUSH_SUFFIX.every((byte, index) => chunk[offset + index] === byte);
}

function concatChunks(chunks: Uint8Array[]): Uint8Array {
  const length = chunks.reduce((total, chunk) => total + chunk.length, 0);
  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

export class PayloadCodec {
  private inflater: Inflate | null = null;
  private pending: Uint8Array[] = [];
  private readonly textDecoder = new TextDecoder();

  encode(op: number, data?: unknown): string {
    return encodeEnvelope(op, data);
  }

  /**
   * Decode one frame. Returns null when the frame is malformed, or when
   * it is a partial binary frame still waiting for the rest of its message.
   */
  decode(frame: TransportFrame): Envelope | null {
    if (typeof frame === 'string') {
      return this.parseText(frame);
    }

    this.pending.push(frame);
    if (!endsWithSyncFlush(frame)) {
      return null;
    }

    const compressed = concatChunks(this.pending);
    this.pending = [];
    const text = this.inflate(compressed);
    if (text === null) {
      return null;
    }
    return this.parseText(text);
  }

  /**
   * Drop the inflater and any partial frame.
   */
  reset(): void {
    this.inflater = null;
    this.pending = [];
  }

  private inflate(compressed: Uint8Array): string | null {
    const inflater = this.inflater ?? this.createInflater();
    inflater.push(compressed, Z_SYNC_FLUSH);
    if (inflater.err) {
      Trace.warn(`Dropping binary frame: zlib error ${inflater.err} (${inflater.msg})`);
      // The stream is unusable after an error; the next frame starts a new one.
      this.inflater = null;
      return null;
    }
    const result = inflater.result;
    if (typeof result === 'string') {
      return result;
    }
    return this.textDecoder.decode(result instanceof Uint8Array ? result : Uint8Array.from(result));
  }

  private createInflater(): Inflate {
    const inflater = new Inflate({ chunkSize: 64 * 1024 });
    this.inflater = inflater;
    return inflater;
  }

  private parseText(text: string): Envelope | null {
    try {
      return parseEnvelope(JSON.parse(text));
    }
    catch (error) {
      Trace.warn(`Dropping malformed frame: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}
