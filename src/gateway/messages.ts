// Gateway wire envelope and control payloads

export const GATEWAY_VERSION = 10;
export const DEFAULT_GATEWAY_URL = `wss://gateway.discord.gg/?v=${GATEWAY_VERSION}&encoding=json`;

export enum Opcode {
  Dispatch = 0,
  Heartbeat = 1,
  Identify = 2,
  PresenceUpdate = 3,
  VoiceStateUpdate = 4,
  Resume = 6,
  Reconnect = 7,
  RequestGuildMembers = 8,
  InvalidSession = 9,
  Hello = 10,
  HeartbeatAck = 11
}

/**
 * One message on the gateway socket. Fields that were absent on the wire
 * are absent here too.
 */
export interface Envelope {
  op: number;
  s?: number;
  t?: string;
  d?: unknown;
}

export interface IdentifyPayload {
  token: string;
  intents: number;
  properties: {
    os: string;
    browser: string;
    device: string;
  };
  compress: boolean;
  large_threshold: number;
}

export interface ResumePayload {
  token: string;
  session_id: string;
  seq: number;
}

export type PresenceStatus = 'online' | 'dnd' | 'idle' | 'invisible';

export interface Activity {
  name: string;
  type: number;
  url?: string;
}

export interface PresenceUpdatePayload {
  since: null;
  activities: Activity[];
  status: PresenceStatus;
  afk: false;
}

export interface PresenceOptions {
  status?: PresenceStatus;
  activity?: Activity | null;
}

export function presencePayload(options: PresenceOptions = {}): PresenceUpdatePayload {
  return {
    since: null,
    activities: options.activity ? [options.activity] : [],
    status: options.status ?? 'online',
    afk: false
  };
}

/**
 * Event names arrive upper snake case (MESSAGE_CREATE) and are delivered to
 * handlers lower-cased (message_create).
 */
export function normalizeEventName(eventName: string): string {
  return eventName.toLowerCase();
}
