export { Channel, Guild, parseReady, parseRemoteObject, ReadyData, RemoteObject, Snowflake, StateCache, User } from './cache/state-cache';
export { Client, ClientConfig } from './client';
export { ApiError, AuthenticationError, InvalidArgument, RateLimitError } from './errors';
export { EventDispatcher, EventHandler } from './events/event-dispatcher';
export { BackoffStrategy, ExponentialBackoff, ExponentialBackoffOptions, FixedBackoff, RandomBackoff, RandomSource } from './gateway/backoff';
export { EventSink, Gateway, GatewayCallbacks, GatewayOptions, GatewayState, GatewayStateChangeEvent, RESUMABLE_CLOSE_CODE } from './gateway/gateway';
export { HeartbeatCallbacks, HeartbeatScheduler } from './gateway/heartbeat';
export {
  Activity,
  DEFAULT_GATEWAY_URL,
  Envelope,
  GATEWAY_VERSION,
  IdentifyPayload,
  normalizeEventName,
  Opcode,
  PresenceOptions,
  PresenceStatus,
  PresenceUpdatePayload,
  ResumePayload
} from './gateway/messages';
export { encodeEnvelope, parseEnvelope, PayloadCodec } from './gateway/payload-codec';
export { createWsTransport, TransportCloseEvent, TransportFactory, TransportFrame, TransportSocket, WsTransportSocket } from './gateway/transport';
export { DEFAULT_API_BASE_URL, HttpMethod, QueryParameters, RestClient, RestClientConfig } from './http/rest-client';
export { ConsoleTracer, MemoryTracer, NoOpTracer, Trace, TraceEntry, TraceLevel, Tracer } from './util/trace';
