export { Client } from '@/client/Client';
export type { ClientDependencies, ClientDispatch, ClientEvents, ClientHandlers } from '@/client/Client';

export { Shard } from '@/client/Shard';
export type { ShardContext, ShardLaunchOptions, ShardSessionInit } from '@/client/Shard';

export { EventRouter } from '@/client/EventRouter';
export type { DispatchHandler, HandlerErrorContext, HandlerErrorSink } from '@/client/EventRouter';

export { ClientOptionsSchema, parseClientOptions, safeParseClientOptions } from '@/config';
export type { ClientOptions, ClientOptionsInput, GatewayOptions, RestOptions } from '@/config';

export { GatewaySession } from '@/gateway/GatewaySession';
export type {
  DispatchRouter,
  GatewaySessionEvents,
  GatewaySessionInit,
  RequestGuildMembersOptions,
  SessionInfo,
  SessionState
} from '@/gateway/GatewaySession';

export { FrameDecompressor } from '@/gateway/FrameDecompressor';
export type { DecodeResult } from '@/gateway/FrameDecompressor';

export { createWebSocket } from '@/gateway/socket';
export type { GatewaySocket, GatewaySocketHandlers, RawFrame, SocketFactory } from '@/gateway/socket';

export { OpCode, LocalCloseCode } from '@/gateway/opcodes';
export { GatewayCloseCode, classifyCloseCode, createCloseCodeError } from '@/gateway/closeCodes';
export type { CloseCodeKind } from '@/gateway/closeCodes';

export {
  GatewayIntents,
  ALL_INTENTS,
  DEFAULT_INTENTS,
  PRIVILEGED_INTENTS,
  hasIntent,
  resolveIntents
} from '@/gateway/intents';
export type { Intent, IntentName } from '@/gateway/intents';

export {
  GatewayMessageSchema,
  GatewayBotInfoSchema,
  IdentifySchema,
  ReadySchema,
  RequestGuildMembersSchema,
  ResumeSchema,
  decodeGatewayMessage
} from '@/gateway/types';
export type {
  DispatchEvent,
  GatewayBotInfo,
  GatewayMessage,
  Identify,
  IdentifyProperties,
  OutboundMessage,
  Ready,
  RequestGuildMembers,
  Resume
} from '@/gateway/types';

export { ActivityBuilder } from '@/presence/builder';
export { ActivitySchema, ActivityType, PresenceSchema, StatusSchema, generatePresence } from '@/presence/models';
export type { Activity, ActivityInput, Presence, Status } from '@/presence/models';

export { RestClient } from '@/rest/RestClient';
export type { FetchFunction, HttpMethod, QueryParams, RequestOptions, RestClientOptions } from '@/rest/RestClient';
export { RateLimiter } from '@/rest/RateLimiter';
export type { RateLimitBucket } from '@/rest/RateLimiter';
export { RestApp, UserSchema, GuildSchema, ChannelSchema } from '@/rest/RestApp';
export type { Channel, Guild, Snowflake, User } from '@/rest/RestApp';

export * from '@/errors';

export { DebugLogger } from '@shardline/debug-logger';
export type { LogEntry, LogLevel, LoggerLevel } from '@shardline/debug-logger';
export { EventEmitter, EventTimeoutError } from '@shardline/event-emitter';
export type { EventCallback, WaitForOptions } from '@shardline/event-emitter';
export { ConnectionMonitor } from '@shardline/connection-monitor';
export type { ConnectionMetrics, HealthReport, HealthStatus } from '@shardline/connection-monitor';
