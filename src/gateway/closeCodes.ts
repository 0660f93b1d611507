import { GatewayError, LoginFailure, PrivilegedIntentsRequired } from '@/errors';

export enum GatewayCloseCode {
  UNKNOWN_ERROR = 4000,
  UNKNOWN_OPCODE = 4001,
  DECODE_ERROR = 4002,
  NOT_AUTHENTICATED = 4003,
  AUTHENTICATION_FAILED = 4004,
  ALREADY_AUTHENTICATED = 4005,
  INVALID_SEQ = 4007,
  RATE_LIMITED = 4008,
  SESSION_TIMED_OUT = 4009,
  INVALID_SHARD = 4010,
  SHARDING_REQUIRED = 4011,
  INVALID_API_VERSION = 4012,
  INVALID_INTENTS = 4013,
  DISALLOWED_INTENTS = 4014
}

export type CloseCodeKind = 'fatal-credential' | 'fatal-config' | 'resumable' | 'transient';

const FATAL_CONFIG_MESSAGES: ReadonlyMap<number, string> = new Map([
  [GatewayCloseCode.INVALID_SHARD, 'Invalid shard'],
  [GatewayCloseCode.SHARDING_REQUIRED, 'Sharding required'],
  [GatewayCloseCode.INVALID_API_VERSION, 'Invalid API version'],
  [GatewayCloseCode.INVALID_INTENTS, 'Invalid intents'],
  [GatewayCloseCode.DISALLOWED_INTENTS, 'Disallowed intents']
]);

export function classifyCloseCode(code: number): CloseCodeKind {
  if (code === GatewayCloseCode.SESSION_TIMED_OUT) return 'resumable';
  if (code === GatewayCloseCode.AUTHENTICATION_FAILED) return 'fatal-credential';
  if (FATAL_CONFIG_MESSAGES.has(code)) return 'fatal-config';
  return 'transient';
}

/**
 * Builds the error a fatal close surfaces to the application, or `null` for
 * codes the session recovers from on its own. Each call returns a new error.
 */
export function createCloseCodeError(code: number, shardId: number): GatewayError | null {
  switch (classifyCloseCode(code)) {
    case 'fatal-credential':
      return new LoginFailure('Token is not valid', shardId, code);
    case 'fatal-config':
      if (code === GatewayCloseCode.DISALLOWED_INTENTS) {
        return new PrivilegedIntentsRequired(shardId, code);
      }
      return new GatewayError(FATAL_CONFIG_MESSAGES.get(code) ?? `Gateway closed with code ${code}`, shardId, code);
    case 'resumable':
    case 'transient':
      return null;
  }
}
