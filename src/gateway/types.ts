import { z } from 'zod';
import { OpCode } from './opcodes';
import { PresenceSchema } from '@/presence/models';

// Inbound messages: one variant per opcode the client reacts to.

export const DispatchSchema = z.object({
  op: z.literal(OpCode.DISPATCH),
  s: z.number().int().nonnegative(),
  t: z.string(),
  d: z.unknown()
});

export const HeartbeatRequestSchema = z.object({
  op: z.literal(OpCode.HEARTBEAT)
});

export const ReconnectSchema = z.object({
  op: z.literal(OpCode.RECONNECT)
});

export const InvalidSessionSchema = z.object({
  op: z.literal(OpCode.INVALID_SESSION),
  d: z.boolean().catch(false)
});

export const HelloSchema = z.object({
  op: z.literal(OpCode.HELLO),
  d: z.object({
    heartbeat_interval: z.number().positive()
  })
});

export const HeartbeatAckSchema = z.object({
  op: z.literal(OpCode.HEARTBEAT_ACK)
});

export const GatewayMessageSchema = z.discriminatedUnion('op', [
  DispatchSchema,
  HeartbeatRequestSchema,
  ReconnectSchema,
  InvalidSessionSchema,
  HelloSchema,
  HeartbeatAckSchema
]);

export type GatewayMessage = z.infer<typeof GatewayMessageSchema>;
export type Dispatch = z.infer<typeof DispatchSchema>;
export type Hello = z.infer<typeof HelloSchema>;

export type DecodeOutcome =
  | { ok: true; message: GatewayMessage }
  | { ok: false; op: number | null; error: z.ZodError };

export function decodeGatewayMessage(raw: unknown): DecodeOutcome {
  const result = GatewayMessageSchema.safeParse(raw);
  if (result.success) {
    return { ok: true, message: result.data };
  }

  const op = typeof raw === 'object' && raw !== null && 'op' in raw && typeof raw.op === 'number' ? raw.op : null;
  return { ok: false, op, error: result.error };
}

// Outbound payloads.

export const IdentifyPropertiesSchema = z.object({
  os: z.string(),
  browser: z.string(),
  device: z.string()
});

export type IdentifyProperties = z.infer<typeof IdentifyPropertiesSchema>;

export const IdentifySchema = z.object({
  token: z.string(),
  intents: z.number().int().nonnegative(),
  properties: IdentifyPropertiesSchema,
  compress: z.boolean(),
  large_threshold: z.number().int().min(50).max(250),
  shard: z.tuple([z.number().int().nonnegative(), z.number().int().positive()]),
  presence: PresenceSchema
});

export type Identify = z.infer<typeof IdentifySchema>;

export const ResumeSchema = z.object({
  token: z.string(),
  session_id: z.string(),
  seq: z.number()
});

export type Resume = z.infer<typeof ResumeSchema>;

export const RequestGuildMembersSchema = z.object({
  guild_id: z.string(),
  query: z.string().optional(),
  limit: z.number().int().nonnegative(),
  presences: z.boolean().optional(),
  user_ids: z.union([z.string(), z.array(z.string())]).optional(),
  nonce: z.string().max(32).optional()
});

export type RequestGuildMembers = z.infer<typeof RequestGuildMembersSchema>;

export type OutboundMessage =
  | { op: OpCode.HEARTBEAT; d: number | null }
  | { op: OpCode.IDENTIFY; d: Identify }
  | { op: OpCode.PRESENCE_UPDATE; d: z.infer<typeof PresenceSchema> }
  | { op: OpCode.RESUME; d: Resume }
  | { op: OpCode.REQUEST_GUILD_MEMBERS; d: RequestGuildMembers };

// Dispatch payloads the session itself reads.

export const ReadySchema = z.looseObject({
  v: z.number(),
  session_id: z.string(),
  resume_gateway_url: z.url(),
  user: z.looseObject({
    id: z.string(),
    username: z.string(),
    bot: z.boolean().optional()
  }),
  guilds: z.array(
    z.looseObject({
      id: z.string(),
      unavailable: z.boolean().optional()
    })
  ),
  shard: z.tuple([z.number(), z.number()]).optional()
});

export type Ready = z.infer<typeof ReadySchema>;

export interface DispatchEvent {
  name: string;
  sequence: number;
  data: unknown;
}

// REST: GET gateway/bot

export const GatewayBotInfoSchema = z.object({
  url: z.url(),
  shards: z.number().int().positive(),
  session_start_limit: z.object({
    total: z.number(),
    remaining: z.number(),
    reset_after: z.number(),
    max_concurrency: z.number()
  })
});

export type GatewayBotInfo = z.infer<typeof GatewayBotInfoSchema>;
