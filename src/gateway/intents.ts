export const GatewayIntents = {
  GUILDS: 1 << 0,
  GUILD_MEMBERS: 1 << 1,
  GUILD_MODERATION: 1 << 2,
  GUILD_EXPRESSIONS: 1 << 3,
  GUILD_INTEGRATIONS: 1 << 4,
  GUILD_WEBHOOKS: 1 << 5,
  GUILD_INVITES: 1 << 6,
  GUILD_VOICE_STATES: 1 << 7,
  GUILD_PRESENCES: 1 << 8,
  GUILD_MESSAGES: 1 << 9,
  GUILD_MESSAGE_REACTIONS: 1 << 10,
  GUILD_MESSAGE_TYPING: 1 << 11,
  DIRECT_MESSAGES: 1 << 12,
  DIRECT_MESSAGE_REACTIONS: 1 << 13,
  DIRECT_MESSAGE_TYPING: 1 << 14,
  MESSAGE_CONTENT: 1 << 15,
  GUILD_SCHEDULED_EVENTS: 1 << 16,
  AUTO_MODERATION_CONFIGURATION: 1 << 20,
  AUTO_MODERATION_EXECUTION: 1 << 21,
  GUILD_MESSAGE_POLLS: 1 << 24,
  DIRECT_MESSAGE_POLLS: 1 << 25
} as const;

export type GatewayIntentsType = typeof GatewayIntents;
export type IntentName = keyof GatewayIntentsType;
export type Intent = GatewayIntentsType[IntentName];

export const ALL_INTENTS: number = Object.values(GatewayIntents).reduce<number>((acc, bit) => acc | bit, 0);

export const PRIVILEGED_INTENTS: number =
  GatewayIntents.GUILD_MEMBERS | GatewayIntents.GUILD_PRESENCES | GatewayIntents.MESSAGE_CONTENT;

/** Everything except member and presence events, which need approval and flood large bots. */
export const DEFAULT_INTENTS: number = ALL_INTENTS & ~GatewayIntents.GUILD_MEMBERS & ~GatewayIntents.GUILD_PRESENCES;

export function resolveIntents(intents: number | Iterable<IntentName | number>): number {
  if (typeof intents === 'number') return intents;

  let bits = 0;
  for (const intent of intents) {
    bits |= typeof intent === 'number' ? intent : GatewayIntents[intent];
  }
  return bits;
}

export function hasIntent(intents: number, intent: Intent): boolean {
  return (intents & intent) === intent;
}
