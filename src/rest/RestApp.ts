import { z } from 'zod';
import { GatewayBotInfoSchema } from '@/gateway/types';
import type { GatewayBotInfo } from '@/gateway/types';
import type { RestClient } from './RestClient';

export type Snowflake = string | bigint | number;

// Resource payloads are only checked for the fields the library reads;
// everything else is passed through untouched.

export const UserSchema = z.looseObject({
  id: z.string(),
  username: z.string(),
  discriminator: z.string().optional(),
  global_name: z.string().nullable().optional(),
  avatar: z.string().nullable().optional(),
  bot: z.boolean().optional()
});

export type User = z.infer<typeof UserSchema>;

export const GuildSchema = z.looseObject({
  id: z.string(),
  name: z.string(),
  owner_id: z.string().optional(),
  icon: z.string().nullable().optional()
});

export type Guild = z.infer<typeof GuildSchema>;

export const ChannelSchema = z.looseObject({
  id: z.string(),
  type: z.number().int(),
  guild_id: z.string().optional(),
  name: z.string().nullable().optional()
});

export type Channel = z.infer<typeof ChannelSchema>;

/** Typed helpers over the raw transport for the resources the client needs. */
export class RestApp {
  constructor(private readonly http: RestClient) {}

  async fetchUser(userId: Snowflake): Promise<User> {
    return UserSchema.parse(await this.http.get(`users/${userId}`));
  }

  async fetchGuild(guildId: Snowflake): Promise<Guild> {
    return GuildSchema.parse(await this.http.get(`guilds/${guildId}`));
  }

  async fetchChannel(channelId: Snowflake): Promise<Channel> {
    return ChannelSchema.parse(await this.http.get(`channels/${channelId}`));
  }

  async getGatewayBot(): Promise<GatewayBotInfo> {
    return GatewayBotInfoSchema.parse(await this.http.get('gateway/bot'));
  }
}
