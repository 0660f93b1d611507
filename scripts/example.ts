import { ActivityBuilder, ActivityType, Client, GatewayIntents, ShardlineError } from '@/index';

const token = process.env.BOT_TOKEN;
if (!token) {
  console.error('Set BOT_TOKEN to run the example bot');
  process.exit(1);
}

const activity = new ActivityBuilder().setName('the gateway').setType(ActivityType.WATCHING).build();

const client = new Client(
  {
    token,
    intents: GatewayIntents.GUILDS | GatewayIntents.GUILD_MESSAGES | GatewayIntents.MESSAGE_CONTENT,
    activity,
    status: 'online',
    logLevel: 'info'
  },
  {
    handlers: [
      [
        'READY',
        (bot, _data, shardId) => {
          console.log(`Shard ${shardId} ready as ${bot.user?.username ?? 'unknown user'}`);
        }
      ],
      [
        'MESSAGE_CREATE',
        (bot, data) => {
          if (typeof data !== 'object' || data === null || !('content' in data) || data.content !== '!ping') return;
          const shard = bot.shards.get(0);
          console.log(`pong (${shard ? Math.round(shard.latency * 1000) : '?'}ms)`);
        }
      ]
    ]
  }
);

client.on('shardError', ({ shardId, error }) => {
  console.error(`Shard ${shardId} stopped: ${error.message}`);
  if (error instanceof ShardlineError) client.close();
});

process.on('SIGINT', () => {
  client.close();
  process.exit(0);
});

client.run().catch((error: unknown) => {
  console.error('Failed to start', error);
  process.exit(1);
});
