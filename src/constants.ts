import type { IdentifyProperties } from './gateway/types';

export const LIBRARY_NAME = 'shardline';
export const LIBRARY_VERSION = '0.1.0';

export const API_VERSION = 10;
export const API_HOST = 'discord.com';
export const DEFAULT_GATEWAY_URL = 'wss://gateway.discord.gg';

export const USER_AGENT = `DiscordBot (${LIBRARY_NAME}, ${LIBRARY_VERSION})`;

export const DEFAULT_IDENTITY: IdentifyProperties = {
  os: process.platform,
  browser: LIBRARY_NAME,
  device: LIBRARY_NAME
};

/** Reported as the browser when a session should show as mobile. */
export const MOBILE_BROWSER = 'Discord iOS';

export const DEFAULT_LARGE_THRESHOLD = 100;

/** Every zlib-stream message ends with a sync flush. */
export const ZLIB_SUFFIX = Buffer.from([0x00, 0x00, 0xff, 0xff]);

export const HEARTBEAT_JITTER_OFFSET_MS = 2000;
export const WATCHDOG_MAX_CHECK_INTERVAL_MS = 20_000;
export const WATCHDOG_MIN_STALE_AFTER_MS = 60_000;

export const DEFAULT_REQUEST_TTL = 5;
/** Seconds to wait on a 429 whose body carries no `retry_after`. */
export const DEFAULT_RETRY_AFTER = 40;

export const MAX_RECONNECT_DELAY_MS = 5000;
