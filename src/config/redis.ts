import Redis from "ioredis";

// Redis is optional: without REDIS_URL the rate limiter is disabled.
const createRedis = (rawUrl: string | undefined): Redis | null => {
  if (!rawUrl) return null;

  // Extract just the redis:// or rediss:// URL
  const urlMatch = rawUrl.trim().match(/(rediss?:\/\/[^\s]+)/i);
  const redisUrl = urlMatch ? urlMatch[1] : rawUrl.trim().split(/\s+/)[0];

  const client = new Redis(redisUrl, {
    ...(redisUrl.startsWith('rediss://') && {
      tls: {
        rejectUnauthorized: false,
      },
    }),
    maxRetriesPerRequest: 1,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  client.on("ready", () => {
    console.log("✅ Redis ready");
  });

  client.on("error", (err) => {
    console.error("⚠️ Redis error:", err.message);
  });

  return client;
};

export const redis = createRedis(process.env.REDIS_URL);

export default redis;
