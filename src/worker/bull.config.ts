import { QueueBaseOptions } from 'bullmq';

/** Connection settings shared by the API process and the standalone worker. */
export function bullRootOptions(): QueueBaseOptions {
  if (process.env.REDIS_URL) {
    const url = new URL(process.env.REDIS_URL);
    const isTls = process.env.REDIS_URL.startsWith('rediss://');
    return {
      connection: {
        host: url.hostname,
        port: Number(url.port || 6379),
        username: url.username || undefined,
        password: url.password || undefined,
        ...(isTls ? { tls: { rejectUnauthorized: false } } : {}),
      },
    };
  }

  return {
    connection: {
      host: process.env.REDIS_HOST || 'localhost',
      port: Number(process.env.REDIS_PORT || 6379),
      password: process.env.REDIS_PASSWORD || undefined,
    },
  };
}
