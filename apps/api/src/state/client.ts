import { Redis } from "@upstash/redis";

export async function initRedis(params: {
  url?: string;
  token?: string;
}): Promise<Redis> {
  const { url, token } = params;

  if (!url || !token) {
    throw new Error(
      "Upstash Redis env vars missing (UPSTASH_REDIS_REST_URL / UPSTASH_REDIS_REST_TOKEN)"
    );
  }

  const client = new Redis({
    url,
    token,
    // Session hashes hold plain strings; keep them that way on read.
    automaticDeserialization: false,
    retry: {
      retries: 3,
      backoff: (attempt) => Math.min(100 * 2 ** attempt, 1000),
    },
  });

  await client.ping();

  return client;
}
