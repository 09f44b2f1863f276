import type { Redis } from "ioredis";
import env from "../config/env";
import { RKeys } from "../redis/keys";

export type RefreshMeta = { ua?: string; ip?: string };

/** Server-side record of live refresh tokens, keyed by user and token id. */
export interface RefreshStore {
  store(userId: string, jti: string, meta?: RefreshMeta): Promise<void>;
  has(userId: string, jti: string): Promise<boolean>;
  delete(userId: string, jti: string): Promise<void>;
  deleteAll(userId: string): Promise<void>;
}

const days = (d: number) => d * 24 * 60 * 60;

export function redisRefreshStore(redis: Redis, ttlDays: number = env.REFRESH_TTL_DAYS): RefreshStore {
  return {
    async store(userId, jti, meta) {
      await redis.set(RKeys.rtSession(userId, jti), JSON.stringify(meta || {}), "EX", days(ttlDays));
    },
    async has(userId, jti) {
      const v = await redis.get(RKeys.rtSession(userId, jti));
      return !!v;
    },
    async delete(userId, jti) {
      await redis.del(RKeys.rtSession(userId, jti));
    },
    async deleteAll(userId) {
      const keys = await redis.keys(RKeys.rtSessionPattern(userId));
      if (keys.length) await redis.del(keys);
    },
  };
}

/** Map-backed store without expiry, for tests. */
export function memoryRefreshStore(): RefreshStore & { size(): number } {
  const sessions = new Map<string, RefreshMeta>();
  return {
    async store(userId, jti, meta) {
      sessions.set(RKeys.rtSession(userId, jti), meta || {});
    },
    async has(userId, jti) {
      return sessions.has(RKeys.rtSession(userId, jti));
    },
    async delete(userId, jti) {
      sessions.delete(RKeys.rtSession(userId, jti));
    },
    async deleteAll(userId) {
      const prefix = RKeys.rtSessionPattern(userId).slice(0, -1);
      for (const key of [...sessions.keys()]) if (key.startsWith(prefix)) sessions.delete(key);
    },
    size: () => sessions.size,
  };
}
