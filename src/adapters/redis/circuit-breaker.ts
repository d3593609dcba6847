import type { Redis } from "ioredis";
import { DEFAULT_CIRCUIT_POLICY, type CircuitBreakerPolicy } from "../../infra/circuit-breaker.js";
import type { CircuitBreakerPort, CircuitSnapshot } from "../../ports/circuit-breaker.js";

interface RedisCircuitBreakerOptions {
  keyPrefix: string;
  policy?: Partial<CircuitBreakerPolicy>;
  nowMs?: () => number;
}

const RECORD_FAILURE_LUA = `
local key = KEYS[1]
local now_ms = tonumber(ARGV[1])
local threshold = tonumber(ARGV[2])
local cooldown_ms = tonumber(ARGV[3])

local failures = redis.call('HINCRBY', key, 'failures', 1)
local opened_until_ms = tonumber(redis.call('HGET', key, 'opened_until_ms'))

if failures >= threshold and (not opened_until_ms or opened_until_ms <= now_ms) then
  opened_until_ms = now_ms + cooldown_ms
  redis.call('HSET', key, 'opened_until_ms', opened_until_ms)
end

redis.call('HSET', key, 'last_failure_ms', now_ms)
redis.call('PEXPIRE', key, cooldown_ms * 4)

return failures
`;

function toMs(raw: string | null | undefined): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Breaker shared by every instance through one redis hash per `provider:org`.
 * The failure increment and open decision run atomically in a script.
 */
export class RedisCircuitBreaker implements CircuitBreakerPort {
  private readonly policy: CircuitBreakerPolicy;
  private readonly nowMs: () => number;

  constructor(
    private readonly redis: Redis,
    private readonly options: RedisCircuitBreakerOptions,
  ) {
    this.policy = { ...DEFAULT_CIRCUIT_POLICY, ...(options.policy ?? {}) };
    this.nowMs = options.nowMs ?? (() => Date.now());
  }

  async isOpen(key: string): Promise<boolean> {
    const openedUntilMs = toMs(await this.redis.hget(this.redisKey(key), "opened_until_ms"));
    return openedUntilMs !== null && this.nowMs() < openedUntilMs;
  }

  async recordSuccess(key: string): Promise<void> {
    await this.redis.del(this.redisKey(key));
  }

  async recordFailure(key: string): Promise<void> {
    await this.redis.eval(
      RECORD_FAILURE_LUA,
      1,
      this.redisKey(key),
      this.nowMs(),
      this.policy.failureThreshold,
      this.policy.cooldownSeconds * 1000,
    );
  }

  async getState(key: string): Promise<CircuitSnapshot> {
    const [failures, openedUntil, lastFailure] = await this.redis.hmget(
      this.redisKey(key),
      "failures",
      "opened_until_ms",
      "last_failure_ms",
    );
    const openedUntilMs = toMs(openedUntil);
    const lastFailureMs = toMs(lastFailure);
    return {
      state: openedUntilMs !== null && this.nowMs() < openedUntilMs ? "open" : "closed",
      failure_count: toMs(failures) ?? 0,
      opened_until: openedUntilMs === null ? null : new Date(openedUntilMs).toISOString(),
      last_failure_at: lastFailureMs === null ? null : new Date(lastFailureMs).toISOString(),
    };
  }

  async reset(key: string): Promise<void> {
    await this.redis.del(this.redisKey(key));
  }

  private redisKey(key: string): string {
    return `${this.options.keyPrefix}:${key}`;
  }
}
