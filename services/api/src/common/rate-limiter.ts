type Counter = { count: number; resetAt: number };

export type RateLimitDecision = {
  allowed: boolean;
  remaining: number;
  resetAt: number;
  retryAfterMs: number;
};

export type RateLimiter = {
  limit: number;
  check: (key: string) => RateLimitDecision;
};

export const createRateLimiter = (
  max: number,
  windowMs: number,
  now: () => number = Date.now,
): RateLimiter | null => {
  if (max <= 0 || windowMs <= 0) {
    return null;
  }

  const counters = new Map<string, Counter>();

  const prune = (at: number) => {
    for (const [key, counter] of counters) {
      if (counter.resetAt <= at) counters.delete(key);
    }
  };

  const check = (key: string): RateLimitDecision => {
    const at = now();
    const existing = counters.get(key);
    if (!existing || existing.resetAt <= at) {
      if (counters.size >= 10_000) prune(at);
      const resetAt = at + windowMs;
      counters.set(key, { count: 1, resetAt });
      return { allowed: true, remaining: max - 1, resetAt, retryAfterMs: 0 };
    }
    if (existing.count >= max) {
      return { allowed: false, remaining: 0, resetAt: existing.resetAt, retryAfterMs: existing.resetAt - at };
    }
    existing.count += 1;
    return { allowed: true, remaining: max - existing.count, resetAt: existing.resetAt, retryAfterMs: 0 };
  };

  return { limit: max, check };
};
