import { HttpException, HttpStatus } from '@nestjs/common';
import { describe, expect, it, vi } from 'vitest';
import { RateLimitGuard } from '../src/common/rate-limit.guard';
import { createRateLimiter } from '../src/common/rate-limiter';

function httpContext(ip: string) {
  const response = { setHeader: vi.fn() };
  const context = {
    getType: () => 'http',
    switchToHttp: () => ({
      getRequest: () => ({ ip, socket: {} }),
      getResponse: () => response,
    }),
  };
  return { context: context as never, response };
}

describe('createRateLimiter', () => {
  it('is disabled when the limit or window is not positive', () => {
    expect(createRateLimiter(0, 1000)).toBeNull();
    expect(createRateLimiter(10, 0)).toBeNull();
  });

  it('allows up to the limit per key within a window', () => {
    let now = 1_000;
    const limiter = createRateLimiter(2, 500, () => now);
    if (!limiter) throw new Error('expected limiter');

    expect(limiter.check('a')).toEqual({ allowed: true, remaining: 1, resetAt: 1_500, retryAfterMs: 0 });
    expect(limiter.check('a')).toEqual({ allowed: true, remaining: 0, resetAt: 1_500, retryAfterMs: 0 });
    now = 1_200;
    expect(limiter.check('a')).toEqual({ allowed: false, remaining: 0, resetAt: 1_500, retryAfterMs: 300 });
    expect(limiter.check('b').allowed).toBe(true);

    now = 1_500;
    expect(limiter.check('a')).toEqual({ allowed: true, remaining: 1, resetAt: 2_000, retryAfterMs: 0 });
  });
});

describe('RateLimitGuard', () => {
  it('passes everything through when limiting is disabled', () => {
    const guard = new RateLimitGuard(null);
    const { context, response } = httpContext('10.0.0.1');

    expect(guard.canActivate(context)).toBe(true);
    expect(response.setHeader).not.toHaveBeenCalled();
  });

  it('rejects clients over the limit with 429', () => {
    const guard = new RateLimitGuard(createRateLimiter(1, 60_000));
    const first = httpContext('10.0.0.2');
    const second = httpContext('10.0.0.2');

    expect(guard.canActivate(first.context)).toBe(true);
    expect(first.response.setHeader).toHaveBeenCalledWith('X-RateLimit-Remaining', '0');

    try {
      guard.canActivate(second.context);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(HttpException);
      if (error instanceof HttpException) {
        expect(error.getStatus()).toBe(HttpStatus.TOO_MANY_REQUESTS);
      }
    }
    expect(second.response.setHeader).toHaveBeenCalledWith('Retry-After', '60');
  });

  it('derives Retry-After from the limiter clock', () => {
    let now = 5_000_000;
    const guard = new RateLimitGuard(createRateLimiter(1, 10_000, () => now));

    expect(guard.canActivate(httpContext('10.0.0.3').context)).toBe(true);

    now += 7_500;
    const blocked = httpContext('10.0.0.3');
    expect(() => guard.canActivate(blocked.context)).toThrow(HttpException);
    expect(blocked.response.setHeader).toHaveBeenCalledWith('Retry-After', '3');
  });
});
