import { CanActivate, ExecutionContext, HttpException, HttpStatus, Inject, Injectable } from '@nestjs/common';
import type { Request, Response } from 'express';
import { RATE_LIMITER } from '../modules/tokens';
import type { RateLimiter } from './rate-limiter';

@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(@Inject(RATE_LIMITER) private readonly limiter: RateLimiter | null) {}

  canActivate(context: ExecutionContext): boolean {
    if (!this.limiter || context.getType() !== 'http') {
      return true;
    }

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const key = request.ip ?? request.socket.remoteAddress ?? 'unknown';
    const decision = this.limiter.check(key);

    response.setHeader('X-RateLimit-Limit', String(this.limiter.limit));
    response.setHeader('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      const retryAfterSeconds = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
      response.setHeader('Retry-After', String(retryAfterSeconds));
      throw new HttpException({ message: 'Rate limit exceeded' }, HttpStatus.TOO_MANY_REQUESTS);
    }

    return true;
  }
}
