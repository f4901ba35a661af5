import { HttpException, HttpStatus, type Type } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { InMemoryRateLimitStore } from '../../../test/fakes/collaborators';
import { RateLimiterService } from '../application/rate-limiter.service';
import { RateLimit, SkipRateLimit } from './rate-limit.decorator';
import { RateLimitGuard } from './rate-limit.guard';

class BooksController {
  @RateLimit(1)
  create() {
    return 'created';
  }

  list() {
    return [];
  }
}

@SkipRateLimit()
class HooksController {
  receive() {
    return 'ok';
  }
}

describe('RateLimitGuard', () => {
  let store: InMemoryRateLimitStore;
  let reply: { header: jest.Mock };

  const guardWith = (enabled = true) =>
    new RateLimitGuard(
      new Reflector(),
      new RateLimiterService(
        store,
        new ConfigService({ rateLimit: { enabled, requestsPerMinute: 200 } }),
      ),
    );

  const contextFor = (controller: Type<unknown>, handler: () => unknown) =>
    new ExecutionContextHost([{ ip: '203.0.113.5' }, reply], controller, handler);

  beforeEach(() => {
    jest.useFakeTimers().setSystemTime(new Date('2026-03-10T12:00:30Z'));
    store = new InMemoryRateLimitStore();
    reply = { header: jest.fn() };
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('answers 429 with Retry-After once a route limit is spent', async () => {
    const guard = guardWith();
    const context = contextFor(BooksController, BooksController.prototype.create);

    await expect(guard.canActivate(context)).resolves.toBe(true);
    const error = await guard.canActivate(context).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpException);
    expect(error instanceof HttpException && error.getStatus()).toBe(HttpStatus.TOO_MANY_REQUESTS);
    expect(reply.header).toHaveBeenCalledWith('Retry-After', 30);
    expect(reply.header).toHaveBeenCalledWith('X-RateLimit-Remaining', 0);
  });

  it('applies the configured limit to routes without their own', async () => {
    const guard = guardWith();

    await guard.canActivate(contextFor(BooksController, BooksController.prototype.list));

    expect(reply.header).toHaveBeenCalledWith('X-RateLimit-Limit', 200);
    expect(reply.header).toHaveBeenCalledWith('X-RateLimit-Remaining', 199);
  });

  it('does not count routes that opt out', async () => {
    const guard = guardWith();

    await expect(
      guard.canActivate(contextFor(HooksController, HooksController.prototype.receive)),
    ).resolves.toBe(true);
    expect(store.counters.size).toBe(0);
  });

  it('does not count anything when disabled', async () => {
    const guard = guardWith(false);

    await expect(
      guard.canActivate(contextFor(BooksController, BooksController.prototype.create)),
    ).resolves.toBe(true);
    expect(store.counters.size).toBe(0);
  });
});
