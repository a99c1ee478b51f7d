import type { HttpContext } from '@adonisjs/core/http'
import type { NextFn } from '@adonisjs/core/types/http'

export interface Bucket {
  count: number
  resetTime: number
}

/**
 * Fixed window counters kept in process memory. Windows that have
 * ended are dropped on the next hit, whoever it comes from.
 */
export class RateLimitStore {
  private buckets = new Map<string, Bucket>()

  hit(key: string, windowMs: number, now: number = Date.now()): Bucket {
    this.sweep(now)

    let bucket = this.buckets.get(key)
    if (!bucket) {
      bucket = { count: 0, resetTime: now + windowMs }
      this.buckets.set(key, bucket)
    }
    bucket.count++

    return bucket
  }

  /**
   * Number of clients with an open window
   */
  get size() {
    return this.buckets.size
  }

  private sweep(now: number) {
    for (const [key, bucket] of this.buckets) {
      if (bucket.resetTime <= now) {
        this.buckets.delete(key)
      }
    }
  }
}

const store = new RateLimitStore()

export default class RateLimitMiddleware {
  private static readonly WINDOW_MS = 15 * 60 * 1000
  private static readonly MAX_REQUESTS = 10

  async handle(
    ctx: HttpContext,
    next: NextFn,
    options: { maxRequests?: number; windowMs?: number } = {}
  ) {
    const maxRequests = options.maxRequests ?? RateLimitMiddleware.MAX_REQUESTS
    const windowMs = options.windowMs ?? RateLimitMiddleware.WINDOW_MS

    const now = Date.now()
    const bucket = store.hit(`${ctx.request.ip()}:${ctx.request.url()}`, windowMs, now)

    ctx.response.header('X-RateLimit-Limit', maxRequests)
    ctx.response.header('X-RateLimit-Remaining', Math.max(0, maxRequests - bucket.count))
    ctx.response.header('X-RateLimit-Reset', Math.ceil(bucket.resetTime / 1000))

    if (bucket.count > maxRequests) {
      ctx.response.status(429)
      return ctx.response.json({
        message: 'Too many attempts. Please try again later.',
        retryAfter: Math.ceil((bucket.resetTime - now) / 1000),
      })
    }

    return next()
  }
}
