export {
  FixedWindowRateLimiter,
  createRateLimitPolicy,
  requesterKey,
  DEFAULT_RATE_LIMIT,
  type RateLimiter,
  type RateLimitPolicy,
} from './rate-limiter.js';
