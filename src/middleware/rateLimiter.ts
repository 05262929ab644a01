   import { Request, Response, NextFunction } from 'express';
   import redis from '../config/redis';

   // The subset of the Redis API the limiter needs
   export interface RateLimitStore {
     incr(key: string): Promise<number>;
     pexpire(key: string, milliseconds: number): Promise<number>;
   }

   interface RateLimitConfig {
     windowMs: number;
     maxRequests: number;
     prefix?: string;
   }

   export const rateLimiter = (config: RateLimitConfig, store: RateLimitStore | null = redis) => {
     return async (req: Request, res: Response, next: NextFunction) => {
       if (!store) return next();

       try {
         // Use user ID if authenticated, otherwise IP address
         const identifier = req.userId || req.ip || 'unknown';
         const key = `ratelimit:${config.prefix ?? req.path}:${identifier}`;

         const current = await store.incr(key);

         if (current === 1) {
           // First request, set expiry
           await store.pexpire(key, config.windowMs);
         }

         if (current > config.maxRequests) {
           return res.status(429).json({
             error: {
               code: 'RATE_LIMIT',
               message: `Too many requests. Retry after ${Math.ceil(config.windowMs / 1000)}s`,
             },
           });
         }

         res.setHeader('X-RateLimit-Limit', config.maxRequests);
         res.setHeader('X-RateLimit-Remaining', Math.max(0, config.maxRequests - current));

         next();
       } catch (error) {
         console.error('Rate limiter error:', error);
         // Fail open - allow request if Redis is down
         next();
       }
     };
   };

   export const complaintLimiter = rateLimiter({
     windowMs: 24 * 60 * 60 * 1000, // 1 day
     maxRequests: 10,
     prefix: 'complaints',
   });
