import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { DEFAULT_DECISION_CACHE_CLEANUP_INTERVAL_MS } from '../../config/access-control.config';
import { DecisionCache } from '../../domain/ports/decision-cache.port';

interface CachedDecision {
  value: boolean;
  expiresAt: number;
}

/**
 * In-memory Decision Cache
 *
 * Per-instance TTL cache for access decisions. Expired entries are dropped
 * when read and by a periodic sweep that runs while the module is alive.
 *
 * Not shared between processes: a mutation on one instance only clears that
 * instance's entries. Bind DecisionCache to a shared store for multi-instance
 * deployments.
 */
@Injectable()
export class InMemoryDecisionCache
  extends DecisionCache
  implements OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(InMemoryDecisionCache.name);
  private readonly cache = new Map<string, CachedDecision>();
  private readonly cleanupIntervalMs: number;
  private cleanupTimer?: NodeJS.Timeout;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    super();
    this.cleanupIntervalMs =
      this.configService.get('accessControl.decisionCacheCleanupIntervalMs', {
        infer: true,
      }) ?? DEFAULT_DECISION_CACHE_CLEANUP_INTERVAL_MS;
  }

  onModuleInit(): void {
    this.cleanupTimer = setInterval(() => this.cleanup(), this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  onModuleDestroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  async get(key: string): Promise<boolean | undefined> {
    const cached = this.cache.get(key);

    if (!cached) {
      return undefined;
    }

    if (Date.now() >= cached.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return cached.value;
  }

  async set(key: string, value: boolean, ttlSeconds: number): Promise<void> {
    this.cache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async deletePattern(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    let removed = 0;

    for (const key of Array.from(this.cache.keys())) {
      if (matcher.test(key)) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }

  /**
   * Remove expired cache entries
   */
  private cleanup(): void {
    const now = Date.now();
    let removed = 0;
    for (const [key, cached] of Array.from(this.cache.entries())) {
      if (now >= cached.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug(`Evicted ${removed} expired access decisions`);
    }
  }
}

/**
 * Anchored RegExp for a glob where `*` matches any run of characters
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}$`);
}
