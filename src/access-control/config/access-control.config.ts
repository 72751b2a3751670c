import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Max, Min } from 'class-validator';
import { AccessControlConfig } from './access-control-config.type';
import validateConfig from '../../utils/validate-config';

export const DEFAULT_DECISION_CACHE_TTL_SECONDS = 300;
export const DEFAULT_DECISION_CACHE_CLEANUP_INTERVAL_MS = 60000;
export const DEFAULT_ROLE_HIERARCHY_MAX_DEPTH = 32;

class EnvironmentVariablesValidator {
  @IsInt()
  @Min(0)
  @IsOptional()
  ACCESS_DECISION_CACHE_TTL_SECONDS?: number;

  @IsInt()
  @Min(1000)
  @IsOptional()
  ACCESS_DECISION_CACHE_CLEANUP_INTERVAL_MS?: number;

  @IsInt()
  @Min(1)
  @Max(1000)
  @IsOptional()
  ACCESS_ROLE_HIERARCHY_MAX_DEPTH?: number;
}

export default registerAs<AccessControlConfig>('accessControl', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    // 0 disables decision caching
    decisionCacheTtlSeconds: process.env.ACCESS_DECISION_CACHE_TTL_SECONDS
      ? parseInt(process.env.ACCESS_DECISION_CACHE_TTL_SECONDS, 10)
      : DEFAULT_DECISION_CACHE_TTL_SECONDS,
    decisionCacheCleanupIntervalMs: process.env
      .ACCESS_DECISION_CACHE_CLEANUP_INTERVAL_MS
      ? parseInt(process.env.ACCESS_DECISION_CACHE_CLEANUP_INTERVAL_MS, 10)
      : DEFAULT_DECISION_CACHE_CLEANUP_INTERVAL_MS,
    roleHierarchyMaxDepth: process.env.ACCESS_ROLE_HIERARCHY_MAX_DEPTH
      ? parseInt(process.env.ACCESS_ROLE_HIERARCHY_MAX_DEPTH, 10)
      : DEFAULT_ROLE_HIERARCHY_MAX_DEPTH,
  };
});
