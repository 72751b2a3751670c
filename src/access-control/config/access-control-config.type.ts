export type AccessControlConfig = {
  decisionCacheTtlSeconds: number;
  decisionCacheCleanupIntervalMs: number;
  roleHierarchyMaxDepth: number;
};
