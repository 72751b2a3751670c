const DECISION_CACHE_PREFIX = 'access';

export function buildDecisionCacheKey(
  userId: number,
  resourceKey: string,
  action: string,
): string {
  return `${DECISION_CACHE_PREFIX}_${userId}_${resourceKey}_${action}`;
}

/**
 * Glob pattern matching every cached decision of one user
 */
export function buildUserDecisionPattern(userId: number): string {
  return `${DECISION_CACHE_PREFIX}_${userId}_*`;
}

/**
 * Derive the app-permission codename for a resource key and action.
 *
 * "leads.view" + "access" → "leads.access_view". Only the first "." splits,
 * so "billing.admin.plans" + "edit" → "billing.edit_admin.plans".
 * Keys without a "." have no codename.
 */
export function toPermissionCodename(
  resourceKey: string,
  action: string,
): string | null {
  const separator = resourceKey.indexOf('.');
  if (separator === -1) {
    return null;
  }
  const namespace = resourceKey.slice(0, separator);
  const resource = resourceKey.slice(separator + 1);
  return `${namespace}.${action}_${resource}`;
}

/**
 * Truncate a key at its last "." ("leads.entitlement" → "leads").
 * Keys without a "." are their own base.
 */
export function toBaseResourceKey(resourceKey: string): string {
  const separator = resourceKey.lastIndexOf('.');
  return separator === -1 ? resourceKey : resourceKey.slice(0, separator);
}
