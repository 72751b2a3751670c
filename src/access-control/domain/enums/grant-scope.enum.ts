/**
 * Level at which a grant applies.
 *
 * System-wide rules are expressed as roles with no tenant, so there is no
 * separate system scope for grant rows.
 */
export enum GrantScope {
  TENANT = 'tenant',
  ROLE = 'role',
  USER = 'user',
}
