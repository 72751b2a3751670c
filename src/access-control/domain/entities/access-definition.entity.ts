import { AccessType } from '../enums/access-type.enum';

interface AccessDefinitionBase {
  id: number;
  key: string; // Resource key, e.g. "leads.view" (not unique across rows)
  name: string;
  description: string;
  defaultEnabled: boolean;
  configSchema: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Resolved through user grants, then the role chain, then tenant grants
 */
export interface PermissionDefinition extends AccessDefinitionBase {
  accessType: AccessType.PERMISSION;
}

/**
 * On/off toggle resolved only through tenant grants
 */
export interface FeatureFlagDefinition extends AccessDefinitionBase {
  accessType: AccessType.FEATURE_FLAG;
}

/**
 * Plan-gated feature resolved only through tenant grants
 */
export interface EntitlementDefinition extends AccessDefinitionBase {
  accessType: AccessType.ENTITLEMENT;
}

export type AccessDefinition =
  | PermissionDefinition
  | FeatureFlagDefinition
  | EntitlementDefinition;

export type TenantScopedDefinition =
  | FeatureFlagDefinition
  | EntitlementDefinition;

export type NewAccessDefinition = Omit<
  AccessDefinitionBase,
  'id' | 'createdAt' | 'updatedAt'
> & {
  accessType: AccessType;
};

export function isTenantScopedDefinition(
  definition: AccessDefinition,
): definition is TenantScopedDefinition {
  return (
    definition.accessType === AccessType.FEATURE_FLAG ||
    definition.accessType === AccessType.ENTITLEMENT
  );
}
