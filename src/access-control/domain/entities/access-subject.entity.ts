import { RoleNode } from './role.entity';

export interface PlanModuleConfig {
  enabled: boolean;
  displayName?: string;
  features?: Record<string, boolean>;
}

export type PlanFeaturesConfig = Record<string, PlanModuleConfig>;

export interface Plan {
  id: number;
  name: string;
  featuresConfig: PlanFeaturesConfig;
}

export interface SubjectTenant {
  id: number;
  name: string;
  plan: Plan | null;
}

/**
 * The already-authenticated user an access question is asked about.
 *
 * Identity, tenant membership and role are resolved by the caller.
 * permissions holds direct app-permission codenames ("<app>.<action>_<model>").
 */
export interface AccessSubject {
  id: number;
  isSuperuser: boolean;
  tenant: SubjectTenant | null;
  role: RoleNode | null;
  permissions?: readonly string[];
}
