import { GrantScope } from '../enums/grant-scope.enum';
import { AccessDefinition } from './access-definition.entity';

export type AccessConfigData = Record<string, unknown>;

/**
 * Domain entity for a scope-qualified grant of an AccessDefinition.
 *
 * subjectId is the tenant, role or user ID depending on scope.
 * isEnabled=false means "not granted at this scope", never a revocation of
 * grants found at other scopes.
 */
export interface AccessGrant {
  id: number;
  scope: GrantScope;
  subjectId: number;
  definition: AccessDefinition;
  isEnabled: boolean;
  configData: AccessConfigData;
  createdAt: Date;
  updatedAt: Date;
}

export type AccessGrantState = Pick<AccessGrant, 'isEnabled' | 'configData'>;
