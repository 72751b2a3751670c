import { AccessDefinitionEntity } from './access-definition.entity';
import { RoleAccessGrantEntity } from './role-access-grant.entity';
import { RoleEntity } from './role.entity';
import { TenantAccessGrantEntity } from './tenant-access-grant.entity';
import { UserAccessGrantEntity } from './user-access-grant.entity';

export {
  AccessDefinitionEntity,
  RoleAccessGrantEntity,
  RoleEntity,
  TenantAccessGrantEntity,
  UserAccessGrantEntity,
};

export const accessControlEntities = [
  AccessDefinitionEntity,
  TenantAccessGrantEntity,
  RoleAccessGrantEntity,
  UserAccessGrantEntity,
  RoleEntity,
];
