import { Role } from '../../../../domain/entities/role.entity';
import { RoleEntity } from '../entities/role.entity';

export class RoleMapper {
  static toDomain(entity: RoleEntity): Role {
    return {
      id: entity.id,
      name: entity.name,
      description: entity.description,
      tenantId: entity.tenantId ?? null,
      parentId: entity.parentId ?? null,
      isSystemRole: entity.isSystemRole,
      isAssignable: entity.isAssignable,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
