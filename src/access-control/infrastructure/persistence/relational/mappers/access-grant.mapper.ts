import { AccessGrant } from '../../../../domain/entities/access-grant.entity';
import { GrantScope } from '../../../../domain/enums/grant-scope.enum';
import { AccessGrantEntity } from '../entities/access-grant.entity';
import { AccessDefinitionMapper } from './access-definition.mapper';

export class AccessGrantMapper {
  // The definition relation must be loaded
  static toDomain(scope: GrantScope, entity: AccessGrantEntity): AccessGrant {
    return {
      id: entity.id,
      scope,
      subjectId: entity.subjectId,
      definition: AccessDefinitionMapper.toDomain(entity.definition),
      isEnabled: entity.isEnabled,
      configData: entity.configData ?? {},
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }
}
