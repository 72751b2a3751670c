import { AccessDefinition } from '../../../../domain/entities/access-definition.entity';
import { AccessType } from '../../../../domain/enums/access-type.enum';
import { AccessDefinitionEntity } from '../entities/access-definition.entity';

export class AccessDefinitionMapper {
  static toDomain(entity: AccessDefinitionEntity): AccessDefinition {
    const base = {
      id: entity.id,
      key: entity.key,
      name: entity.name,
      description: entity.description,
      defaultEnabled: entity.defaultEnabled,
      configSchema: entity.configSchema ?? {},
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };

    switch (entity.accessType) {
      case AccessType.PERMISSION:
        return { ...base, accessType: AccessType.PERMISSION };
      case AccessType.FEATURE_FLAG:
        return { ...base, accessType: AccessType.FEATURE_FLAG };
      case AccessType.ENTITLEMENT:
        return { ...base, accessType: AccessType.ENTITLEMENT };
    }
  }
}
