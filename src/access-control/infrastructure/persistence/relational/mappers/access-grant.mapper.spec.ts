import { AccessGrantMapper } from './access-grant.mapper';
import { AccessDefinitionMapper } from './access-definition.mapper';
import { AccessDefinitionEntity } from '../entities/access-definition.entity';
import { RoleAccessGrantEntity } from '../entities/role-access-grant.entity';
import { AccessType } from '../../../../domain/enums/access-type.enum';
import { GrantScope } from '../../../../domain/enums/grant-scope.enum';

function buildDefinitionEntity(accessType: AccessType): AccessDefinitionEntity {
  const entity = new AccessDefinitionEntity();
  entity.id = 3;
  entity.key = 'leads.entitlement';
  entity.name = 'Leads';
  entity.description = 'Lead management';
  entity.accessType = accessType;
  entity.defaultEnabled = true;
  entity.configSchema = { seats: 'number' };
  entity.createdAt = new Date('2026-01-01T00:00:00.000Z');
  entity.updatedAt = new Date('2026-01-02T00:00:00.000Z');
  return entity;
}

describe('AccessDefinitionMapper', () => {
  it('should map each access type onto the union', () => {
    for (const accessType of Object.values(AccessType)) {
      expect(
        AccessDefinitionMapper.toDomain(buildDefinitionEntity(accessType)),
      ).toEqual({
        id: 3,
        key: 'leads.entitlement',
        name: 'Leads',
        description: 'Lead management',
        accessType,
        defaultEnabled: true,
        configSchema: { seats: 'number' },
        createdAt: new Date('2026-01-01T00:00:00.000Z'),
        updatedAt: new Date('2026-01-02T00:00:00.000Z'),
      });
    }
  });
});

describe('AccessGrantMapper', () => {
  it('should carry the scope and the role id as subject', () => {
    const entity = new RoleAccessGrantEntity();
    entity.id = 11;
    entity.subjectId = 4;
    entity.definitionId = 3;
    entity.definition = buildDefinitionEntity(AccessType.PERMISSION);
    entity.isEnabled = false;
    entity.configData = { pageSize: 10 };
    entity.createdAt = new Date('2026-01-03T00:00:00.000Z');
    entity.updatedAt = new Date('2026-01-04T00:00:00.000Z');

    const grant = AccessGrantMapper.toDomain(GrantScope.ROLE, entity);

    expect(grant).toMatchObject({
      id: 11,
      scope: GrantScope.ROLE,
      subjectId: 4,
      isEnabled: false,
      configData: { pageSize: 10 },
      definition: { id: 3, accessType: AccessType.PERMISSION },
    });
  });
});
