import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeleteResult, Repository } from 'typeorm';
import { AccessGrantEntity } from '../entities/access-grant.entity';
import { TenantAccessGrantEntity } from '../entities/tenant-access-grant.entity';
import { RoleAccessGrantEntity } from '../entities/role-access-grant.entity';
import { UserAccessGrantEntity } from '../entities/user-access-grant.entity';
import { AccessGrantMapper } from '../mappers/access-grant.mapper';
import { AccessGrantRepository } from '../../../../domain/repositories/access-grant.repository.port';
import {
  AccessGrant,
  AccessGrantState,
} from '../../../../domain/entities/access-grant.entity';
import { GrantScope } from '../../../../domain/enums/grant-scope.enum';
import { NullableType } from '../../../../../utils/types/nullable.type';

/**
 * One repository over the three grant tables; the scope picks the table.
 */
@Injectable()
export class AccessGrantRelationalRepository implements AccessGrantRepository {
  constructor(
    @InjectRepository(TenantAccessGrantEntity)
    private readonly tenantGrants: Repository<TenantAccessGrantEntity>,
    @InjectRepository(RoleAccessGrantEntity)
    private readonly roleGrants: Repository<RoleAccessGrantEntity>,
    @InjectRepository(UserAccessGrantEntity)
    private readonly userGrants: Repository<UserAccessGrantEntity>,
  ) {}

  async findOne(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): Promise<NullableType<AccessGrant>> {
    const entity = await this.findEntity(scope, subjectId, definitionId);
    return entity ? AccessGrantMapper.toDomain(scope, entity) : null;
  }

  async findBySubject(
    scope: GrantScope,
    subjectId: number,
  ): Promise<AccessGrant[]> {
    const options = {
      where: { subjectId },
      relations: { definition: true },
      order: { id: 'ASC' as const },
    };

    let entities: AccessGrantEntity[];
    switch (scope) {
      case GrantScope.TENANT:
        entities = await this.tenantGrants.find(options);
        break;
      case GrantScope.ROLE:
        entities = await this.roleGrants.find(options);
        break;
      case GrantScope.USER:
        entities = await this.userGrants.find(options);
        break;
    }

    return entities.map((entity) => AccessGrantMapper.toDomain(scope, entity));
  }

  async upsert(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
    state: AccessGrantState,
  ): Promise<AccessGrant> {
    const entity =
      (await this.findEntity(scope, subjectId, definitionId)) ??
      this.newEntity(scope, subjectId, definitionId);

    entity.isEnabled = state.isEnabled;
    entity.configData = state.configData;
    // The manager is shared; it picks the table from the entity class
    await this.tenantGrants.manager.save(entity);

    // Reload so the definition relation is populated
    const saved = await this.findEntity(scope, subjectId, definitionId);
    if (!saved) {
      throw new Error(
        `Grant of definition ${definitionId} to ${scope} ${subjectId} was not persisted`,
      );
    }
    return AccessGrantMapper.toDomain(scope, saved);
  }

  async delete(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): Promise<boolean> {
    const criteria = { subjectId, definitionId };

    let result: DeleteResult;
    switch (scope) {
      case GrantScope.TENANT:
        result = await this.tenantGrants.delete(criteria);
        break;
      case GrantScope.ROLE:
        result = await this.roleGrants.delete(criteria);
        break;
      case GrantScope.USER:
        result = await this.userGrants.delete(criteria);
        break;
    }

    return (result.affected ?? 0) > 0;
  }

  private async findEntity(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): Promise<AccessGrantEntity | null> {
    const options = {
      where: { subjectId, definitionId },
      relations: { definition: true },
    };

    switch (scope) {
      case GrantScope.TENANT:
        return this.tenantGrants.findOne(options);
      case GrantScope.ROLE:
        return this.roleGrants.findOne(options);
      case GrantScope.USER:
        return this.userGrants.findOne(options);
    }
  }

  private newEntity(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): AccessGrantEntity {
    let entity: AccessGrantEntity;
    switch (scope) {
      case GrantScope.TENANT:
        entity = new TenantAccessGrantEntity();
        break;
      case GrantScope.ROLE:
        entity = new RoleAccessGrantEntity();
        break;
      case GrantScope.USER:
        entity = new UserAccessGrantEntity();
        break;
    }
    entity.subjectId = subjectId;
    entity.definitionId = definitionId;
    return entity;
  }
}
