import { Injectable } from '@nestjs/common';
import { AccessDefinitionRepository } from '../repositories/access-definition.repository.port';
import { AccessGrantRepository } from '../repositories/access-grant.repository.port';
import { RoleHierarchyDomainService } from './role-hierarchy.domain.service';
import { GrantScope } from '../enums/grant-scope.enum';
import { AccessConfigData } from '../entities/access-grant.entity';
import { AccessSubject } from '../entities/access-subject.entity';

/**
 * AccessConfigDomainService
 *
 * Computes the effective config of a resource for a user by layering grant
 * config_data: tenant → role chain (root → leaf) → user. Each layer is a
 * shallow merge; later layers overwrite only the keys they define.
 *
 * Only enabled grants contribute. The result says nothing about whether
 * access is granted; callers check that separately.
 */
@Injectable()
export class AccessConfigDomainService {
  constructor(
    private readonly definitionRepository: AccessDefinitionRepository,
    private readonly grantRepository: AccessGrantRepository,
    private readonly roleHierarchy: RoleHierarchyDomainService,
  ) {}

  /**
   * @throws RoleHierarchyError when the user's role chain is broken
   */
  async getAccessConfig(
    subject: AccessSubject,
    resourceKey: string,
  ): Promise<AccessConfigData> {
    const definition = await this.definitionRepository.findByKey(resourceKey);
    if (!definition) {
      return {};
    }

    const layers: AccessConfigData[] = [];

    if (subject.tenant) {
      layers.push(
        await this.enabledConfig(
          GrantScope.TENANT,
          subject.tenant.id,
          definition.id,
        ),
      );
    }

    if (subject.role) {
      const chain = await this.roleHierarchy.getRootToLeafChain(subject.role);
      for (const role of chain) {
        layers.push(
          await this.enabledConfig(GrantScope.ROLE, role.id, definition.id),
        );
      }
    }

    layers.push(
      await this.enabledConfig(GrantScope.USER, subject.id, definition.id),
    );

    return layers.reduce<AccessConfigData>(
      (merged, layer) => ({ ...merged, ...layer }),
      {},
    );
  }

  private async enabledConfig(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): Promise<AccessConfigData> {
    const grant = await this.grantRepository.findOne(
      scope,
      subjectId,
      definitionId,
    );
    return grant?.isEnabled ? grant.configData : {};
  }
}
