import { Injectable } from '@nestjs/common';
import { AccessGrantRepository } from '../repositories/access-grant.repository.port';
import { RoleHierarchyDomainService } from './role-hierarchy.domain.service';
import { GrantScope } from '../enums/grant-scope.enum';
import { AccessType } from '../enums/access-type.enum';
import { AccessGrant } from '../entities/access-grant.entity';
import { AccessSubject } from '../entities/access-subject.entity';
import { isTenantScopedDefinition } from '../entities/access-definition.entity';
import { toBaseResourceKey } from '../utils/resource-key.util';

export interface AvailableResource {
  key: string; // Base key, e.g. "leads" for "leads.entitlement"
  name: string;
  description: string;
}

/**
 * ResourceCatalogDomainService
 *
 * Lists the apps/resources a user can see, from the same grants the
 * decision resolver inspects:
 * - enabled tenant grants of feature_flag / entitlement definitions
 * - enabled role grants of permission definitions, user's role first,
 *   then each ancestor
 * - enabled user grants of permission definitions
 *
 * Entries are de-duplicated by base key; the first source seen wins.
 */
@Injectable()
export class ResourceCatalogDomainService {
  constructor(
    private readonly grantRepository: AccessGrantRepository,
    private readonly roleHierarchy: RoleHierarchyDomainService,
  ) {}

  async getAvailableResources(
    subject: AccessSubject,
  ): Promise<AvailableResource[]> {
    if (!subject.tenant) {
      return [];
    }

    const grants: AccessGrant[] = [];

    const tenantGrants = await this.grantRepository.findBySubject(
      GrantScope.TENANT,
      subject.tenant.id,
    );
    grants.push(
      ...tenantGrants.filter((grant) =>
        isTenantScopedDefinition(grant.definition),
      ),
    );

    if (subject.role) {
      const chain = await this.roleHierarchy.getAncestorChain(subject.role);
      for (const role of chain) {
        const roleGrants = await this.grantRepository.findBySubject(
          GrantScope.ROLE,
          role.id,
        );
        grants.push(...roleGrants.filter(isPermissionGrant));
      }
    }

    const userGrants = await this.grantRepository.findBySubject(
      GrantScope.USER,
      subject.id,
    );
    grants.push(...userGrants.filter(isPermissionGrant));

    const resources = new Map<string, AvailableResource>();
    for (const grant of grants) {
      if (!grant.isEnabled) {
        continue;
      }
      const baseKey = toBaseResourceKey(grant.definition.key);
      if (!resources.has(baseKey)) {
        resources.set(baseKey, {
          key: baseKey,
          name: grant.definition.name,
          description: grant.definition.description,
        });
      }
    }

    return Array.from(resources.values());
  }
}

function isPermissionGrant(grant: AccessGrant): boolean {
  return grant.definition.accessType === AccessType.PERMISSION;
}
