import { Injectable } from '@nestjs/common';
import {
  AccessDecision,
  AccessDecisionDomainService,
  DEFAULT_ACCESS_ACTION,
} from './domain/services/access-decision.domain.service';
import { AccessConfigDomainService } from './domain/services/access-config.domain.service';
import {
  AvailableResource,
  ResourceCatalogDomainService,
} from './domain/services/resource-catalog.domain.service';
import { AccessGrantDomainService } from './domain/services/access-grant.domain.service';
import { RoleHierarchyDomainService } from './domain/services/role-hierarchy.domain.service';
import { AccessGrantRepository } from './domain/repositories/access-grant.repository.port';
import { AccessSubject } from './domain/entities/access-subject.entity';
import {
  AccessConfigData,
  AccessGrant,
} from './domain/entities/access-grant.entity';
import { RoleNode } from './domain/entities/role.entity';
import { GrantScope } from './domain/enums/grant-scope.enum';
import { AccessType } from './domain/enums/access-type.enum';
import { GrantAccessDto } from './dto/grant-access.dto';
import { RevokeAccessDto } from './dto/revoke-access.dto';

export interface GrantSummary {
  key: string;
  accessType: AccessType;
  isEnabled: boolean;
  scope: GrantScope;
  subjectId: number;
}

export interface UserPermissionsSummary {
  userId: number;
  isSuperuser: boolean;
  tenantId: number | null;
  roleChain: Pick<RoleNode, 'id' | 'name'>[]; // leaf → root
  tenantGrants: GrantSummary[];
  roleGrants: GrantSummary[];
  userGrants: GrantSummary[];
  availableResources: AvailableResource[];
}

/**
 * Access Control Service (Application Layer)
 *
 * Entry point for request-handling code. Delegates decisions, config merge,
 * catalog and mutations to the domain services and assembles the
 * diagnostic permissions summary.
 */
@Injectable()
export class AccessControlService {
  constructor(
    private readonly decisionService: AccessDecisionDomainService,
    private readonly configService: AccessConfigDomainService,
    private readonly catalogService: ResourceCatalogDomainService,
    private readonly grantService: AccessGrantDomainService,
    private readonly roleHierarchy: RoleHierarchyDomainService,
    private readonly grantRepository: AccessGrantRepository,
  ) {}

  hasAccess(
    subject: AccessSubject,
    resourceKey: string,
    action: string = DEFAULT_ACCESS_ACTION,
  ): Promise<boolean> {
    return this.decisionService.hasAccess(subject, resourceKey, action);
  }

  hasAccessWithReason(
    subject: AccessSubject,
    resourceKey: string,
    action: string = DEFAULT_ACCESS_ACTION,
  ): Promise<AccessDecision> {
    return this.decisionService.hasAccessWithReason(
      subject,
      resourceKey,
      action,
    );
  }

  getAccessConfig(
    subject: AccessSubject,
    resourceKey: string,
  ): Promise<AccessConfigData> {
    return this.configService.getAccessConfig(subject, resourceKey);
  }

  getAvailableResources(subject: AccessSubject): Promise<AvailableResource[]> {
    return this.catalogService.getAvailableResources(subject);
  }

  grantAccess(
    subject: AccessSubject,
    input: GrantAccessDto,
  ): Promise<AccessGrant> {
    return this.grantService.grantAccess(subject, input);
  }

  revokeAccess(
    subject: AccessSubject,
    input: RevokeAccessDto,
  ): Promise<boolean> {
    return this.grantService.revokeAccess(subject, input);
  }

  /**
   * Every grant that can apply to the user, enabled or not, plus the
   * resulting catalog. For support and debugging only.
   *
   * @throws RoleHierarchyError when the user's role chain is broken
   */
  async getUserPermissionsSummary(
    subject: AccessSubject,
  ): Promise<UserPermissionsSummary> {
    const roleChain = subject.role
      ? await this.roleHierarchy.getAncestorChain(subject.role)
      : [];

    const tenantGrants = subject.tenant
      ? await this.grantRepository.findBySubject(
          GrantScope.TENANT,
          subject.tenant.id,
        )
      : [];

    const roleGrants: AccessGrant[] = [];
    for (const role of roleChain) {
      roleGrants.push(
        ...(await this.grantRepository.findBySubject(GrantScope.ROLE, role.id)),
      );
    }

    const userGrants = await this.grantRepository.findBySubject(
      GrantScope.USER,
      subject.id,
    );

    return {
      userId: subject.id,
      isSuperuser: subject.isSuperuser,
      tenantId: subject.tenant?.id ?? null,
      roleChain: roleChain.map((role) => ({ id: role.id, name: role.name })),
      tenantGrants: tenantGrants.map(toGrantSummary),
      roleGrants: roleGrants.map(toGrantSummary),
      userGrants: userGrants.map(toGrantSummary),
      availableResources: await this.getAvailableResources(subject),
    };
  }
}

function toGrantSummary(grant: AccessGrant): GrantSummary {
  return {
    key: grant.definition.key,
    accessType: grant.definition.accessType,
    isEnabled: grant.isEnabled,
    scope: grant.scope,
    subjectId: grant.subjectId,
  };
}
