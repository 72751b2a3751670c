import {
  BadRequestException,
  HttpStatus,
  Injectable,
  Logger,
} from '@nestjs/common';
import { AccessDefinitionRepository } from '../repositories/access-definition.repository.port';
import { AccessGrantRepository } from '../repositories/access-grant.repository.port';
import { DecisionCache } from '../ports/decision-cache.port';
import { AuditService, AccessEventType } from '../../../audit/audit.service';
import { GrantScope } from '../enums/grant-scope.enum';
import { AccessType } from '../enums/access-type.enum';
import { AccessDefinition } from '../entities/access-definition.entity';
import { AccessGrant } from '../entities/access-grant.entity';
import { AccessSubject } from '../entities/access-subject.entity';
import { GrantAccessDto } from '../../dto/grant-access.dto';
import { RevokeAccessDto } from '../../dto/revoke-access.dto';
import { buildUserDecisionPattern } from '../utils/resource-key.util';
import { validateInput } from '../../../utils/validate-input';
import { describeError } from '../../../utils/describe-error';

/**
 * AccessGrantDomainService
 *
 * Handles grant creation and revocation.
 *
 * The grant subject is derived from the acting user:
 * - user scope   → the user
 * - role scope   → the user's role
 * - tenant scope → the user's tenant
 *
 * After every mutation only the acting user's cached decisions are cleared.
 * Other members of an affected role or tenant keep their cached decisions
 * until the cache TTL expires.
 */
@Injectable()
export class AccessGrantDomainService {
  private readonly logger = new Logger(AccessGrantDomainService.name);

  constructor(
    private readonly definitionRepository: AccessDefinitionRepository,
    private readonly grantRepository: AccessGrantRepository,
    private readonly decisionCache: DecisionCache,
    private readonly auditService: AuditService,
  ) {}

  /**
   * Grant a resource at one scope
   *
   * Validation:
   * - Input must pass GrantAccessDto rules
   * - Role/tenant scope requires the user to have a role/tenant
   * - Role and user scope only take permission definitions
   *
   * The definition is created on first use. An existing grant for the same
   * scope subject and definition is replaced, so one row exists afterwards.
   *
   * @throws BadRequestException on invalid input, a missing scope subject or
   * a non-permission definition at role or user scope
   */
  async grantAccess(
    subject: AccessSubject,
    input: GrantAccessDto,
  ): Promise<AccessGrant> {
    const dto = validateInput(GrantAccessDto, input);
    const subjectId = this.resolveScopeSubjectId(subject, dto.scope);

    const existing = await this.definitionRepository.findByKey(dto.resourceKey);
    this.assertScopeAcceptsType(
      dto.scope,
      existing?.accessType ?? dto.accessType,
    );
    const definition = existing ?? (await this.createDefinition(dto));

    const grant = await this.grantRepository.upsert(
      dto.scope,
      subjectId,
      definition.id,
      {
        isEnabled: dto.isEnabled ?? true,
        configData: dto.configData ?? {},
      },
    );

    await this.invalidateDecisions(subject);

    this.auditService.logAccessEvent({
      actorId: subject.id,
      tenantId: subject.tenant?.id,
      event: AccessEventType.ACCESS_GRANTED,
      resourceKey: definition.key,
      scope: dto.scope,
      subjectId,
      success: true,
      metadata: { isEnabled: grant.isEnabled },
    });

    return grant;
  }

  /**
   * Remove the grant of a resource at one scope
   *
   * @returns false when the definition or grant did not exist
   * @throws BadRequestException on invalid input or a missing scope subject
   */
  async revokeAccess(
    subject: AccessSubject,
    input: RevokeAccessDto,
  ): Promise<boolean> {
    const dto = validateInput(RevokeAccessDto, input);
    const subjectId = this.resolveScopeSubjectId(subject, dto.scope);

    const definition = await this.definitionRepository.findByKey(
      dto.resourceKey,
    );
    const removed = definition
      ? await this.grantRepository.delete(dto.scope, subjectId, definition.id)
      : false;

    await this.invalidateDecisions(subject);

    this.auditService.logAccessEvent({
      actorId: subject.id,
      tenantId: subject.tenant?.id,
      event: removed
        ? AccessEventType.ACCESS_REVOKED
        : AccessEventType.ACCESS_REVOKE_NOT_FOUND,
      resourceKey: dto.resourceKey,
      scope: dto.scope,
      subjectId,
      success: removed,
    });

    return removed;
  }

  // Feature flags and entitlements are only read from tenant grants
  private assertScopeAcceptsType(
    scope: GrantScope,
    accessType: AccessType,
  ): void {
    if (scope === GrantScope.TENANT || accessType === AccessType.PERMISSION) {
      return;
    }
    throw new BadRequestException({
      status: HttpStatus.BAD_REQUEST,
      errors: {
        resourceKey: `${accessType} resources can only be granted at tenant scope`,
      },
    });
  }

  private async createDefinition(
    dto: GrantAccessDto,
  ): Promise<AccessDefinition> {
    this.logger.log(
      `Creating ${dto.accessType} definition "${dto.resourceKey}"`,
    );
    return this.definitionRepository.create({
      key: dto.resourceKey,
      name: dto.name ?? dto.resourceKey,
      description: dto.description ?? '',
      accessType: dto.accessType,
      defaultEnabled: true,
      configSchema: {},
    });
  }

  private resolveScopeSubjectId(
    subject: AccessSubject,
    scope: GrantScope,
  ): number {
    switch (scope) {
      case GrantScope.USER:
        return subject.id;
      case GrantScope.ROLE:
        if (!subject.role) {
          throw new BadRequestException(
            'Cannot use role scope: user has no role',
          );
        }
        return subject.role.id;
      case GrantScope.TENANT:
        if (!subject.tenant) {
          throw new BadRequestException(
            'Cannot use tenant scope: user has no tenant',
          );
        }
        return subject.tenant.id;
    }
  }

  private async invalidateDecisions(subject: AccessSubject): Promise<void> {
    try {
      await this.decisionCache.deletePattern(
        buildUserDecisionPattern(subject.id),
      );
    } catch (error) {
      this.logger.warn(
        `Decision cache invalidation failed for user ${subject.id}: ${describeError(error)}`,
      );
    }
  }
}
