import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { DEFAULT_DECISION_CACHE_TTL_SECONDS } from '../../config/access-control.config';
import { AuditService, AccessEventType } from '../../../audit/audit.service';
import { AccessDefinitionRepository } from '../repositories/access-definition.repository.port';
import { AccessGrantRepository } from '../repositories/access-grant.repository.port';
import { DecisionCache } from '../ports/decision-cache.port';
import { DirectPermissionChecker } from '../ports/direct-permission-checker.port';
import { PlanAccessChecker } from '../ports/plan-access-checker.port';
import { RoleHierarchyDomainService } from './role-hierarchy.domain.service';
import { RoleHierarchyError } from '../errors/role-hierarchy.error';
import { AccessType } from '../enums/access-type.enum';
import { GrantScope } from '../enums/grant-scope.enum';
import {
  PermissionDefinition,
  TenantScopedDefinition,
} from '../entities/access-definition.entity';
import {
  AccessSubject,
  SubjectTenant,
} from '../entities/access-subject.entity';
import {
  buildDecisionCacheKey,
  toPermissionCodename,
} from '../utils/resource-key.util';
import { describeError } from '../../../utils/describe-error';

export const DEFAULT_ACCESS_ACTION = 'access';

const BILLING_NAMESPACE = 'billing.';
const BILLING_DASHBOARD_KEY = 'billing.dashboard';
const BILLING_ADMIN_SEGMENT = '.admin.';
const BILLING_MODULE = 'billing';

export interface AccessDecision {
  result: boolean;
  reasons: string[];
}

type TraceFn = (reason: string) => void;

/**
 * AccessDecisionDomainService
 *
 * Decides whether a subject may perform an action on a resource key.
 *
 * Resolution order (first grant wins):
 * 1. Superuser
 * 2. Direct app permission "<namespace>.<action>_<resource>"
 * 3. AccessDefinition lookup (missing → deny)
 * 4. feature_flag / entitlement: enabled tenant grant decides
 * 5. permission: user grant → role chain (leaf → root) → tenant grant
 * 6. billing.* keys: plan "billing" module flag, except ".admin." keys
 * 7. Deny
 *
 * hasAccess and hasAccessWithReason share one evaluator, so the boolean
 * outcome is always identical. Only hasAccess goes through the cache.
 */
@Injectable()
export class AccessDecisionDomainService {
  private readonly logger = new Logger(AccessDecisionDomainService.name);
  private readonly cacheTtlSeconds: number;

  constructor(
    private readonly definitionRepository: AccessDefinitionRepository,
    private readonly grantRepository: AccessGrantRepository,
    private readonly roleHierarchy: RoleHierarchyDomainService,
    private readonly directPermissionChecker: DirectPermissionChecker,
    private readonly planAccessChecker: PlanAccessChecker,
    private readonly decisionCache: DecisionCache,
    private readonly auditService: AuditService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.cacheTtlSeconds =
      this.configService.get('accessControl.decisionCacheTtlSeconds', {
        infer: true,
      }) ?? DEFAULT_DECISION_CACHE_TTL_SECONDS;
  }

  /**
   * Check access, reading and filling the decision cache
   */
  async hasAccess(
    subject: AccessSubject,
    resourceKey: string,
    action: string = DEFAULT_ACCESS_ACTION,
  ): Promise<boolean> {
    const cacheKey = buildDecisionCacheKey(subject.id, resourceKey, action);

    const cached = await this.readCache(cacheKey);
    if (cached !== undefined) {
      return cached;
    }

    const result = await this.evaluate(subject, resourceKey, action);
    await this.writeCache(cacheKey, result);

    return result;
  }

  /**
   * Check access and return the trace of every step consulted.
   * Bypasses the cache so the trace always reflects current data.
   */
  async hasAccessWithReason(
    subject: AccessSubject,
    resourceKey: string,
    action: string = DEFAULT_ACCESS_ACTION,
  ): Promise<AccessDecision> {
    const reasons: string[] = [];
    const result = await this.evaluate(subject, resourceKey, action, (reason) =>
      reasons.push(reason),
    );
    return { result, reasons };
  }

  private async evaluate(
    subject: AccessSubject,
    resourceKey: string,
    action: string,
    trace: TraceFn = () => undefined,
  ): Promise<boolean> {
    try {
      return await this.resolve(subject, resourceKey, action, trace);
    } catch (error) {
      if (!(error instanceof RoleHierarchyError)) {
        throw error;
      }
      // Broken hierarchy data: fail closed for this decision
      this.logger.error(
        `Denying "${resourceKey}" for user ${subject.id}: ${error.message}`,
      );
      this.auditService.logAccessEvent({
        actorId: subject.id,
        tenantId: subject.tenant?.id,
        event: AccessEventType.ROLE_HIERARCHY_INVALID,
        resourceKey,
        success: false,
        errorMessage: error.message,
        metadata: { roleIds: error.roleIds },
      });
      trace(`Denied: ${error.message}`);
      return false;
    }
  }

  private async resolve(
    subject: AccessSubject,
    resourceKey: string,
    action: string,
    trace: TraceFn,
  ): Promise<boolean> {
    if (subject.isSuperuser) {
      trace('Granted: user is a superuser');
      return true;
    }

    if (await this.checkDirectPermission(subject, resourceKey, action, trace)) {
      return true;
    }

    const definition = await this.definitionRepository.findByKey(resourceKey);
    if (!definition) {
      trace(`Denied: no access definition for "${resourceKey}"`);
      return false;
    }
    trace(
      `Found definition "${definition.key}" of type ${definition.accessType}`,
    );

    switch (definition.accessType) {
      case AccessType.FEATURE_FLAG:
      case AccessType.ENTITLEMENT:
        if (subject.tenant) {
          return this.resolveTenantScoped(subject.tenant, definition, trace);
        }
        trace('Skipped tenant grant check: user has no tenant');
        break;
      case AccessType.PERMISSION:
        if (await this.resolvePermission(subject, definition, trace)) {
          return true;
        }
        break;
      default:
        return assertUnreachable(definition);
    }

    const billingDecision = await this.resolveBillingFallback(
      subject,
      resourceKey,
      trace,
    );
    if (billingDecision !== null) {
      return billingDecision;
    }

    trace('Denied: no enabled grant at any scope');
    return false;
  }

  private async checkDirectPermission(
    subject: AccessSubject,
    resourceKey: string,
    action: string,
    trace: TraceFn,
  ): Promise<boolean> {
    const codename = toPermissionCodename(resourceKey, action);
    if (!codename) {
      trace(`Skipped direct permission check: "${resourceKey}" has no "."`);
      return false;
    }

    try {
      if (await this.directPermissionChecker.hasPermission(subject, codename)) {
        trace(`Granted: direct permission "${codename}"`);
        return true;
      }
    } catch (error) {
      this.logger.warn(
        `Direct permission check "${codename}" failed for user ${subject.id}: ${describeError(error)}`,
      );
      trace(`Direct permission check "${codename}" failed; treated as not granted`);
      return false;
    }

    trace(`No direct permission "${codename}"`);
    return false;
  }

  private async resolveTenantScoped(
    tenant: SubjectTenant,
    definition: TenantScopedDefinition,
    trace: TraceFn,
  ): Promise<boolean> {
    const granted = await this.hasEnabledGrant(
      GrantScope.TENANT,
      tenant.id,
      definition.id,
    );
    trace(
      granted
        ? `Granted: enabled tenant grant for tenant ${tenant.id}`
        : `Denied: no enabled tenant grant for tenant ${tenant.id}`,
    );
    return granted;
  }

  private async resolvePermission(
    subject: AccessSubject,
    definition: PermissionDefinition,
    trace: TraceFn,
  ): Promise<boolean> {
    if (await this.hasEnabledGrant(GrantScope.USER, subject.id, definition.id)) {
      trace(`Granted: enabled user grant for user ${subject.id}`);
      return true;
    }
    trace(`No enabled user grant for user ${subject.id}`);

    const assignedRole = subject.role;
    if (assignedRole) {
      for await (const role of this.roleHierarchy.walkUp(assignedRole)) {
        if (await this.hasEnabledGrant(GrantScope.ROLE, role.id, definition.id)) {
          trace(
            role.id === assignedRole.id
              ? `Granted: enabled grant on role "${role.name}"`
              : `Granted: enabled grant on ancestor role "${role.name}"`,
          );
          return true;
        }
        trace(`No enabled grant on role "${role.name}"`);
      }
    } else {
      trace('Skipped role grants: user has no role');
    }

    if (subject.tenant) {
      if (
        await this.hasEnabledGrant(
          GrantScope.TENANT,
          subject.tenant.id,
          definition.id,
        )
      ) {
        trace(`Granted: enabled tenant grant for tenant ${subject.tenant.id}`);
        return true;
      }
      trace(`No enabled tenant grant for tenant ${subject.tenant.id}`);
    }

    return false;
  }

  /**
   * @returns The plan's billing flag, or null when the fallback does not apply
   */
  private async resolveBillingFallback(
    subject: AccessSubject,
    resourceKey: string,
    trace: TraceFn,
  ): Promise<boolean | null> {
    if (!resourceKey.startsWith(BILLING_NAMESPACE)) {
      return null;
    }

    const plan = subject.tenant?.plan;
    if (!plan) {
      trace('Skipped billing fallback: user has no tenant plan');
      return null;
    }

    if (
      resourceKey !== BILLING_DASHBOARD_KEY &&
      resourceKey.includes(BILLING_ADMIN_SEGMENT)
    ) {
      trace('Skipped billing fallback: admin billing keys need an explicit grant');
      return null;
    }

    try {
      const enabled = await this.planAccessChecker.getModuleAccess(
        plan,
        BILLING_MODULE,
      );
      trace(
        enabled
          ? `Granted: plan "${plan.name}" includes the billing module`
          : `Denied: plan "${plan.name}" does not include the billing module`,
      );
      return enabled;
    } catch (error) {
      this.logger.warn(
        `Plan module lookup failed for plan ${plan.id}: ${describeError(error)}`,
      );
      trace('Denied: plan module lookup failed');
      return false;
    }
  }

  private async hasEnabledGrant(
    scope: GrantScope,
    subjectId: number,
    definitionId: number,
  ): Promise<boolean> {
    const grant = await this.grantRepository.findOne(
      scope,
      subjectId,
      definitionId,
    );
    return grant?.isEnabled ?? false;
  }

  private async readCache(cacheKey: string): Promise<boolean | undefined> {
    try {
      return await this.decisionCache.get(cacheKey);
    } catch (error) {
      this.logger.warn(
        `Decision cache read failed, computing fresh: ${describeError(error)}`,
      );
      return undefined;
    }
  }

  private async writeCache(cacheKey: string, result: boolean): Promise<void> {
    if (this.cacheTtlSeconds <= 0) {
      return;
    }
    try {
      await this.decisionCache.set(cacheKey, result, this.cacheTtlSeconds);
    } catch (error) {
      this.logger.warn(`Decision cache write failed: ${describeError(error)}`);
    }
  }
}

function assertUnreachable(value: never): never {
  throw new Error(`Unhandled access definition: ${JSON.stringify(value)}`);
}
