import { BadRequestException } from '@nestjs/common';
import { AccessGrantDomainService } from './access-grant.domain.service';
import { AccessDecisionDomainService } from './access-decision.domain.service';
import { AccessType } from '../enums/access-type.enum';
import { GrantScope } from '../enums/grant-scope.enum';
import { AccessEventType } from '../../../audit/audit.service';
import { InMemoryDecisionCache } from '../../infrastructure/cache/in-memory-decision-cache';
import { InMemoryAccessStore } from '../../../../test/utils/in-memory-access-store';
import {
  AccessControlTestContext,
  TEST_TENANT_ID,
  TEST_USER_ID,
  buildConfigService,
  buildSubject,
  createAccessControlTestContext,
} from '../../../../test/utils/access-control-fixtures';

class UnreachableInvalidationCache extends InMemoryDecisionCache {
  async deletePattern(): Promise<number> {
    throw new Error('cache down');
  }
}

describe('AccessGrantDomainService', () => {
  let context: AccessControlTestContext;
  let store: InMemoryAccessStore;
  let service: AccessGrantDomainService;

  beforeEach(async () => {
    context = await createAccessControlTestContext();
    store = context.store;
    service = context.module.get(AccessGrantDomainService);
  });

  describe('grantAccess', () => {
    it('should create the definition and a user grant', async () => {
      const grant = await service.grantAccess(buildSubject(), {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.USER,
      });

      expect(grant).toMatchObject({
        scope: GrantScope.USER,
        subjectId: TEST_USER_ID,
        isEnabled: true,
        configData: {},
        definition: {
          key: 'leads.view',
          name: 'leads.view',
          description: '',
          accessType: AccessType.PERMISSION,
          defaultEnabled: true,
          configSchema: {},
        },
      });
      expect(store.definitions).toHaveLength(1);
      expect(store.grants).toHaveLength(1);
    });

    it('should name a new definition from the input', async () => {
      const grant = await service.grantAccess(buildSubject(), {
        resourceKey: 'reports.beta',
        accessType: AccessType.FEATURE_FLAG,
        scope: GrantScope.TENANT,
        name: 'Beta reports',
        description: 'Early access reporting',
      });

      expect(grant.definition).toMatchObject({
        name: 'Beta reports',
        description: 'Early access reporting',
        accessType: AccessType.FEATURE_FLAG,
      });
    });

    it('should keep the access type of an existing definition', async () => {
      const existing = store.addDefinition('leads.view');

      const grant = await service.grantAccess(buildSubject(), {
        resourceKey: 'leads.view',
        accessType: AccessType.FEATURE_FLAG,
        scope: GrantScope.USER,
      });

      expect(grant.definition).toBe(existing);
      expect(store.definitions).toHaveLength(1);
    });

    it('should reject a new feature flag at user scope', async () => {
      const error = await service
        .grantAccess(buildSubject(), {
          resourceKey: 'reports.beta',
          accessType: AccessType.FEATURE_FLAG,
          scope: GrantScope.USER,
        })
        .catch((caught: unknown) => caught);

      expect(
        error instanceof BadRequestException ? error.getResponse() : null,
      ).toEqual({
        status: 400,
        errors: {
          resourceKey:
            'feature_flag resources can only be granted at tenant scope',
        },
      });
      expect(store.definitions).toHaveLength(0);
      expect(store.grants).toHaveLength(0);
    });

    it('should reject an existing entitlement at role scope', async () => {
      store.addDefinition('leads.entitlement', AccessType.ENTITLEMENT);
      const role = store.addRole('Agent');

      await expect(
        service.grantAccess(buildSubject({ role }), {
          resourceKey: 'leads.entitlement',
          accessType: AccessType.PERMISSION,
          scope: GrantScope.ROLE,
        }),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(store.grants).toHaveLength(0);
      expect(context.auditService.logAccessEvent).not.toHaveBeenCalled();
    });

    it('should grant to the role of the acting user', async () => {
      const role = store.addRole('Agent');

      const grant = await service.grantAccess(buildSubject({ role }), {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.ROLE,
      });

      expect(grant.scope).toBe(GrantScope.ROLE);
      expect(grant.subjectId).toBe(role.id);
    });

    it('should grant to the tenant of the acting user', async () => {
      const grant = await service.grantAccess(buildSubject(), {
        resourceKey: 'leads.entitlement',
        accessType: AccessType.ENTITLEMENT,
        scope: GrantScope.TENANT,
      });

      expect(grant.scope).toBe(GrantScope.TENANT);
      expect(grant.subjectId).toBe(TEST_TENANT_ID);
    });

    it('should reject role scope for a user without a role', async () => {
      await expect(
        service.grantAccess(buildSubject(), {
          resourceKey: 'leads.view',
          accessType: AccessType.PERMISSION,
          scope: GrantScope.ROLE,
        }),
      ).rejects.toThrow(
        new BadRequestException('Cannot use role scope: user has no role'),
      );
      expect(store.definitions).toHaveLength(0);
    });

    it('should reject tenant scope for a user without a tenant', async () => {
      await expect(
        service.grantAccess(buildSubject({ tenant: null }), {
          resourceKey: 'leads.view',
          accessType: AccessType.PERMISSION,
          scope: GrantScope.TENANT,
        }),
      ).rejects.toThrow('Cannot use tenant scope: user has no tenant');
    });

    it('should reject invalid input with per-field errors', async () => {
      const error = await service
        .grantAccess(buildSubject(), {
          resourceKey: '',
          accessType: AccessType.PERMISSION,
          scope: GrantScope.USER,
        })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(BadRequestException);
      expect(
        error instanceof BadRequestException ? error.getResponse() : null,
      ).toEqual({
        status: 400,
        errors: { resourceKey: 'resourceKey should not be empty' },
      });
      expect(store.grants).toHaveLength(0);
    });

    it('should replace an existing grant instead of adding one', async () => {
      const subject = buildSubject();
      await service.grantAccess(subject, {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.USER,
        configData: { pageSize: 10 },
      });

      const grant = await service.grantAccess(subject, {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.USER,
        isEnabled: false,
        configData: { pageSize: 25 },
      });

      expect(store.grants).toHaveLength(1);
      expect(grant).toMatchObject({
        isEnabled: false,
        configData: { pageSize: 25 },
      });
    });

    it('should clear only the acting user cached decisions', async () => {
      await context.decisionCache.set('access_100_leads.view_access', false, 300);
      await context.decisionCache.set('access_200_leads.view_access', false, 300);

      await service.grantAccess(buildSubject(), {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.USER,
      });

      await expect(
        context.decisionCache.get('access_100_leads.view_access'),
      ).resolves.toBeUndefined();
      await expect(
        context.decisionCache.get('access_200_leads.view_access'),
      ).resolves.toBe(false);
    });

    it('should still grant when cache invalidation fails', async () => {
      context = await createAccessControlTestContext({
        decisionCache: new UnreachableInvalidationCache(buildConfigService()),
      });
      service = context.module.get(AccessGrantDomainService);

      await expect(
        service.grantAccess(buildSubject(), {
          resourceKey: 'leads.view',
          accessType: AccessType.PERMISSION,
          scope: GrantScope.USER,
        }),
      ).resolves.toMatchObject({ isEnabled: true });
    });

    it('should audit the grant', async () => {
      await service.grantAccess(buildSubject(), {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.USER,
        isEnabled: false,
      });

      expect(context.auditService.logAccessEvent).toHaveBeenCalledWith({
        actorId: TEST_USER_ID,
        tenantId: TEST_TENANT_ID,
        event: AccessEventType.ACCESS_GRANTED,
        resourceKey: 'leads.view',
        scope: GrantScope.USER,
        subjectId: TEST_USER_ID,
        success: true,
        metadata: { isEnabled: false },
      });
    });
  });

  describe('revokeAccess', () => {
    it('should delete the grant at the scope', async () => {
      const definition = store.addDefinition('leads.view');
      store.addGrant(GrantScope.USER, TEST_USER_ID, definition);
      store.addGrant(GrantScope.TENANT, TEST_TENANT_ID, definition);

      await expect(
        service.revokeAccess(buildSubject(), {
          resourceKey: 'leads.view',
          scope: GrantScope.USER,
        }),
      ).resolves.toBe(true);

      expect(store.grants.map((grant) => grant.scope)).toEqual([
        GrantScope.TENANT,
      ]);
    });

    it('should revoke a role grant', async () => {
      const role = store.addRole('Agent');
      const definition = store.addDefinition('leads.view');
      store.addGrant(GrantScope.ROLE, role.id, definition);

      await expect(
        service.revokeAccess(buildSubject({ role }), {
          resourceKey: 'leads.view',
          scope: GrantScope.ROLE,
        }),
      ).resolves.toBe(true);
      expect(store.grants).toHaveLength(0);
    });

    it('should return false the second time', async () => {
      const definition = store.addDefinition('leads.view');
      store.addGrant(GrantScope.USER, TEST_USER_ID, definition);
      const input = { resourceKey: 'leads.view', scope: GrantScope.USER };

      await expect(service.revokeAccess(buildSubject(), input)).resolves.toBe(
        true,
      );
      await expect(service.revokeAccess(buildSubject(), input)).resolves.toBe(
        false,
      );
    });

    it('should return false for an unknown key and audit it', async () => {
      await expect(
        service.revokeAccess(buildSubject(), {
          resourceKey: 'leads.view',
          scope: GrantScope.USER,
        }),
      ).resolves.toBe(false);

      expect(context.auditService.logAccessEvent).toHaveBeenCalledWith(
        expect.objectContaining({
          event: AccessEventType.ACCESS_REVOKE_NOT_FOUND,
          success: false,
        }),
      );
    });
  });

  describe('grant then revoke', () => {
    it('should flip the cached decision both ways', async () => {
      const decisions = context.module.get(AccessDecisionDomainService);
      const subject = buildSubject();

      await expect(decisions.hasAccess(subject, 'leads.view')).resolves.toBe(
        false,
      );

      await service.grantAccess(subject, {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.USER,
      });
      await expect(decisions.hasAccess(subject, 'leads.view')).resolves.toBe(
        true,
      );

      await service.revokeAccess(subject, {
        resourceKey: 'leads.view',
        scope: GrantScope.USER,
      });
      await expect(decisions.hasAccess(subject, 'leads.view')).resolves.toBe(
        false,
      );
    });
  });
});
