import { AccessControlService } from './access-control.service';
import { AccessType } from './domain/enums/access-type.enum';
import { GrantScope } from './domain/enums/grant-scope.enum';
import { RoleHierarchyCycleError } from './domain/errors/role-hierarchy.error';
import { InMemoryAccessStore } from '../../test/utils/in-memory-access-store';
import {
  AccessControlTestContext,
  TEST_TENANT_ID,
  TEST_USER_ID,
  buildSubject,
  createAccessControlTestContext,
} from '../../test/utils/access-control-fixtures';

describe('AccessControlService', () => {
  let context: AccessControlTestContext;
  let store: InMemoryAccessStore;
  let service: AccessControlService;

  beforeEach(async () => {
    context = await createAccessControlTestContext();
    store = context.store;
    service = context.service;
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('getUserPermissionsSummary', () => {
    it('should list every grant that applies to the user', async () => {
      const admin = store.addRole('Admin');
      const agent = store.addRole('Agent', admin.id);
      const leads = store.addDefinition(
        'leads.entitlement',
        AccessType.ENTITLEMENT,
        { name: 'Leads' },
      );
      const reports = store.addDefinition('reports.view', AccessType.PERMISSION, {
        name: 'Reports',
      });
      const tasks = store.addDefinition('tasks.view');
      const notes = store.addDefinition('notes.view', AccessType.PERMISSION, {
        name: 'Notes',
      });
      store.addGrant(GrantScope.TENANT, TEST_TENANT_ID, leads);
      store.addGrant(GrantScope.ROLE, admin.id, reports);
      store.addGrant(GrantScope.ROLE, agent.id, tasks, { isEnabled: false });
      store.addGrant(GrantScope.USER, TEST_USER_ID, notes);

      await expect(
        service.getUserPermissionsSummary(buildSubject({ role: agent })),
      ).resolves.toEqual({
        userId: TEST_USER_ID,
        isSuperuser: false,
        tenantId: TEST_TENANT_ID,
        roleChain: [
          { id: agent.id, name: 'Agent' },
          { id: admin.id, name: 'Admin' },
        ],
        tenantGrants: [
          {
            key: 'leads.entitlement',
            accessType: AccessType.ENTITLEMENT,
            isEnabled: true,
            scope: GrantScope.TENANT,
            subjectId: TEST_TENANT_ID,
          },
        ],
        roleGrants: [
          {
            key: 'tasks.view',
            accessType: AccessType.PERMISSION,
            isEnabled: false,
            scope: GrantScope.ROLE,
            subjectId: agent.id,
          },
          {
            key: 'reports.view',
            accessType: AccessType.PERMISSION,
            isEnabled: true,
            scope: GrantScope.ROLE,
            subjectId: admin.id,
          },
        ],
        userGrants: [
          {
            key: 'notes.view',
            accessType: AccessType.PERMISSION,
            isEnabled: true,
            scope: GrantScope.USER,
            subjectId: TEST_USER_ID,
          },
        ],
        availableResources: [
          { key: 'leads', name: 'Leads', description: '' },
          { key: 'reports', name: 'Reports', description: '' },
          { key: 'notes', name: 'Notes', description: '' },
        ],
      });
    });

    it('should summarise a user without tenant or role', async () => {
      await expect(
        service.getUserPermissionsSummary(
          buildSubject({ tenant: null, isSuperuser: true }),
        ),
      ).resolves.toEqual({
        userId: TEST_USER_ID,
        isSuperuser: true,
        tenantId: null,
        roleChain: [],
        tenantGrants: [],
        roleGrants: [],
        userGrants: [],
        availableResources: [],
      });
    });

    it('should propagate a role cycle', async () => {
      const first = store.addRole('First');
      const second = store.addRole('Second', first.id);
      first.parentId = second.id;

      await expect(
        service.getUserPermissionsSummary(buildSubject({ role: first })),
      ).rejects.toBeInstanceOf(RoleHierarchyCycleError);
    });
  });

  describe('cache invalidation scope', () => {
    it('should leave other role members stale until the TTL expires', async () => {
      jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
      jest.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      const role = store.addRole('Agent');
      const actor = buildSubject({ id: 100, role });
      const colleague = buildSubject({ id: 200, role });

      await expect(service.hasAccess(colleague, 'leads.view')).resolves.toBe(
        false,
      );

      await service.grantAccess(actor, {
        resourceKey: 'leads.view',
        accessType: AccessType.PERMISSION,
        scope: GrantScope.ROLE,
      });

      await expect(service.hasAccess(actor, 'leads.view')).resolves.toBe(true);
      await expect(service.hasAccess(colleague, 'leads.view')).resolves.toBe(
        false,
      );
      await expect(
        service.hasAccessWithReason(colleague, 'leads.view'),
      ).resolves.toMatchObject({ result: true });

      jest.advanceTimersByTime(300_000);

      await expect(service.hasAccess(colleague, 'leads.view')).resolves.toBe(
        true,
      );
    });
  });

  describe('getAccessConfig', () => {
    it('should delegate to the config merge', async () => {
      const definition = store.addDefinition('leads.view');
      store.addGrant(GrantScope.USER, TEST_USER_ID, definition, {
        configData: { pageSize: 25 },
      });

      await expect(
        service.getAccessConfig(buildSubject(), 'leads.view'),
      ).resolves.toEqual({ pageSize: 25 });
    });
  });
});
