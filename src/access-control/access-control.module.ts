import { DynamicModule, Module, ModuleMetadata, Type } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import accessControlConfig from './config/access-control.config';
import { AuditModule } from '../audit/audit.module';
import { RelationalAccessControlPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { DecisionCache } from './domain/ports/decision-cache.port';
import { DirectPermissionChecker } from './domain/ports/direct-permission-checker.port';
import { PlanAccessChecker } from './domain/ports/plan-access-checker.port';
import { InMemoryDecisionCache } from './infrastructure/cache/in-memory-decision-cache';
import { SubjectPermissionsChecker } from './infrastructure/permissions/subject-permissions.checker';
import { PlanFeaturesConfigChecker } from './infrastructure/billing/plan-features-config.checker';
import { RoleHierarchyDomainService } from './domain/services/role-hierarchy.domain.service';
import { AccessDecisionDomainService } from './domain/services/access-decision.domain.service';
import { AccessConfigDomainService } from './domain/services/access-config.domain.service';
import { ResourceCatalogDomainService } from './domain/services/resource-catalog.domain.service';
import { AccessGrantDomainService } from './domain/services/access-grant.domain.service';
import { AccessControlService } from './access-control.service';

export interface AccessControlModuleOptions {
  /**
   * Module exporting AccessDefinitionRepository, AccessGrantRepository and
   * RoleRepository. Defaults to the TypeORM persistence module, which needs
   * TypeOrmModule.forRootAsync in the importing application.
   */
  persistence?: Type | DynamicModule;
  directPermissionChecker?: Type<DirectPermissionChecker>;
  planAccessChecker?: Type<PlanAccessChecker>;
  decisionCache?: Type<DecisionCache>;
  // Modules the custom adapters above depend on
  imports?: ModuleMetadata['imports'];
}

@Module({})
export class AccessControlModule {
  static register(options: AccessControlModuleOptions = {}): DynamicModule {
    return {
      module: AccessControlModule,
      imports: [
        ConfigModule.forFeature(accessControlConfig),
        AuditModule,
        options.persistence ?? RelationalAccessControlPersistenceModule,
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: DirectPermissionChecker,
          useClass: options.directPermissionChecker ?? SubjectPermissionsChecker,
        },
        {
          provide: PlanAccessChecker,
          useClass: options.planAccessChecker ?? PlanFeaturesConfigChecker,
        },
        {
          provide: DecisionCache,
          useClass: options.decisionCache ?? InMemoryDecisionCache,
        },
        RoleHierarchyDomainService,
        AccessDecisionDomainService,
        AccessConfigDomainService,
        ResourceCatalogDomainService,
        AccessGrantDomainService,
        AccessControlService,
      ],
      exports: [AccessControlService, DecisionCache],
    };
  }
}
