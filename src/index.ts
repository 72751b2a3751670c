export {
  AccessControlModule,
  AccessControlModuleOptions,
} from './access-control/access-control.module';
export {
  AccessControlService,
  GrantSummary,
  UserPermissionsSummary,
} from './access-control/access-control.service';
export {
  AccessDecision,
  DEFAULT_ACCESS_ACTION,
} from './access-control/domain/services/access-decision.domain.service';
export { AvailableResource } from './access-control/domain/services/resource-catalog.domain.service';
export { GrantAccessDto } from './access-control/dto/grant-access.dto';
export { RevokeAccessDto } from './access-control/dto/revoke-access.dto';
export { AccessType } from './access-control/domain/enums/access-type.enum';
export { GrantScope } from './access-control/domain/enums/grant-scope.enum';
export * from './access-control/domain/entities/access-definition.entity';
export * from './access-control/domain/entities/access-grant.entity';
export * from './access-control/domain/entities/access-subject.entity';
export * from './access-control/domain/entities/role.entity';
export * from './access-control/domain/errors/role-hierarchy.error';
export { DecisionCache } from './access-control/domain/ports/decision-cache.port';
export { DirectPermissionChecker } from './access-control/domain/ports/direct-permission-checker.port';
export { PlanAccessChecker } from './access-control/domain/ports/plan-access-checker.port';
export { AccessDefinitionRepository } from './access-control/domain/repositories/access-definition.repository.port';
export { AccessGrantRepository } from './access-control/domain/repositories/access-grant.repository.port';
export { RoleRepository } from './access-control/domain/repositories/role.repository.port';
export { InMemoryDecisionCache } from './access-control/infrastructure/cache/in-memory-decision-cache';
export { SubjectPermissionsChecker } from './access-control/infrastructure/permissions/subject-permissions.checker';
export { PlanFeaturesConfigChecker } from './access-control/infrastructure/billing/plan-features-config.checker';
export { accessControlEntities } from './access-control/infrastructure/persistence/relational/entities';
export { default as accessControlConfig } from './access-control/config/access-control.config';
export { default as appConfig } from './config/app.config';
export { default as databaseConfig } from './database/config/database.config';
export { TypeOrmConfigService } from './database/typeorm-config.service';
export { AllConfigType } from './config/config.type';
