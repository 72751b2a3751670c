import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AccessDefinitionEntity } from './entities/access-definition.entity';
import { TenantAccessGrantEntity } from './entities/tenant-access-grant.entity';
import { RoleAccessGrantEntity } from './entities/role-access-grant.entity';
import { UserAccessGrantEntity } from './entities/user-access-grant.entity';
import { RoleEntity } from './entities/role.entity';
import { AccessDefinitionRelationalRepository } from './repositories/access-definition.repository';
import { AccessDefinitionRepository } from '../../../domain/repositories/access-definition.repository.port';
import { AccessGrantRelationalRepository } from './repositories/access-grant.repository';
import { AccessGrantRepository } from '../../../domain/repositories/access-grant.repository.port';
import { RoleRelationalRepository } from './repositories/role.repository';
import { RoleRepository } from '../../../domain/repositories/role.repository.port';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      AccessDefinitionEntity,
      TenantAccessGrantEntity,
      RoleAccessGrantEntity,
      UserAccessGrantEntity,
      RoleEntity,
    ]),
  ],
  providers: [
    {
      provide: AccessDefinitionRepository,
      useClass: AccessDefinitionRelationalRepository,
    },
    {
      provide: AccessGrantRepository,
      useClass: AccessGrantRelationalRepository,
    },
    {
      provide: RoleRepository,
      useClass: RoleRelationalRepository,
    },
  ],
  exports: [AccessDefinitionRepository, AccessGrantRepository, RoleRepository],
})
export class RelationalAccessControlPersistenceModule {}
