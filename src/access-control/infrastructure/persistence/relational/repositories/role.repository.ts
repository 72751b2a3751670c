import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RoleEntity } from '../entities/role.entity';
import { RoleMapper } from '../mappers/role.mapper';
import { RoleRepository } from '../../../../domain/repositories/role.repository.port';
import { Role } from '../../../../domain/entities/role.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class RoleRelationalRepository implements RoleRepository {
  constructor(
    @InjectRepository(RoleEntity)
    private readonly repository: Repository<RoleEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<Role>> {
    const entity = await this.repository.findOne({
      where: { id },
    });

    return entity ? RoleMapper.toDomain(entity) : null;
  }
}
