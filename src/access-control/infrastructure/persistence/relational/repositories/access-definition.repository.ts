import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AccessDefinitionEntity } from '../entities/access-definition.entity';
import { AccessDefinitionMapper } from '../mappers/access-definition.mapper';
import { AccessDefinitionRepository } from '../../../../domain/repositories/access-definition.repository.port';
import {
  AccessDefinition,
  NewAccessDefinition,
} from '../../../../domain/entities/access-definition.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class AccessDefinitionRelationalRepository
  implements AccessDefinitionRepository
{
  constructor(
    @InjectRepository(AccessDefinitionEntity)
    private readonly repository: Repository<AccessDefinitionEntity>,
  ) {}

  async findByKey(key: string): Promise<NullableType<AccessDefinition>> {
    const entity = await this.repository.findOne({
      where: { key },
      order: { id: 'ASC' },
    });

    return entity ? AccessDefinitionMapper.toDomain(entity) : null;
  }

  async create(data: NewAccessDefinition): Promise<AccessDefinition> {
    const entity = this.repository.create({
      key: data.key,
      name: data.name,
      description: data.description,
      accessType: data.accessType,
      defaultEnabled: data.defaultEnabled,
      configSchema: data.configSchema,
    });

    const saved = await this.repository.save(entity);
    return AccessDefinitionMapper.toDomain(saved);
  }
}
