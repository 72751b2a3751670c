import { NullableType } from '../../../utils/types/nullable.type';
import {
  AccessDefinition,
  NewAccessDefinition,
} from '../entities/access-definition.entity';

export abstract class AccessDefinitionRepository {
  /**
   * Find the definition for a resource key.
   * Keys are not unique; the oldest matching row wins.
   */
  abstract findByKey(key: string): Promise<NullableType<AccessDefinition>>;

  abstract create(data: NewAccessDefinition): Promise<AccessDefinition>;
}
