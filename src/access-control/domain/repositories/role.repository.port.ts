import { NullableType } from '../../../utils/types/nullable.type';
import { Role } from '../entities/role.entity';

export abstract class RoleRepository {
  abstract findById(id: number): Promise<NullableType<Role>>;
}
