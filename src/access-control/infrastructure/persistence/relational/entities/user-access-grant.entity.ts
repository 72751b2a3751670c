import { Column, Entity, Index, Unique } from 'typeorm';
import { AccessGrantEntity } from './access-grant.entity';

@Entity({
  name: 'user_access_grants',
})
@Unique('UQ_user_access_grants_user_definition', ['subjectId', 'definitionId'])
export class UserAccessGrantEntity extends AccessGrantEntity {
  @Column({ name: 'user_id', type: 'integer' })
  @Index()
  subjectId!: number;
}
