import { Column, Entity, Index, JoinColumn, ManyToOne, Unique } from 'typeorm';
import { AccessGrantEntity } from './access-grant.entity';
import { RoleEntity } from './role.entity';

@Entity({
  name: 'role_access_grants',
})
@Unique('UQ_role_access_grants_role_definition', ['subjectId', 'definitionId'])
export class RoleAccessGrantEntity extends AccessGrantEntity {
  @ManyToOne(() => RoleEntity, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'role_id' })
  role?: RoleEntity;

  @Column({ name: 'role_id', type: 'integer' })
  @Index()
  subjectId!: number;
}
