import { Column, Entity, Index, Unique } from 'typeorm';
import { AccessGrantEntity } from './access-grant.entity';

// Tenants live outside this module, so tenant_id carries no foreign key
@Entity({
  name: 'tenant_access_grants',
})
@Unique('UQ_tenant_access_grants_tenant_definition', [
  'subjectId',
  'definitionId',
])
export class TenantAccessGrantEntity extends AccessGrantEntity {
  @Column({ name: 'tenant_id', type: 'integer' })
  @Index()
  subjectId!: number;
}
