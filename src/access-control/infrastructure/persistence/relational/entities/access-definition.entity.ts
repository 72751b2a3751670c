import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { AccessType } from '../../../../domain/enums/access-type.enum';

@Entity({
  name: 'access_definitions',
})
export class AccessDefinitionEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  // Not unique: lookups take the oldest row
  @Column({ type: 'varchar', length: 255 })
  @Index()
  key!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'text', default: '' })
  description!: string;

  @Column({
    name: 'access_type',
    type: 'varchar',
    length: 20,
  })
  accessType!: AccessType;

  @Column({ name: 'default_enabled', type: 'boolean', default: true })
  defaultEnabled!: boolean;

  @Column({ name: 'config_schema', type: 'jsonb', default: {} })
  configSchema!: Record<string, unknown>;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
