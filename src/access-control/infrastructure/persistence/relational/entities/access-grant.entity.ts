import {
  Column,
  CreateDateColumn,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { EntityRelationalHelper } from '../../../../../utils/relational-entity-helper';
import { AccessDefinitionEntity } from './access-definition.entity';

/**
 * Columns shared by the tenant, role and user grant tables.
 *
 * Each subclass maps subjectId onto its own column (tenant_id, role_id,
 * user_id) and carries a unique constraint on (subject, definition).
 */
export abstract class AccessGrantEntity extends EntityRelationalHelper {
  @PrimaryGeneratedColumn()
  id!: number;

  abstract subjectId: number;

  @ManyToOne(() => AccessDefinitionEntity, {
    nullable: false,
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'definition_id' })
  definition!: AccessDefinitionEntity;

  @Column({ name: 'definition_id', type: 'integer' })
  @Index()
  definitionId!: number;

  @Column({ name: 'is_enabled', type: 'boolean', default: true })
  isEnabled!: boolean;

  @Column({ name: 'config_data', type: 'jsonb', default: {} })
  configData!: Record<string, unknown>;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
