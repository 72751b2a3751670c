import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableColumnOptions,
  TableForeignKey,
  TableIndex,
  TableUnique,
} from 'typeorm';

const GRANT_TABLES = [
  { table: 'tenant_access_grants', subjectColumn: 'tenant_id' },
  { table: 'role_access_grants', subjectColumn: 'role_id' },
  { table: 'user_access_grants', subjectColumn: 'user_id' },
];

const idColumn: TableColumnOptions = {
  name: 'id',
  type: 'integer',
  isPrimary: true,
  isGenerated: true,
  generationStrategy: 'increment',
};

const timestampColumns: TableColumnOptions[] = [
  {
    name: 'created_at',
    type: 'timestamp',
    default: 'now()',
    isNullable: false,
  },
  {
    name: 'updated_at',
    type: 'timestamp',
    default: 'now()',
    isNullable: false,
  },
];

export class CreateAccessControlTables1760000000000
  implements MigrationInterface
{
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'roles',
        columns: [
          idColumn,
          { name: 'name', type: 'varchar', length: '100', isNullable: false },
          { name: 'description', type: 'text', default: "''" },
          { name: 'tenant_id', type: 'integer', isNullable: true },
          { name: 'parent_id', type: 'integer', isNullable: true },
          { name: 'is_system_role', type: 'boolean', default: false },
          { name: 'is_assignable', type: 'boolean', default: true },
          ...timestampColumns,
        ],
        uniques: [
          new TableUnique({
            name: 'UQ_roles_tenant_name',
            columnNames: ['tenant_id', 'name'],
          }),
        ],
        indices: [
          new TableIndex({
            name: 'IDX_roles_tenant_id',
            columnNames: ['tenant_id'],
          }),
          new TableIndex({
            name: 'IDX_roles_parent_id',
            columnNames: ['parent_id'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.createForeignKey(
      'roles',
      new TableForeignKey({
        columnNames: ['parent_id'],
        referencedTableName: 'roles',
        referencedColumnNames: ['id'],
        onDelete: 'SET NULL',
      }),
    );

    // A role cannot be its own parent; longer cycles are caught at read time
    await queryRunner.query(`
      ALTER TABLE roles
      ADD CONSTRAINT check_roles_parent_not_self
      CHECK (parent_id IS NULL OR parent_id <> id);
    `);

    await queryRunner.createTable(
      new Table({
        name: 'access_definitions',
        columns: [
          idColumn,
          { name: 'key', type: 'varchar', length: '255', isNullable: false },
          { name: 'name', type: 'varchar', length: '255', isNullable: false },
          { name: 'description', type: 'text', default: "''" },
          {
            name: 'access_type',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          { name: 'default_enabled', type: 'boolean', default: true },
          { name: 'config_schema', type: 'jsonb', default: "'{}'" },
          ...timestampColumns,
        ],
        indices: [
          new TableIndex({
            name: 'IDX_access_definitions_key',
            columnNames: ['key'],
          }),
        ],
      }),
      true,
    );

    await queryRunner.query(`
      ALTER TABLE access_definitions
      ADD CONSTRAINT check_access_type
      CHECK (access_type IN ('permission', 'feature_flag', 'entitlement'));
    `);

    for (const { table, subjectColumn } of GRANT_TABLES) {
      await queryRunner.createTable(
        new Table({
          name: table,
          columns: [
            idColumn,
            { name: subjectColumn, type: 'integer', isNullable: false },
            { name: 'definition_id', type: 'integer', isNullable: false },
            { name: 'is_enabled', type: 'boolean', default: true },
            { name: 'config_data', type: 'jsonb', default: "'{}'" },
            ...timestampColumns,
          ],
          uniques: [
            new TableUnique({
              name: `UQ_${table}_${subjectColumn.replace('_id', '')}_definition`,
              columnNames: [subjectColumn, 'definition_id'],
            }),
          ],
          indices: [
            new TableIndex({
              name: `IDX_${table}_${subjectColumn}`,
              columnNames: [subjectColumn],
            }),
            new TableIndex({
              name: `IDX_${table}_definition_id`,
              columnNames: ['definition_id'],
            }),
          ],
        }),
        true,
      );

      await queryRunner.createForeignKey(
        table,
        new TableForeignKey({
          columnNames: ['definition_id'],
          referencedTableName: 'access_definitions',
          referencedColumnNames: ['id'],
          onDelete: 'CASCADE',
        }),
      );
    }

    // Tenants and users are owned by the host application; only roles are local
    await queryRunner.createForeignKey(
      'role_access_grants',
      new TableForeignKey({
        columnNames: ['role_id'],
        referencedTableName: 'roles',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // Foreign keys and indexes go with their tables
    for (const { table } of [...GRANT_TABLES].reverse()) {
      await queryRunner.dropTable(table, true, true, true);
    }
    await queryRunner.dropTable('access_definitions', true, true, true);
    await queryRunner.dropTable('roles', true, true, true);
  }
}
