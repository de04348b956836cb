import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

export class CreateConversationsTable1760870400000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'conversations',
        columns: [
          {
            name: 'conversation_id',
            type: 'uuid',
            isPrimary: true,
          },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'event_metadata',
            type: 'jsonb',
            isNullable: false,
          },
          {
            name: 'vendor_info',
            type: 'jsonb',
            isNullable: false,
          },
          {
            name: 'vendor_email',
            type: 'varchar',
            length: '320',
            isNullable: false,
          },
          {
            name: 'questions',
            type: 'jsonb',
            isNullable: false,
          },
          {
            name: 'email_exchanges',
            type: 'jsonb',
            isNullable: false,
            default: "'[]'",
          },
          {
            name: 'attempt_count',
            type: 'int',
            isNullable: false,
            default: 0,
          },
          {
            name: 'max_attempts',
            type: 'int',
            isNullable: false,
            default: 4,
          },
          {
            name: 'rails_api_callback_data',
            type: 'jsonb',
            isNullable: true,
          },
          {
            name: 'created_at',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'updated_at',
            type: 'timestamptz',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'conversations',
      new TableIndex({
        name: 'IDX_conversations_status',
        columnNames: ['status'],
      }),
    );

    // Recent-conversation listing sorts on this
    await queryRunner.createIndex(
      'conversations',
      new TableIndex({
        name: 'IDX_conversations_created_at',
        columnNames: ['created_at'],
      }),
    );

    await queryRunner.createIndex(
      'conversations',
      new TableIndex({
        name: 'IDX_conversations_vendor_email',
        columnNames: ['vendor_email'],
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('conversations');
  }
}
