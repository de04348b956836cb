import { ConfigService } from '@nestjs/config';
import { DataSourceOptions } from 'typeorm';
import { ConversationRecord } from './entities/conversation.entity';
import { CreateConversationsTable1760870400000 } from './migrations/1760870400000-CreateConversationsTable';

type SettingReader = (key: string) => string | undefined;

/**
 * Connection options shared by the Nest application and the migration CLI.
 */
export function buildDataSourceOptions(read: SettingReader): DataSourceOptions {
  return {
    type: 'postgres',
    host: read('DATABASE_HOST') || 'localhost',
    port: parseInt(read('DATABASE_PORT') || '5432', 10),
    username: read('DATABASE_USER') || 'vendor_bids',
    password: read('DATABASE_PASSWORD'),
    database: read('DATABASE_NAME') || 'vendor_bids',
    entities: [ConversationRecord],
    migrations: [CreateConversationsTable1760870400000],
    synchronize: false, // Always false - use migrations
    logging: read('NODE_ENV') === 'development',
  };
}

export function typeOrmOptionsFromConfig(configService: ConfigService): DataSourceOptions {
  return buildDataSourceOptions((key) => configService.get<string>(key));
}
