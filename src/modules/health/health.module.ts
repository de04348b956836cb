import { Module } from '@nestjs/common';
import { RailsApiModule } from '../rails-api/rails-api.module';
import { HealthCheckService } from './health.service';
import { HealthController } from './health.controller';

/**
 * HealthModule
 *
 * The TypeORM DataSource is available globally once TypeOrmModule.forRoot
 * has run, so only the planning backend client is imported here.
 */
@Module({
  imports: [RailsApiModule],
  controllers: [HealthController],
  providers: [HealthCheckService],
})
export class HealthModule {}
