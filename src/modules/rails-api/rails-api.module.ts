import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { RailsApiService } from './rails-api.service';

@Module({
  imports: [HttpModule],
  providers: [RailsApiService],
  exports: [RailsApiService],
})
export class RailsApiModule {}
