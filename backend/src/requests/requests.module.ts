import { Module } from '@nestjs/common';

import { DatabaseModule } from '../database/database.module';
import { GuestRequestSink } from './request.sink';
import { RequestsController } from './requests.controller';
import { RequestsService } from './requests.service';

@Module({
  imports: [DatabaseModule],
  controllers: [RequestsController],
  providers: [RequestsService, { provide: GuestRequestSink, useExisting: RequestsService }],
  exports: [RequestsService, GuestRequestSink],
})
export class RequestsModule {}
