import { Module } from '@nestjs/common';
import { EventsController } from './events.controller';
import { EventsListingController } from './events.listing.controller';
import { EventsService } from './events.service';

@Module({
  controllers: [EventsController, EventsListingController],
  providers: [EventsService],
  exports: [EventsService],
})
export class EventsModule {}
