import { Module } from '@nestjs/common';
import { ContentsController } from './contents.controller';
import { ContentsListingController } from './contents.listing.controller';
import { ContentsService } from './contents.service';

@Module({
  controllers: [ContentsController, ContentsListingController],
  providers: [ContentsService],
  exports: [ContentsService],
})
export class ContentsModule {}
