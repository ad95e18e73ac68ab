import { Module } from '@nestjs/common';
import { EmailsController } from './emails.controller';
import { EmailsListingController } from './emails.listing.controller';
import { EmailsService } from './emails.service';

@Module({
  controllers: [EmailsController, EmailsListingController],
  providers: [EmailsService],
})
export class EmailsModule {}
