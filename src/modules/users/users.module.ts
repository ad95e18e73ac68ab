import { Module } from '@nestjs/common';
import { UsersController } from './users.controller';
import { UsersListingController } from './users.listing.controller';
import { UsersService } from './users.service';

@Module({
  controllers: [UsersController, UsersListingController],
  providers: [UsersService],
  exports: [UsersService],
})
export class UsersModule {}
