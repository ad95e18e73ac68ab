import { Module } from '@nestjs/common';
import { OrganizationsController } from './organizations.controller';
import { OrganizationsListingController } from './organizations.listing.controller';
import { OrganizationsService } from './organizations.service';

@Module({
  controllers: [OrganizationsController, OrganizationsListingController],
  providers: [OrganizationsService],
})
export class OrganizationsModule {}
