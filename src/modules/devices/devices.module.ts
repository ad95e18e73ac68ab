import { Module } from '@nestjs/common';
import { DeviceCountsController } from './device-counts.controller';
import { DeviceCountsService } from './device-counts.service';
import { DevicesController } from './devices.controller';
import { DevicesListingController } from './devices.listing.controller';
import { DevicesService } from './devices.service';

@Module({
  controllers: [DevicesController, DevicesListingController, DeviceCountsController],
  providers: [DevicesService, DeviceCountsService],
})
export class DevicesModule {}
