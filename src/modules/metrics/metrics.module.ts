import { Module } from '@nestjs/common';
import { MetricsController } from './metrics.controller';
import { MetricsListingController } from './metrics.listing.controller';
import { MetricsService } from './metrics.service';

@Module({
  controllers: [MetricsController, MetricsListingController],
  providers: [MetricsService],
})
export class MetricsModule {}
