import { Global, Logger, Module } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { appConfig } from '../../config/app.config';
import { MongodbModule } from '../mongodb/mongodb.module';
import { MongodbService } from '../mongodb/mongodb.service';
import { MemoryEntityStore } from './memory-entity.table';
import { MongoEntityStore } from './mongo-entity.table';
import { EntityStore } from './store.types';

/**
 * Entity persistence. STORE_DRIVER picks MongoDB (default) or the in-process
 * store used by local runs and e2e tests.
 */
@Global()
@Module({
  imports: [MongodbModule],
  providers: [
    {
      provide: EntityStore,
      inject: [appConfig.KEY, MongodbService],
      useFactory: (
        cfg: ConfigType<typeof appConfig>,
        mongo: MongodbService,
      ): EntityStore => {
        new Logger(StoreModule.name).log(`store driver: ${cfg.storeDriver}`);
        return cfg.storeDriver === 'memory'
          ? new MemoryEntityStore()
          : new MongoEntityStore(mongo);
      },
    },
  ],
  exports: [EntityStore, MongodbModule],
})
export class StoreModule {}
