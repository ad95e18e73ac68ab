import { Module } from '@nestjs/common';
import { loadMongoConfig } from '../../infra/mongo/mongo.config';
import { MongoConnection } from './internal/mongodb.client';
import { MongodbService } from './mongodb.service';

/**
 * Internal-only MongoDB module: a thin bridge to the native driver.
 * Owns the one client per application; no controllers.
 */
@Module({
  providers: [
    { provide: MongoConnection, useFactory: () => new MongoConnection(loadMongoConfig()) },
    MongodbService,
  ],
  exports: [MongodbService],
})
export class MongodbModule {}
