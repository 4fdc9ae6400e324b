import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { resolvePersistenceDriver } from '../config/config.helpers';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';
import { BookingsController } from './bookings.controller';
import { BOOKINGS_REPOSITORY } from './bookings.repository';
import { BookingsService } from './bookings.service';
import { InMemoryBookingsRepository } from './in-memory-bookings.repository';
import { PgBookingsRepository } from './pg-bookings.repository';

@Module({
  imports: [DatabaseModule],
  controllers: [BookingsController],
  providers: [
    {
      provide: BOOKINGS_REPOSITORY,
      inject: [ConfigService, DatabaseService],
      useFactory: (config: ConfigService, database: DatabaseService) =>
        resolvePersistenceDriver(config) === 'postgres'
          ? new PgBookingsRepository(database)
          : new InMemoryBookingsRepository(),
    },
    BookingsService,
  ],
  exports: [BookingsService],
})
export class BookingsModule {}
