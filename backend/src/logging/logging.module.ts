import { Global, Module } from '@nestjs/common';

import { LoggingService } from './logging.service';

/** Global so any feature module can write to the booking-event, conversation and provider channels. */
@Global()
@Module({
  providers: [LoggingService],
  exports: [LoggingService],
})
export class LoggingModule {}
