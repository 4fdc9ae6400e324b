import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { resolvePersistenceDriver } from '../config/config.helpers';
import { PersistenceDriver } from '../config/env.validation';

export interface HealthStatus {
  status: 'ok';
  timestamp: string;
  persistence: PersistenceDriver;
}

@Controller()
export class AppController {
  constructor(private readonly configService: ConfigService) {}

  @Get('health')
  health(): HealthStatus {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      persistence: resolvePersistenceDriver(this.configService),
    };
  }
}
