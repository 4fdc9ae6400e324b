import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';

import { AppController } from './app.controller';

describe('AppController', () => {
  const build = async (env: Record<string, string>) => {
    const module = await Test.createTestingModule({
      controllers: [AppController],
      providers: [{ provide: ConfigService, useValue: new ConfigService(env) }],
    }).compile();
    return module.get(AppController);
  };

  it('reports the in-process stores when no database is configured', async () => {
    const controller = await build({});

    expect(controller.health()).toEqual({
      status: 'ok',
      timestamp: expect.any(String),
      persistence: 'memory',
    });
  });

  it('reports postgres when a connection string is present', async () => {
    const controller = await build({ DATABASE_URL: 'postgres://localhost/concierge_test' });

    expect(controller.health().persistence).toBe('postgres');
  });
});
