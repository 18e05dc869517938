// apps/api/src/app.controller.spec.ts
import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DatabaseService } from './database/database.service';
import { InMemoryDatabase } from '../test/support/in-memory-database';

describe('AppController (unit)', () => {
  let controller: AppController;
  let db: InMemoryDatabase;

  beforeEach(async () => {
    db = new InMemoryDatabase();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [AppService, { provide: DatabaseService, useValue: db.asService() }],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('GET /api/v1 -> service metadata', () => {
    expect(controller.root()).toEqual({
      service: 'orderbot-api',
      version: 'api/v1',
      intents: ['Welcome', 'PlaceOrder', 'TrackOrder'],
    });
  });

  it('GET /api/v1/health -> ok while the database answers', async () => {
    await expect(controller.health()).resolves.toMatchObject({
      status: 'ok',
      database: 'up',
    });
  });

  it('GET /api/v1/health -> degraded when the ping fails', async () => {
    db.reachable = false;
    await expect(controller.health()).resolves.toMatchObject({
      status: 'degraded',
      database: 'down',
    });
  });
});
