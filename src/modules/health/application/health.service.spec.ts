import { Logger } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DatabaseService } from '../../database/infrastructure/database.service';
import { HealthService } from './health.service';

describe('HealthService', () => {
  const now = new Date('2026-05-01T08:00:00Z');
  const query = jest.fn();
  let service: HealthService;

  beforeEach(async () => {
    query.mockReset();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const moduleRef = await Test.createTestingModule({
      providers: [HealthService, { provide: DatabaseService, useValue: { query } }],
    }).compile();
    service = moduleRef.get(HealthService);
  });

  afterEach(() => jest.restoreAllMocks());

  it('reports healthy when the database answers', async () => {
    query.mockResolvedValue([{ '?column?': 1 }]);

    const report = await service.getHealth(now);

    expect(query).toHaveBeenCalledWith('SELECT 1');
    expect(report).toMatchObject({
      status: 'healthy',
      database: 'connected',
      timestamp: '2026-05-01T08:00:00.000Z',
    });
  });

  it('reports degraded when the database is unreachable', async () => {
    query.mockRejectedValue(new Error('connection refused'));

    const report = await service.getHealth(now);

    expect(report.status).toBe('degraded');
    expect(report.database).toBe('disconnected');
  });
});
