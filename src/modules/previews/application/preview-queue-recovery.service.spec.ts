import { Logger } from '@nestjs/common';
import { getQueueToken } from '@nestjs/bullmq';
import { Test } from '@nestjs/testing';
import { IGenerationJobsRepositoryToken } from '../../jobs/domain/generation-jobs.repository.interface';
import { PREVIEW_QUEUE } from '../../queue/queue.module';
import { buildJob } from '../../../test/fixtures';
import { FakeQueue } from '../../../test/fakes/collaborators';
import { InMemoryGenerationJobsRepository } from '../../../test/fakes/in-memory-generation-jobs.repository';
import type { PreviewTaskData } from '../domain/preview-task';
import { PreviewQueueRecoveryService } from './preview-queue-recovery.service';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('PreviewQueueRecoveryService', () => {
  let service: PreviewQueueRecoveryService;
  let jobs: InMemoryGenerationJobsRepository;
  let queue: FakeQueue<PreviewTaskData>;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jobs = new InMemoryGenerationJobsRepository();
    queue = new FakeQueue<PreviewTaskData>();

    const moduleRef = await Test.createTestingModule({
      providers: [
        PreviewQueueRecoveryService,
        { provide: IGenerationJobsRepositoryToken, useValue: jobs },
        { provide: getQueueToken(PREVIEW_QUEUE), useValue: queue },
      ],
    }).compile();

    service = moduleRef.get(PreviewQueueRecoveryService);
  });

  afterEach(() => jest.restoreAllMocks());

  it('re-enqueues recent unfinished jobs missing from the queue', async () => {
    jobs.insert(buildJob({ id: 'job-1', referenceId: 'preview-1', status: 'queued' }));
    jobs.insert(buildJob({ id: 'job-2', referenceId: 'preview-2', status: 'processing' }));
    jobs.insert(buildJob({ id: 'job-3', referenceId: 'preview-3', status: 'completed' }));
    jobs.insert(
      buildJob({
        id: 'job-4',
        referenceId: 'preview-4',
        status: 'queued',
        queuedAt: new Date(Date.now() - 2 * DAY_MS),
      }),
    );
    await queue.add('generate', { jobId: 'job-2', previewId: 'preview-2' }, { jobId: 'job-2' });
    queue.paused = true;

    const requeued = await service.recoverQueue();

    expect(requeued).toBe(1);
    expect(queue.paused).toBe(false);
    expect(queue.added.slice(1)).toEqual([
      {
        name: 'generate',
        data: { jobId: 'job-1', previewId: 'preview-1' },
        opts: { jobId: 'job-1' },
      },
    ]);
  });

  it('replaces a finished queue entry that shares the job id', async () => {
    jobs.insert(buildJob({ id: 'job-1', referenceId: 'preview-1', status: 'processing' }));
    await queue.add('generate', { jobId: 'job-1', previewId: 'preview-1' }, { jobId: 'job-1' });
    queue.finish('job-1');

    const requeued = await service.recoverQueue();

    expect(requeued).toBe(1);
    expect(queue.added).toHaveLength(2);
    await expect(queue.getJobs()).resolves.toHaveLength(1);
  });

  it('returns zero when nothing needs recovery', async () => {
    jobs.insert(buildJob({ id: 'job-1', status: 'failed' }));

    await expect(service.recoverQueue()).resolves.toBe(0);
    expect(queue.added).toEqual([]);
  });
});
