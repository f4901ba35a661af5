import { ConflictException, GoneException, Logger, NotFoundException } from '@nestjs/common';
import { getQueueToken } from '@nestjs/bullmq';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { IGenerationJobsRepositoryToken } from '../../jobs/domain/generation-jobs.repository.interface';
import { IPreviewsRepositoryToken } from '../../previews/domain/previews.repository.interface';
import { BOOK_COMPLETION_QUEUE } from '../../queue/queue.module';
import { STORAGE_GATEWAY } from '../../storage/domain/storage-gateway.interface';
import { CleanupService } from '../../cleanup/application/cleanup.service';
import { StoriesService } from '../../stories/application/stories.service';
import { buildOrder, buildPage, buildPreview } from '../../../test/fixtures';
import { FakeQueue, FakeStorage } from '../../../test/fakes/collaborators';
import { InMemoryGenerationJobsRepository } from '../../../test/fakes/in-memory-generation-jobs.repository';
import { InMemoryOrdersRepository } from '../../../test/fakes/in-memory-orders.repository';
import { InMemoryPreviewsRepository } from '../../../test/fakes/in-memory-previews.repository';
import type { BookCompletionTaskData } from '../domain/book-completion-task';
import { IOrdersRepositoryToken } from '../domain/orders.repository.interface';
import { OrdersService, type PaidOrderInput } from './orders.service';

const HOUR_MS = 60 * 60 * 1000;

const payment: PaidOrderInput = {
  externalOrderId: '5551001',
  orderNumber: '#1001',
  previewId: 'preview-1',
  customerEmail: 'parent@example.com',
  customerName: 'Sam Parent',
};

describe('OrdersService', () => {
  let service: OrdersService;
  let orders: InMemoryOrdersRepository;
  let previews: InMemoryPreviewsRepository;
  let jobs: InMemoryGenerationJobsRepository;
  let queue: FakeQueue<BookCompletionTaskData>;
  let storage: FakeStorage;
  let config: ConfigService;

  beforeEach(async () => {
    orders = new InMemoryOrdersRepository();
    previews = new InMemoryPreviewsRepository();
    jobs = new InMemoryGenerationJobsRepository();
    queue = new FakeQueue<BookCompletionTaskData>();
    storage = new FakeStorage();
    config = new ConfigService({
      book: { purchaseGraceHours: 24, downloadExpiryDays: 30, maxCompletionRetries: 3 },
    });

    const moduleRef = await Test.createTestingModule({
      providers: [
        OrdersService,
        StoriesService,
        { provide: IOrdersRepositoryToken, useValue: orders },
        { provide: IPreviewsRepositoryToken, useValue: previews },
        { provide: IGenerationJobsRepositoryToken, useValue: jobs },
        { provide: STORAGE_GATEWAY, useValue: storage },
        { provide: getQueueToken(BOOK_COMPLETION_QUEUE), useValue: queue },
        { provide: ConfigService, useValue: config },
      ],
    }).compile();

    service = moduleRef.get(OrdersService);
  });

  afterEach(() => jest.restoreAllMocks());

  describe('registerPaidOrder', () => {
    it('creates one order and one completion job for a repeated confirmation', async () => {
      previews.insert(buildPreview({ status: 'active', pages: [buildPage(1)] }));

      const first = await service.registerPaidOrder(payment);
      const second = await service.registerPaidOrder(payment);

      expect(first).toMatchObject({ outcome: 'created', order: { id: 'order-1' }, jobId: 'job-1' });
      expect(second).toMatchObject({ outcome: 'duplicate', order: { id: 'order-1' } });
      expect(orders.rows.size).toBe(1);
      expect(jobs.rows.size).toBe(1);
      expect(queue.added).toEqual([
        {
          name: 'complete',
          data: { orderId: 'order-1', previewId: 'preview-1', childName: 'Leo', jobId: 'job-1' },
          opts: { jobId: 'complete-order-1' },
        },
      ]);
      expect(previews.get('preview-1').status).toBe('purchased');
      expect(jobs.get('job-1')).toMatchObject({ jobType: 'book_completion', referenceId: 'order-1' });
    });

    it('treats a second store order for an already purchased preview as a duplicate', async () => {
      previews.insert(buildPreview({ status: 'purchased' }));
      orders.insert(buildOrder({ externalOrderId: '5550999' }));

      const result = await service.registerPaidOrder(payment);

      expect(result).toMatchObject({ outcome: 'duplicate', order: { externalOrderId: '5550999' } });
      expect(queue.added).toEqual([]);
    });

    it('accepts a new order after an earlier one failed', async () => {
      previews.insert(buildPreview({ status: 'purchased' }));
      orders.insert(buildOrder({ externalOrderId: '5550999', status: 'failed' }));

      const result = await service.registerPaidOrder(payment);

      expect(result.outcome).toBe('created');
      expect(queue.added).toHaveLength(1);
    });

    it('resolves a lost insert race to the winning order', async () => {
      previews.insert(buildPreview({ status: 'active' }));
      const winner = buildOrder({ id: 'order-9' });
      jest.spyOn(orders, 'findByExternalOrderId').mockResolvedValueOnce(null);
      jest.spyOn(orders, 'findActiveByPreviewId').mockResolvedValueOnce(null);
      orders.insert(winner);

      const result = await service.registerPaidOrder(payment);

      expect(result).toMatchObject({ outcome: 'duplicate', order: { id: 'order-9' } });
      expect(queue.added).toEqual([]);
    });

    it('accepts payment within the grace period after expiry', async () => {
      const now = new Date('2026-03-10T12:00:00Z');
      previews.insert(
        buildPreview({ status: 'expired', expiresAt: new Date(now.getTime() - 23 * HOUR_MS) }),
      );

      const result = await service.registerPaidOrder(payment, now);

      expect(result.outcome).toBe('created');
      expect(previews.get('preview-1').status).toBe('purchased');
    });

    it('keeps the images of a preview bought after the expiry sweep ran', async () => {
      const now = new Date('2026-03-10T12:00:00Z');
      const cleanup = new CleanupService(previews, storage, config);
      jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
      previews.insert(
        buildPreview({ status: 'active', expiresAt: new Date(now.getTime() - 2 * HOUR_MS) }),
      );
      await storage.upload('final/preview-1/page_01.jpg', Buffer.from('a'), 'image/jpeg');

      await cleanup.sweepExpiredPreviews(now);
      expect(previews.get('preview-1').status).toBe('expired');

      const result = await service.registerPaidOrder(payment, now);
      await cleanup.sweepExpiredPreviews(new Date(now.getTime() + 48 * HOUR_MS));

      expect(result.outcome).toBe('created');
      expect(previews.get('preview-1').status).toBe('purchased');
      expect([...storage.objects.keys()]).toEqual(['final/preview-1/page_01.jpg']);
    });

    it('rejects payment once the grace period is over', async () => {
      const now = new Date('2026-03-10T12:00:00Z');
      previews.insert(
        buildPreview({ status: 'expired', expiresAt: new Date(now.getTime() - 25 * HOUR_MS) }),
      );

      const result = await service.registerPaidOrder(payment, now);

      expect(result).toEqual({ outcome: 'rejected', reason: 'preview_expired' });
      expect(orders.rows.size).toBe(0);
    });

    it('rejects unknown and unfinished previews', async () => {
      await expect(service.registerPaidOrder(payment)).resolves.toEqual({
        outcome: 'rejected',
        reason: 'preview_not_found',
      });

      previews.insert(buildPreview({ status: 'generating' }));
      await expect(service.registerPaidOrder(payment)).resolves.toEqual({
        outcome: 'rejected',
        reason: 'preview_not_ready',
      });
    });

    it('queues the book on redelivery when the first delivery failed to enqueue it', async () => {
      previews.insert(buildPreview({ status: 'active' }));
      jest.spyOn(queue, 'add').mockRejectedValueOnce(new Error('redis unavailable'));

      await expect(service.registerPaidOrder(payment)).rejects.toThrow('redis unavailable');
      const second = await service.registerPaidOrder(payment);

      expect(second).toMatchObject({ outcome: 'duplicate', order: { id: 'order-1', status: 'paid' } });
      expect(jobs.rows.size).toBe(1);
      expect(queue.added).toEqual([
        {
          name: 'complete',
          data: { orderId: 'order-1', previewId: 'preview-1', childName: 'Leo', jobId: 'job-1' },
          opts: { jobId: 'complete-order-1' },
        },
      ]);
    });

    it('finishes the purchase on redelivery when the preview update failed', async () => {
      previews.insert(buildPreview({ status: 'active' }));
      jest.spyOn(previews, 'update').mockRejectedValueOnce(new Error('connection reset'));

      await expect(service.registerPaidOrder(payment)).rejects.toThrow('connection reset');
      expect(jobs.rows.size).toBe(0);

      await service.registerPaidOrder(payment);

      expect(previews.get('preview-1').status).toBe('purchased');
      expect(jobs.get('job-1')).toMatchObject({ jobType: 'book_completion', referenceId: 'order-1' });
      expect(queue.added).toHaveLength(1);
    });

    it('queues nothing when a finished order is delivered again', async () => {
      previews.insert(buildPreview({ status: 'purchased' }));
      orders.insert(buildOrder({ status: 'completed' }));

      const result = await service.registerPaidOrder(payment);

      expect(result.outcome).toBe('duplicate');
      expect(queue.added).toEqual([]);
      expect(jobs.rows.size).toBe(0);
    });
  });

  it('marks a known order refunded', async () => {
    orders.insert(buildOrder({ status: 'completed' }));

    await expect(service.markRefunded('5551001')).resolves.toBe(true);
    await expect(service.markRefunded('nope')).resolves.toBe(false);
    expect(orders.get('order-1').status).toBe('refunded');
  });

  describe('getDownload', () => {
    const now = new Date('2026-03-10T12:00:00Z');

    it('reports a book that is still being generated', async () => {
      orders.insert(buildOrder({ status: 'generating_pdf' }));

      await expect(service.getDownload('5551001', now)).resolves.toEqual({
        status: 'generating',
        orderId: 'order-1',
        message: 'Your book is still being created',
      });
    });

    it('signs the pdf and every page for a completed order', async () => {
      previews.insert(buildPreview({ status: 'purchased', pages: [buildPage(1), buildPage(2)] }));
      orders.insert(
        buildOrder({
          status: 'completed',
          pdfUrl: 'https://cdn.test/final/preview-1/storybook.pdf',
          expiresAt: new Date(now.getTime() + 30 * 24 * HOUR_MS),
        }),
      );

      const download = await service.getDownload('5551001', now);

      expect(download).toEqual({
        status: 'completed',
        orderId: 'order-1',
        orderNumber: '#1001',
        title: 'Leo and the Starlight Voyage',
        pdfUrl: 'https://cdn.test/final/preview-1/storybook.pdf?expires=3600',
        pages: [
          { pageNumber: 1, imageUrl: 'https://cdn.test/final/preview-1/page_01.jpg?expires=3600' },
          { pageNumber: 2, imageUrl: 'https://cdn.test/final/preview-1/page_02.jpg?expires=3600' },
        ],
        expiresAt: '2026-04-09T12:00:00.000Z',
        daysRemaining: 30,
      });
    });

    it('looks orders up by preview id', async () => {
      const previewId = '0d9f3c1e-8a43-4c6b-9a7e-2f1b5c3d4e6f';
      orders.insert(buildOrder({ previewId, status: 'paid' }));

      await expect(service.getDownload(previewId, now)).resolves.toMatchObject({
        status: 'generating',
        orderId: 'order-1',
      });
    });

    it('410s an expired download and 409s a failed one', async () => {
      orders.insert(
        buildOrder({
          status: 'completed',
          pdfUrl: 'https://cdn.test/final/preview-1/storybook.pdf',
          expiresAt: new Date(now.getTime() - 1),
        }),
      );
      orders.insert(buildOrder({ id: 'order-2', externalOrderId: '5551002', status: 'failed' }));

      await expect(service.getDownload('5551001', now)).rejects.toBeInstanceOf(GoneException);
      await expect(service.getDownload('5551002', now)).rejects.toBeInstanceOf(ConflictException);
      await expect(service.getDownload('missing', now)).rejects.toBeInstanceOf(NotFoundException);
    });
  });
});
