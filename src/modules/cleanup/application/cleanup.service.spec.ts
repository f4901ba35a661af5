import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { buildPreview } from '../../../test/fixtures';
import { FakeStorage } from '../../../test/fakes/collaborators';
import { InMemoryPreviewsRepository } from '../../../test/fakes/in-memory-previews.repository';
import { CleanupService } from './cleanup.service';

const HOUR_MS = 60 * 60 * 1000;

describe('CleanupService', () => {
  const now = new Date('2026-03-10T12:00:00Z');
  const past = new Date(now.getTime() - 1000);
  const future = new Date(now.getTime() + 1000);
  const beyondGrace = new Date(now.getTime() - 25 * HOUR_MS);
  const withinGrace = new Date(now.getTime() - 23 * HOUR_MS);

  let previews: InMemoryPreviewsRepository;
  let storage: FakeStorage;
  let service: CleanupService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    previews = new InMemoryPreviewsRepository();
    storage = new FakeStorage();
    service = new CleanupService(
      previews,
      storage,
      new ConfigService({ book: { purchaseGraceHours: 24 } }),
    );
  });

  afterEach(() => jest.restoreAllMocks());

  it('expires unpurchased previews but keeps their images through the grace window', async () => {
    previews.insert(buildPreview({ id: 'old-active', status: 'active', expiresAt: past }));
    previews.insert(buildPreview({ id: 'old-failed', status: 'failed', expiresAt: past }));
    previews.insert(buildPreview({ id: 'fresh', status: 'active', expiresAt: future }));
    previews.insert(buildPreview({ id: 'bought', status: 'purchased', expiresAt: past }));
    await storage.upload('final/old-active/page_01.jpg', Buffer.from('a'), 'image/jpeg');
    await storage.upload('final/fresh/page_01.jpg', Buffer.from('c'), 'image/jpeg');

    const result = await service.sweepExpiredPreviews(now);

    expect(result).toEqual({ expired: 2, purged: 0, objectsDeleted: 0, failures: 0 });
    expect(previews.get('old-active').status).toBe('expired');
    expect(previews.get('old-failed').status).toBe('expired');
    expect(previews.get('fresh').status).toBe('active');
    expect(previews.get('bought').status).toBe('purchased');
    expect([...storage.objects.keys()]).toEqual([
      'final/old-active/page_01.jpg',
      'final/fresh/page_01.jpg',
    ]);
  });

  it('deletes images once the grace window has closed', async () => {
    previews.insert(buildPreview({ id: 'lapsed', status: 'expired', expiresAt: beyondGrace }));
    previews.insert(buildPreview({ id: 'recent', status: 'expired', expiresAt: withinGrace }));
    previews.insert(buildPreview({ id: 'bought', status: 'purchased', expiresAt: beyondGrace }));
    await storage.upload('final/lapsed/page_01.jpg', Buffer.from('a'), 'image/jpeg');
    await storage.upload('final/lapsed/preview_01.jpg', Buffer.from('b'), 'image/jpeg');
    await storage.upload('final/recent/page_01.jpg', Buffer.from('c'), 'image/jpeg');
    await storage.upload('final/bought/page_01.jpg', Buffer.from('d'), 'image/jpeg');

    const result = await service.sweepExpiredPreviews(now);

    expect(result).toEqual({ expired: 0, purged: 1, objectsDeleted: 2, failures: 0 });
    expect(previews.get('lapsed').storagePurgedAt).toEqual(now);
    expect(previews.get('recent').storagePurgedAt).toBeNull();
    expect([...storage.objects.keys()]).toEqual([
      'final/recent/page_01.jpg',
      'final/bought/page_01.jpg',
    ]);
  });

  it('does not delete the same preview twice', async () => {
    previews.insert(
      buildPreview({ id: 'lapsed', status: 'expired', expiresAt: beyondGrace, storagePurgedAt: past }),
    );
    const deletePrefix = jest.spyOn(storage, 'deletePrefix');

    await expect(service.sweepExpiredPreviews(now)).resolves.toEqual({
      expired: 0,
      purged: 0,
      objectsDeleted: 0,
      failures: 0,
    });
    expect(deletePrefix).not.toHaveBeenCalled();
  });

  it('does nothing when no preview has expired', async () => {
    previews.insert(buildPreview({ id: 'fresh', status: 'active', expiresAt: future }));

    await expect(service.sweepExpiredPreviews(now)).resolves.toEqual({
      expired: 0,
      purged: 0,
      objectsDeleted: 0,
      failures: 0,
    });
    expect(previews.updates).toEqual([]);
  });

  it('retries a failed image delete on the next sweep', async () => {
    previews.insert(buildPreview({ id: 'lapsed', status: 'expired', expiresAt: beyondGrace }));
    await storage.upload('final/lapsed/page_01.jpg', Buffer.from('a'), 'image/jpeg');
    jest.spyOn(storage, 'deletePrefix').mockRejectedValueOnce(new Error('storage down'));

    const first = await service.sweepExpiredPreviews(now);

    expect(first).toEqual({ expired: 0, purged: 0, objectsDeleted: 0, failures: 1 });
    expect(previews.get('lapsed').storagePurgedAt).toBeNull();
    expect(storage.objects.has('final/lapsed/page_01.jpg')).toBe(true);
    expect(Logger.prototype.error).toHaveBeenCalledTimes(1);

    const second = await service.sweepExpiredPreviews(now);

    expect(second).toEqual({ expired: 0, purged: 1, objectsDeleted: 1, failures: 0 });
    expect(previews.get('lapsed').storagePurgedAt).toEqual(now);
    expect(storage.objects.size).toBe(0);
  });

  it('keeps sweeping when one preview fails to expire', async () => {
    previews.insert(buildPreview({ id: 'a', status: 'active', expiresAt: past }));
    previews.insert(buildPreview({ id: 'b', status: 'active', expiresAt: past }));
    jest.spyOn(previews, 'update').mockRejectedValueOnce(new Error('connection reset'));

    const result = await service.sweepExpiredPreviews(now);

    expect(result).toEqual({ expired: 1, purged: 0, objectsDeleted: 0, failures: 1 });
    expect(previews.get('a').status).toBe('active');
    expect(previews.get('b').status).toBe('expired');
    expect(Logger.prototype.error).toHaveBeenCalledTimes(1);
  });
});
