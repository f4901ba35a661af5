import type { FaceAnalysisOutcome, FaceAnalyzer } from '../../modules/genai/domain/face-analyzer.interface';
import type {
  FaceDetectionOutcome,
  FaceDetector,
} from '../../modules/genai/domain/face-detector.interface';
import type { GenerationOutcome } from '../../modules/image-generation/domain/generation-outcome';
import type {
  ImageGenerationClient,
  ImageGenerationRequest,
} from '../../modules/image-generation/domain/image-generation-client.interface';
import type {
  NotificationDispatcher,
  NotificationKind,
  NotificationPayloads,
} from '../../modules/notifications/domain/notification-dispatcher.interface';
import type { RateLimitStore } from '../../modules/rate-limiter/domain/rate-limit-store.interface';
import type { StorageGateway } from '../../modules/storage/domain/storage-gateway.interface';

export const CDN = 'https://cdn.test';

export class FakeStorage implements StorageGateway {
  readonly objects = new Map<string, Buffer>();
  readonly failingDownloads = new Set<string>();

  async upload(key: string, body: Buffer, _contentType: string): Promise<string> {
    this.objects.set(key, body);
    return `${CDN}/${key}`;
  }

  async download(url: string): Promise<Buffer> {
    if (this.failingDownloads.has(url)) {
      throw new Error(`Download failed for ${url}`);
    }
    return Buffer.from(`image:${url}`);
  }

  async getSignedUrl(keyOrUrl: string, expiresInSeconds = 3600): Promise<string> {
    return `${keyOrUrl}?expires=${expiresInSeconds}`;
  }

  async deletePrefix(prefix: string): Promise<number> {
    const keys = [...this.objects.keys()].filter((key) => key.startsWith(prefix));
    keys.forEach((key) => this.objects.delete(key));
    return keys.length;
  }
}

/**
 * Succeeds unless the n-th page call (5:4 aspect ratio, counted from 1) is
 * listed in `failingPageCalls`, or `failAll` is set. Cover calls (1:1) are
 * counted separately.
 */
export class ScriptedGenerationClient implements ImageGenerationClient {
  readonly requests: ImageGenerationRequest[] = [];
  readonly failingPageCalls = new Set<number>();
  failAll = false;
  failCover = false;
  private pageCalls = 0;
  private coverCalls = 0;

  async submitAndWait(): Promise<GenerationOutcome> {
    throw new Error('submitAndWait is not scripted');
  }

  async generate(request: ImageGenerationRequest): Promise<GenerationOutcome> {
    this.requests.push(request);

    if (request.aspectRatio === '1:1') {
      this.coverCalls += 1;
      return this.failAll || this.failCover
        ? this.failure('cover rejected')
        : this.success(`https://gen.test/cover-${this.coverCalls}.png`);
    }

    this.pageCalls += 1;
    if (this.failAll || this.failingPageCalls.has(this.pageCalls)) {
      return this.failure('server_error');
    }
    return this.success(`https://gen.test/page-call-${this.pageCalls}.png`);
  }

  get pageRequests(): ImageGenerationRequest[] {
    return this.requests.filter((request) => request.aspectRatio === '5:4');
  }

  private success(imageUrl: string): GenerationOutcome {
    return {
      ok: true,
      imageUrl,
      costUsd: 0.05,
      latencyMs: 1200,
      model: 'flux-pulid-photo',
      metadata: {},
    };
  }

  private failure(message: string): GenerationOutcome {
    return { ok: false, reason: 'server_failure', message, latencyMs: 800 };
  }
}

export class FakeFaceAnalyzer implements FaceAnalyzer {
  calls = 0;

  constructor(
    private readonly outcome: FaceAnalysisOutcome = {
      ok: true,
      description: 'short curly brown hair, brown eyes, freckles',
    },
  ) {}

  async analyze(): Promise<FaceAnalysisOutcome> {
    this.calls += 1;
    return this.outcome;
  }
}

export class FakeFaceDetector implements FaceDetector {
  calls = 0;

  constructor(
    public outcome: FaceDetectionOutcome = {
      ok: true,
      faces: { faceCount: 1, largestFaceArea: 0.25, confidence: 0.95 },
    },
  ) {}

  async detect(): Promise<FaceDetectionOutcome> {
    this.calls += 1;
    return this.outcome;
  }
}

export interface SentNotification {
  to: string;
  kind: NotificationKind;
  payload: NotificationPayloads[NotificationKind];
}

export class RecordingNotifications implements NotificationDispatcher {
  readonly sent: SentNotification[] = [];
  deliver = true;

  async send<K extends NotificationKind>(
    to: string,
    kind: K,
    payload: NotificationPayloads[K],
  ): Promise<boolean> {
    this.sent.push({ to, kind, payload });
    return this.deliver;
  }
}

export interface AddedQueueJob<T> {
  name: string;
  data: T;
  opts: { jobId?: string } | undefined;
}

interface FakeQueueJob<T> {
  id: string | undefined;
  data: T;
  finished: boolean;
  remove: () => Promise<void>;
}

/** Enough of a BullMQ queue for services that add, look up and recover jobs. */
export class FakeQueue<T> {
  readonly added: AddedQueueJob<T>[] = [];
  private readonly jobs = new Map<string, FakeQueueJob<T>>();
  private sequence = 0;
  paused = false;

  async add(name: string, data: T, opts?: { jobId?: string }): Promise<FakeQueueJob<T>> {
    const existing = opts?.jobId ? this.jobs.get(opts.jobId) : undefined;
    // BullMQ ignores an add whose jobId is already known.
    if (existing) return existing;

    this.sequence += 1;
    const id = opts?.jobId ?? String(this.sequence);
    const job: FakeQueueJob<T> = {
      id,
      data,
      finished: false,
      remove: async () => {
        this.jobs.delete(id);
      },
    };
    this.jobs.set(id, job);
    this.added.push({ name, data, opts });
    return job;
  }

  /** Simulate the worker having finished the job; it stays known by id. */
  finish(jobId: string) {
    const job = this.jobs.get(jobId);
    if (job) job.finished = true;
  }

  /** Simulate Redis losing everything. */
  clear() {
    this.jobs.clear();
  }

  async getJob(jobId: string): Promise<FakeQueueJob<T> | undefined> {
    return this.jobs.get(jobId);
  }

  async getJobs(): Promise<FakeQueueJob<T>[]> {
    return [...this.jobs.values()].filter((job) => !job.finished);
  }

  async isPaused() {
    return this.paused;
  }

  async resume() {
    this.paused = false;
  }
}

/** Counters in a map; TTLs are recorded but never expire anything. */
export class InMemoryRateLimitStore implements RateLimitStore {
  readonly counters = new Map<string, number>();
  readonly ttls = new Map<string, number>();

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const next = (this.counters.get(key) ?? 0) + 1;
    this.counters.set(key, next);
    this.ttls.set(key, ttlSeconds);
    return next;
  }
}
