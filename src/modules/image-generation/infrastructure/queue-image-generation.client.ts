import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SLEEP_FN, toError, type SleepFn } from '../../../common/utils/concurrency';
import { isRecord, readString } from '../../../common/utils/types';
import type {
  GenerationFailureReason,
  GenerationOutcome,
} from '../domain/generation-outcome';
import type {
  ImageGenerationClient,
  ImageGenerationRequest,
} from '../domain/image-generation-client.interface';
import {
  IMAGE_SIZES,
  getModelForStyle,
  type ImageModel,
} from '../domain/model-registry';
import { extractImageUrl } from '../domain/response-extractors';

interface QueueTicket {
  requestId: string | null;
  statusUrl: string;
  responseUrl: string;
}

type Fetched =
  | { ok: true; payload: unknown }
  | { ok: false; reason: GenerationFailureReason; message: string };

const PENDING_STATUSES = new Set(['IN_QUEUE', 'IN_PROGRESS']);
const FAILED_STATUSES = new Set(['FAILED', 'CANCELLED']);

/**
 * Client for queue-based generation APIs: submit, poll the status URL on a
 * fixed interval, then fetch and normalize the result. Expected failures come
 * back as `{ ok: false }` outcomes and are never thrown.
 */
@Injectable()
export class QueueImageGenerationClient implements ImageGenerationClient {
  private readonly logger = new Logger(QueueImageGenerationClient.name);
  private readonly apiKey: string;
  private readonly queueUrl: string;
  private readonly pollIntervalMs: number;
  private readonly maxPolls: number;

  constructor(
    private readonly configService: ConfigService,
    @Inject(SLEEP_FN) private readonly sleep: SleepFn,
  ) {
    const apiKey = this.configService.get<string>('imageGeneration.apiKey');
    if (!apiKey) {
      throw new Error('IMAGE_API_KEY is not configured');
    }
    this.apiKey = apiKey;
    this.queueUrl = (
      this.configService.get<string>('imageGeneration.queueUrl') || 'https://queue.fal.run'
    ).replace(/\/$/, '');
    this.pollIntervalMs =
      this.configService.get<number>('imageGeneration.pollIntervalMs') ?? 5000;
    this.maxPolls = this.configService.get<number>('imageGeneration.maxPolls') ?? 60;
  }

  async generate(request: ImageGenerationRequest): Promise<GenerationOutcome> {
    const model = getModelForStyle(request.style);
    const input: Record<string, unknown> = {
      prompt: `${request.prompt}\n\nStyle: ${model.promptStyle}`,
      reference_image_url: request.referenceImageUrl,
      image_size: IMAGE_SIZES[request.aspectRatio],
      negative_prompt: model.negativePrompt,
      num_images: 1,
      enable_safety_checker: true,
    };
    if (request.seed !== null) {
      input.seed = request.seed;
    }

    return this.submitAndWait(model, input);
  }

  async submitAndWait(
    model: ImageModel,
    input: Record<string, unknown>,
  ): Promise<GenerationOutcome> {
    const startedAt = Date.now();
    const fail = (reason: GenerationFailureReason, message: string): GenerationOutcome => ({
      ok: false,
      reason,
      message,
      latencyMs: Date.now() - startedAt,
    });

    const submitted = await this.request(`${this.queueUrl}/${model.endpoint}`, {
      method: 'POST',
      body: JSON.stringify(input),
    });
    if (!submitted.ok) {
      return fail(submitted.reason, submitted.message);
    }

    let payload = submitted.payload;
    const ticket = this.parseTicket(payload);
    const status = isRecord(payload) ? readString(payload, 'status') : null;

    if (status && FAILED_STATUSES.has(status)) {
      return fail('server_failure', `Generation ${status.toLowerCase()} on submit`);
    }

    if (ticket) {
      this.logger.debug(`Submitted ${model.id} request ${ticket.requestId ?? 'unknown'}`);
      const result =
        status === 'COMPLETED'
          ? await this.request(ticket.responseUrl, { method: 'GET' })
          : await this.pollUntilDone(ticket);
      if (!result.ok) {
        return fail(result.reason, result.message);
      }
      payload = result.payload;
    }

    const imageUrl = extractImageUrl(payload);
    if (!imageUrl) {
      return fail('no_image', 'Generation result did not contain an image URL');
    }

    return {
      ok: true,
      imageUrl,
      costUsd: model.costPerImage,
      latencyMs: Date.now() - startedAt,
      model: model.id,
      metadata: {
        requestId: ticket?.requestId ?? null,
        endpoint: model.endpoint,
      },
    };
  }

  private async pollUntilDone(ticket: QueueTicket): Promise<Fetched> {
    for (let tick = 1; tick <= this.maxPolls; tick++) {
      await this.sleep(this.pollIntervalMs);

      const polled = await this.request(ticket.statusUrl, { method: 'GET' });
      if (!polled.ok) {
        this.logger.warn(`Poll ${tick}/${this.maxPolls} failed: ${polled.message}`);
        continue;
      }

      const status = isRecord(polled.payload) ? readString(polled.payload, 'status') : null;
      if (status === 'COMPLETED') {
        return this.request(ticket.responseUrl, { method: 'GET' });
      }
      if (status && FAILED_STATUSES.has(status)) {
        return { ok: false, reason: 'server_failure', message: `Generation ${status.toLowerCase()}` };
      }
      if (!status || !PENDING_STATUSES.has(status)) {
        return {
          ok: false,
          reason: 'server_failure',
          message: `Unexpected status: ${status ?? 'missing'}`,
        };
      }
    }

    return {
      ok: false,
      reason: 'timeout',
      message: `Generation did not finish after ${this.maxPolls} polls`,
    };
  }

  private parseTicket(payload: unknown): QueueTicket | null {
    if (!isRecord(payload)) return null;

    const status = readString(payload, 'status');
    const statusUrl = readString(payload, 'status_url');
    const responseUrl = readString(payload, 'response_url');
    if (!statusUrl || !responseUrl) return null;
    if (status !== 'COMPLETED' && !(status && PENDING_STATUSES.has(status))) return null;

    return { requestId: readString(payload, 'request_id'), statusUrl, responseUrl };
  }

  private async request(url: string, init: { method: string; body?: string }): Promise<Fetched> {
    try {
      const response = await fetch(url, {
        ...init,
        headers: {
          Authorization: `Key ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
      });

      if (!response.ok) {
        const detail = (await response.text()).slice(0, 200);
        return {
          ok: false,
          reason: 'http_error',
          message: `${init.method} ${url} returned HTTP ${response.status}${detail ? `: ${detail}` : ''}`,
        };
      }

      const payload: unknown = await response.json();
      return { ok: true, payload };
    } catch (error) {
      return { ok: false, reason: 'transport_error', message: toError(error).message };
    }
  }
}
