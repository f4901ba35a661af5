import { Inject, Injectable, Logger } from '@nestjs/common';
import { toError } from '../../../common/utils/concurrency';
import {
  FACE_ANALYZER,
  FALLBACK_FACE_DESCRIPTION,
  type FaceAnalyzer,
} from '../../genai/domain/face-analyzer.interface';
import {
  IMAGE_GENERATION_CLIENT,
  type ImageGenerationClient,
} from '../../image-generation/domain/image-generation-client.interface';
import type { AspectRatio } from '../../image-generation/domain/model-registry';
import {
  STORAGE_GATEWAY,
  type StorageGateway,
} from '../../storage/domain/storage-gateway.interface';
import { coverKey, pageImageKey, previewImageKey } from '../../storage/domain/storage-keys';
import { StoriesService, type PromptSubject } from '../../stories/application/stories.service';
import type { StoryTheme, ThemePage } from '../../stories/domain/story-theme';
import { WatermarkService } from '../../watermark/application/watermark.service';
import type { PageResult, Preview } from '../domain/entities/preview.entity';
import { PageGenerationError } from '../domain/errors';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../domain/previews.repository.interface';

const PAGE_ASPECT_RATIO: AspectRatio = '5:4';
const COVER_ASPECT_RATIO: AspectRatio = '1:1';
const IMAGE_CONTENT_TYPE = 'image/jpeg';

/**
 * Turns one theme page into a stored PageResult: prompt, generation call,
 * copy into our storage and an optional watermarked preview copy.
 */
@Injectable()
export class PageRendererService {
  private readonly logger = new Logger(PageRendererService.name);

  constructor(
    @Inject(FACE_ANALYZER)
    private readonly faceAnalyzer: FaceAnalyzer,
    @Inject(IMAGE_GENERATION_CLIENT)
    private readonly generationClient: ImageGenerationClient,
    @Inject(STORAGE_GATEWAY)
    private readonly storage: StorageGateway,
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    private readonly watermarkService: WatermarkService,
    private readonly storiesService: StoriesService,
  ) {}

  /**
   * The stored analysis when there is one. Otherwise analyze the photo once
   * (when allowed) and persist a successful result; failures fall back to a
   * generic description that is never stored.
   */
  async resolveFaceDescription(
    preview: Preview,
    options: { analyze: boolean },
  ): Promise<string> {
    if (preview.faceAnalysis) {
      return preview.faceAnalysis;
    }
    if (!options.analyze) {
      return FALLBACK_FACE_DESCRIPTION;
    }

    const outcome = await this.faceAnalyzer.analyze(preview.request.photoUrl);
    if (!outcome.ok) {
      this.logger.warn(
        `Preview ${preview.id}: face analysis unavailable (${outcome.reason}), using fallback`,
      );
      return FALLBACK_FACE_DESCRIPTION;
    }

    await this.previewsRepository.update(preview.id, { faceAnalysis: outcome.description });
    return outcome.description;
  }

  /** Resolves to the stored cover URL, or null when the cover could not be made. */
  async renderCover(
    preview: Preview,
    theme: StoryTheme,
    faceDescription: string,
  ): Promise<string | null> {
    if (preview.coverUrl) return preview.coverUrl;

    const outcome = await this.generationClient.generate({
      prompt: this.storiesService.buildCoverPrompt(theme, this.subjectOf(preview, faceDescription)),
      referenceImageUrl: preview.request.photoUrl,
      style: preview.request.style,
      aspectRatio: COVER_ASPECT_RATIO,
      seed: preview.request.seed,
    });

    if (!outcome.ok) {
      this.logger.warn(`Preview ${preview.id}: cover failed (${outcome.reason}): ${outcome.message}`);
      return null;
    }

    try {
      const image = await this.storage.download(outcome.imageUrl);
      return await this.storage.upload(coverKey(preview.id), image, IMAGE_CONTENT_TYPE);
    } catch (error) {
      this.logger.warn(`Preview ${preview.id}: storing cover failed: ${toError(error).message}`);
      return null;
    }
  }

  /** Throws when the page could not be generated or stored. */
  async renderPage(
    preview: Preview,
    page: ThemePage,
    faceDescription: string,
    options: { watermark: boolean },
  ): Promise<PageResult> {
    const outcome = await this.generationClient.generate({
      prompt: this.storiesService.buildPagePrompt(page, this.subjectOf(preview, faceDescription)),
      referenceImageUrl: preview.request.photoUrl,
      style: preview.request.style,
      aspectRatio: PAGE_ASPECT_RATIO,
      seed: preview.request.seed,
    });

    if (!outcome.ok) {
      throw new PageGenerationError(page.pageNumber, outcome.reason, outcome.message);
    }

    const image = await this.storage.download(outcome.imageUrl);
    const imageUrl = await this.storage.upload(
      pageImageKey(preview.id, page.pageNumber),
      image,
      IMAGE_CONTENT_TYPE,
    );

    const previewImageUrl = options.watermark
      ? await this.storeWatermarkedCopy(preview.id, page.pageNumber, image)
      : null;

    return {
      pageNumber: page.pageNumber,
      sourceImageUrl: outcome.imageUrl,
      imageUrl,
      previewImageUrl,
      storyText: this.storiesService.renderStoryText(page, preview.request.childName),
      model: outcome.model,
      latencyMs: outcome.latencyMs,
      costUsd: outcome.costUsd,
    };
  }

  private async storeWatermarkedCopy(
    previewId: string,
    pageNumber: number,
    image: Buffer,
  ): Promise<string | null> {
    try {
      const watermarked = await this.watermarkService.applyPreviewWatermark(image);
      return await this.storage.upload(
        previewImageKey(previewId, pageNumber),
        watermarked,
        IMAGE_CONTENT_TYPE,
      );
    } catch (error) {
      this.logger.warn(
        `Preview ${previewId}: watermark for page ${pageNumber} failed: ${toError(error).message}`,
      );
      return null;
    }
  }

  private subjectOf(preview: Preview, faceDescription: string): PromptSubject {
    return {
      childName: preview.request.childName,
      childAge: preview.request.childAge,
      childGender: preview.request.childGender,
      faceDescription,
    };
  }
}
