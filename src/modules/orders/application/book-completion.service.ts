import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SLEEP_FN, toError, type SleepFn } from '../../../common/utils/concurrency';
import { addDays } from '../../../common/utils/dates';
import {
  NOTIFICATION_DISPATCHER,
  type NotificationDispatcher,
} from '../../notifications/domain/notification-dispatcher.interface';
import { PDF_ASSEMBLER, type PdfAssembler } from '../../pdf/domain/pdf-assembler.interface';
import { PageRendererService } from '../../previews/application/page-renderer.service';
import {
  mergePages,
  missingPageNumbers,
  type GenerationPhase,
  type PageResult,
  type Preview,
} from '../../previews/domain/entities/preview.entity';
import { PreviewNotFoundError, UnknownThemeError } from '../../previews/domain/errors';
import { canAdvanceGenerationPhase } from '../../previews/domain/preview-status';
import {
  IPreviewsRepositoryToken,
  type IPreviewsRepository,
} from '../../previews/domain/previews.repository.interface';
import { StoriesService } from '../../stories/application/stories.service';
import type { StoryTheme } from '../../stories/domain/story-theme';
import { canTransitionOrderStatus, type Order, type OrderStatus } from '../domain/entities/order.entity';
import {
  BookCompletionError,
  OrderNotFoundError,
  OrderNotProcessableError,
} from '../domain/errors';
import {
  IOrdersRepositoryToken,
  type IOrdersRepository,
} from '../domain/orders.repository.interface';

/**
 * Generates the pages a buyer has not seen yet and assembles the book.
 * Unlike the preview run, one failed page fails the whole attempt, and the
 * attempt is repeated as a unit with exponential backoff.
 */
@Injectable()
export class BookCompletionService {
  private readonly logger = new Logger(BookCompletionService.name);

  constructor(
    @Inject(IOrdersRepositoryToken)
    private readonly ordersRepository: IOrdersRepository,
    @Inject(IPreviewsRepositoryToken)
    private readonly previewsRepository: IPreviewsRepository,
    @Inject(PDF_ASSEMBLER)
    private readonly pdfAssembler: PdfAssembler,
    @Inject(NOTIFICATION_DISPATCHER)
    private readonly notifications: NotificationDispatcher,
    @Inject(SLEEP_FN)
    private readonly sleep: SleepFn,
    private readonly pageRenderer: PageRendererService,
    private readonly storiesService: StoriesService,
    private readonly configService: ConfigService,
  ) {}

  /** Resolves to the PDF URL; throws BookCompletionError once every attempt failed. */
  async completeBookAndGeneratePdf(
    orderId: string,
    previewId: string,
    childName: string,
    maxRetries = this.configService.get<number>('book.maxCompletionRetries') ?? 3,
  ): Promise<string> {
    const attempts = Math.max(1, maxRetries);
    const baseDelayMs = this.configService.get<number>('book.retryBaseDelayMs') ?? 1000;
    let lastError = 'unknown error';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const pdfUrl = await this.runAttempt(orderId, previewId, childName);
        this.logger.log(`Order ${orderId}: book ready after ${attempt} attempt(s)`);
        return pdfUrl;
      } catch (error) {
        // Nothing to retry once the order is gone or refunded.
        if (error instanceof OrderNotFoundError || error instanceof OrderNotProcessableError) {
          this.logger.warn(`Order ${orderId}: ${error.message}`);
          throw error;
        }

        lastError = toError(error).message;
        this.logger.warn(`Order ${orderId}: attempt ${attempt}/${attempts} failed: ${lastError}`);
        await this.ordersRepository.update(orderId, {
          retryCount: attempt,
          errorMessage: lastError,
        });

        if (attempt < attempts) {
          await this.sleep(2 ** attempt * baseDelayMs);
        }
      }
    }

    const message = `Book generation failed after ${attempts} attempts: ${lastError}`;
    this.logger.error(`Order ${orderId}: ${message}`);
    const order = await this.ordersRepository.findById(orderId);
    if (order && canTransitionOrderStatus(order.status, 'failed')) {
      await this.ordersRepository.update(orderId, { status: 'failed', errorMessage: message });
    } else {
      await this.ordersRepository.update(orderId, { errorMessage: message });
    }
    const preview = await this.previewsRepository.findById(previewId);
    if (preview) {
      await this.advancePhase(previewId, preview.generationPhase, 'failed');
    }
    throw new BookCompletionError(message, attempts);
  }

  private async runAttempt(orderId: string, previewId: string, childName: string): Promise<string> {
    const preview = await this.previewsRepository.findById(previewId);
    if (!preview) {
      throw new PreviewNotFoundError(previewId);
    }

    const theme = this.storiesService.getTheme(preview.request.themeId);
    if (!theme) {
      throw new UnknownThemeError(preview.request.themeId);
    }

    await this.requireOrderTransition(orderId, 'generating_pdf');
    await this.ordersRepository.update(orderId, { status: 'generating_pdf' });

    const missing = missingPageNumbers(preview.pages, preview.totalPageCount);
    let pages = preview.pages;
    let phase = preview.generationPhase;
    if (missing.length > 0 || phase === 'failed') {
      phase = await this.advancePhase(previewId, phase, 'generating_full');
    }
    if (missing.length > 0) {
      const generated = await this.generateAll(preview, theme, missing);
      pages = mergePages(preview.pages, generated);
      await this.previewsRepository.update(previewId, { pages });
    }
    await this.advancePhase(previewId, phase, 'complete');

    const bookPages = pages.filter((page) => page.pageNumber <= preview.totalPageCount);
    const coverUrl = preview.coverUrl ?? bookPages[0].imageUrl;
    const pdfUrl = await this.pdfAssembler.generate({
      previewId,
      title: this.storiesService.bookTitle(theme, childName),
      childName,
      coverUrl,
      pages: bookPages.map((page) => ({
        pageNumber: page.pageNumber,
        imageUrl: page.imageUrl,
        storyText: page.storyText,
      })),
    });

    // A refund may have arrived while the pages were rendering.
    await this.requireOrderTransition(orderId, 'completed');

    const downloadDays = this.configService.get<number>('book.downloadExpiryDays') ?? 30;
    const now = new Date();
    await this.previewsRepository.update(previewId, {
      pdfUrl,
      status: 'purchased',
      expiresAt: addDays(now, downloadDays),
    });
    await this.ordersRepository.update(orderId, {
      status: 'completed',
      pdfUrl,
      errorMessage: null,
      completedAt: now,
    });

    await this.notifyBookReady(orderId, preview, this.storiesService.bookTitle(theme, childName));
    return pdfUrl;
  }

  private async requireOrderTransition(orderId: string, to: OrderStatus): Promise<Order> {
    const order = await this.ordersRepository.findById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    if (!canTransitionOrderStatus(order.status, to)) {
      throw new OrderNotProcessableError(orderId, order.status);
    }
    return order;
  }

  /** Writes the phase only when the move is allowed; returns the phase now stored. */
  private async advancePhase(
    previewId: string,
    from: GenerationPhase,
    to: GenerationPhase,
  ): Promise<GenerationPhase> {
    if (from === to) return from;
    if (!canAdvanceGenerationPhase(from, to)) {
      this.logger.debug(`Preview ${previewId}: phase stays ${from} (not moving to ${to})`);
      return from;
    }
    await this.previewsRepository.update(previewId, { generationPhase: to });
    return to;
  }

  /** All or nothing: results are only returned when every page succeeded. */
  private async generateAll(
    preview: Preview,
    theme: StoryTheme,
    pageNumbers: number[],
  ): Promise<PageResult[]> {
    const faceDescription = await this.pageRenderer.resolveFaceDescription(preview, {
      analyze: false,
    });
    const generated: PageResult[] = [];

    for (const pageNumber of pageNumbers) {
      const template = theme.pages.find((page) => page.pageNumber === pageNumber);
      if (!template) {
        throw new Error(`Theme ${theme.id} has no page ${pageNumber}`);
      }
      generated.push(
        await this.pageRenderer.renderPage(preview, template, faceDescription, { watermark: false }),
      );
      this.logger.debug(`Preview ${preview.id}: page ${pageNumber} generated for full book`);
    }

    return generated;
  }

  private async notifyBookReady(orderId: string, preview: Preview, bookTitle: string) {
    const order = await this.ordersRepository.findById(orderId);
    const email = order?.customerEmail ?? preview.customerEmail;
    if (!email) return;

    const frontendUrl = this.configService.get<string>('app.frontendUrl') ?? '';
    try {
      const sent = await this.notifications.send(email, 'book_ready', {
        childName: preview.request.childName,
        bookTitle,
        downloadUrl: `${frontendUrl}/#/download/${orderId}`,
      });
      if (!sent) {
        this.logger.warn(`Order ${orderId}: book_ready email not delivered`);
      }
    } catch (error) {
      this.logger.warn(`Order ${orderId}: book_ready email failed: ${toError(error).message}`);
    }
  }
}
