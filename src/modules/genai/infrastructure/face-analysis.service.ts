import { GoogleGenAI } from '@google/genai';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toError } from '../../../common/utils/concurrency';
import {
  STORAGE_GATEWAY,
  type StorageGateway,
} from '../../storage/domain/storage-gateway.interface';
import type { FaceAnalysisOutcome, FaceAnalyzer } from '../domain/face-analyzer.interface';

const PROMPT = `Describe the child in this photo for an illustrator who must draw the same child consistently across a picture book.

Cover, in one or two plain sentences:
- hair colour, length and style
- eye colour
- skin tone
- face shape and any distinctive features (freckles, dimples, glasses)

Do not guess age, name or gender. Do not describe clothing or background. Reply with the description only.`;

const MAX_DESCRIPTION_LENGTH = 600;

@Injectable()
export class FaceAnalysisService implements FaceAnalyzer {
  private readonly logger = new Logger(FaceAnalysisService.name);
  private readonly client: GoogleGenAI | null;
  private readonly model: string;

  constructor(
    private readonly configService: ConfigService,
    @Inject(STORAGE_GATEWAY) private readonly storage: StorageGateway,
  ) {
    const apiKey = this.configService.get<string>('genai.apiKey');
    this.model = this.configService.get<string>('genai.visionModel') || 'gemini-2.0-flash';
    this.client = apiKey ? new GoogleGenAI({ apiKey }) : null;

    if (!this.client) {
      this.logger.warn('GOOGLE_API_KEY not set; face analysis will use the fallback description');
    }
  }

  async analyze(photoUrl: string): Promise<FaceAnalysisOutcome> {
    if (!this.client) {
      return { ok: false, reason: 'not_configured', message: 'Vision model is not configured' };
    }

    try {
      const photo = await this.storage.download(photoUrl);
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: [
          {
            role: 'user',
            parts: [
              { inlineData: { data: photo.toString('base64'), mimeType: 'image/jpeg' } },
              { text: PROMPT },
            ],
          },
        ],
        config: { temperature: 0.2, maxOutputTokens: 256 },
      });

      const description = response.text?.replace(/\s+/g, ' ').trim();
      if (!description) {
        return { ok: false, reason: 'empty_response', message: 'Vision model returned no text' };
      }

      return { ok: true, description: description.slice(0, MAX_DESCRIPTION_LENGTH) };
    } catch (error) {
      const message = toError(error).message;
      this.logger.warn(`Face analysis failed: ${message}`);
      return { ok: false, reason: 'request_failed', message };
    }
  }
}
