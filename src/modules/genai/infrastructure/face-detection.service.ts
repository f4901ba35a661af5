import { GoogleGenAI } from '@google/genai';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { toError } from '../../../common/utils/concurrency';
import { isRecord, readNumber } from '../../../common/utils/types';
import type {
  DetectedFaces,
  FaceDetectionOutcome,
  FaceDetector,
} from '../domain/face-detector.interface';

const PROMPT = `Find every human face in this photo.

Reply with JSON only, in this shape:
{"faces": [{"box_2d": [ymin, xmin, ymax, xmax], "confidence": 0.0}]}

Box coordinates are normalized to 0-1000. "confidence" is between 0 and 1 and is high only for a sharp face looking at the camera. Reply {"faces": []} when there is no face.`;

/** Coordinates of a `box_2d` are on a 0-1000 grid. */
const BOX_SCALE = 1000;

/** Reads the detector's JSON reply. Returns null when it is not the expected shape. */
export function parseFaceDetection(text: string): DetectedFaces | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.faces)) return null;

  const faces = parsed.faces.flatMap((face): { area: number; confidence: number }[] => {
    if (!isRecord(face) || !Array.isArray(face.box_2d) || face.box_2d.length !== 4) return [];
    const box = face.box_2d.filter((value): value is number => typeof value === 'number');
    if (box.length !== 4) return [];

    const [ymin, xmin, ymax, xmax] = box;
    const area = (Math.max(0, ymax - ymin) * Math.max(0, xmax - xmin)) / (BOX_SCALE * BOX_SCALE);
    return [{ area: Math.min(1, area), confidence: readNumber(face, 'confidence') ?? 0 }];
  });

  const largest = faces.reduce<{ area: number; confidence: number } | null>(
    (best, face) => (!best || face.area > best.area ? face : best),
    null,
  );

  return {
    faceCount: faces.length,
    largestFaceArea: largest?.area ?? 0,
    confidence: largest?.confidence ?? 0,
  };
}

@Injectable()
export class FaceDetectionService implements FaceDetector {
  private readonly logger = new Logger(FaceDetectionService.name);
  private readonly client: GoogleGenAI | null;
  private readonly model: string;

  constructor(private readonly configService: ConfigService) {
    const apiKey = this.configService.get<string>('genai.apiKey');
    this.model = this.configService.get<string>('genai.visionModel') || 'gemini-2.0-flash';
    this.client = apiKey ? new GoogleGenAI({ apiKey }) : null;
  }

  async detect(image: Buffer): Promise<FaceDetectionOutcome> {
    if (!this.client) {
      return { ok: false, reason: 'not_configured', message: 'Vision model is not configured' };
    }

    let text: string | undefined;
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: [
          {
            role: 'user',
            parts: [
              { inlineData: { data: image.toString('base64'), mimeType: 'image/jpeg' } },
              { text: PROMPT },
            ],
          },
        ],
        config: { temperature: 0, responseMimeType: 'application/json' },
      });
      text = response.text;
    } catch (error) {
      const message = toError(error).message;
      this.logger.warn(`Face detection failed: ${message}`);
      return { ok: false, reason: 'request_failed', message };
    }

    const faces = text ? parseFaceDetection(text) : null;
    if (!faces) {
      this.logger.warn(`Face detection reply was not usable: ${(text ?? '').slice(0, 200)}`);
      return {
        ok: false,
        reason: 'unreadable_response',
        message: 'Vision model returned no face list',
      };
    }
    return { ok: true, faces };
  }
}
