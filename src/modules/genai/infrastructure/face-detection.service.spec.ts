import { ConfigService } from '@nestjs/config';
import { FaceDetectionService, parseFaceDetection } from './face-detection.service';

describe('parseFaceDetection', () => {
  it('reports the largest face and its confidence', () => {
    const text = JSON.stringify({
      faces: [
        { box_2d: [0, 0, 100, 100], confidence: 0.5 },
        { box_2d: [100, 200, 600, 700], confidence: 0.92 },
      ],
    });

    expect(parseFaceDetection(text)).toEqual({
      faceCount: 2,
      largestFaceArea: 0.25,
      confidence: 0.92,
    });
  });

  it('reads an empty list as no face', () => {
    expect(parseFaceDetection('{"faces": []}')).toEqual({
      faceCount: 0,
      largestFaceArea: 0,
      confidence: 0,
    });
  });

  it('skips entries without a usable box', () => {
    const text = JSON.stringify({
      faces: [{ box_2d: [1, 2, 3] }, { box_2d: ['a', 0, 10, 10] }, { confidence: 1 }],
    });

    expect(parseFaceDetection(text)).toEqual({
      faceCount: 0,
      largestFaceArea: 0,
      confidence: 0,
    });
  });

  it('returns null for replies that are not a face list', () => {
    expect(parseFaceDetection('one face, looking left')).toBeNull();
    expect(parseFaceDetection('{"people": 1}')).toBeNull();
  });
});

describe('FaceDetectionService', () => {
  it('reports not_configured without an api key', async () => {
    const service = new FaceDetectionService(new ConfigService({ genai: {} }));

    await expect(service.detect(Buffer.from('photo'))).resolves.toEqual({
      ok: false,
      reason: 'not_configured',
      message: 'Vision model is not configured',
    });
  });
});
