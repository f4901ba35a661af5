export const IMAGE_STYLES = ['photorealistic', 'cartoon'] as const;
export type ImageStyle = (typeof IMAGE_STYLES)[number];
export type AspectRatio = '1:1' | '5:4';

export interface ImageModel {
  id: string;
  endpoint: string;
  costPerImage: number;
  promptStyle: string;
  negativePrompt: string;
}

const NEGATIVE_PROMPT =
  'blurry, distorted face, extra limbs, deformed hands, text, watermark, scary, dark, violent';

export const IMAGE_MODELS: Record<ImageStyle, ImageModel> = {
  photorealistic: {
    id: 'flux-pulid-photo',
    endpoint: 'fal-ai/flux-pulid',
    costPerImage: 0.05,
    promptStyle:
      "photorealistic children's book photograph, soft natural lighting, shallow depth of field, warm colours",
    negativePrompt: NEGATIVE_PROMPT,
  },
  cartoon: {
    id: 'flux-pulid-cartoon',
    endpoint: 'fal-ai/flux-pulid',
    costPerImage: 0.05,
    promptStyle:
      "whimsical 3D animated storybook illustration, bright saturated colours, rounded friendly shapes",
    negativePrompt: `${NEGATIVE_PROMPT}, photograph, realistic skin texture`,
  },
};

export const IMAGE_SIZES: Record<AspectRatio, { width: number; height: number }> = {
  '1:1': { width: 1024, height: 1024 },
  '5:4': { width: 1280, height: 1024 },
};

export function getModelForStyle(style: ImageStyle): ImageModel {
  return IMAGE_MODELS[style];
}
