/** Engines in the order they are tried. */
export const IMAGE_ENGINE_PRIORITY = [
  'dall-e-3',
  'gpt-image-1',
  'stable-diffusion-xl',
  'local-diffusion',
] as const;

export type ImageEngine = (typeof IMAGE_ENGINE_PRIORITY)[number];

export function isImageEngine(value: string): value is ImageEngine {
  return IMAGE_ENGINE_PRIORITY.some((engine) => engine === value);
}

export const IMAGE_ENGINE_AVAILABILITY = Symbol('IMAGE_ENGINE_AVAILABILITY');
export const IMAGE_GENERATOR = Symbol('IMAGE_GENERATOR');

export interface ImageEngineAvailability {
  isAvailable(engine: ImageEngine): boolean;
}

export interface ImageRequest {
  prompt: string;
  engine: ImageEngine;
  width: number;
  height: number;
}

export interface GeneratedImage {
  imageUrl: string;
}

/**
 * Renders a prompt with one engine. Not bound by default; the cover-image
 * tool then returns the prompt and candidates only.
 */
export interface ImageGenerator {
  generate(request: ImageRequest): Promise<GeneratedImage>;
}
