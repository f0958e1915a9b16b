import { z } from 'zod';
import { sha256 } from '../shared/utils.js';
import { postJson, joinUrl, type HttpOptions } from '../shared/http.js';

/**
 * Image collaborator: a prompt and an aspect ratio in, an image URL out.
 */
export interface ImageWorker {
  readonly kind: string;
  paint(prompt: string, ratio: string): Promise<string>;
}

export function sizeForRatio(ratio: string): { width: number; height: number } {
  return ratio === '3:4' ? { width: 768, height: 1024 } : { width: 1024, height: 576 };
}

/** Stable stock-photo URL seeded by the prompt, so a retry yields the same image. */
export function placeholderImageUrl(prompt: string, ratio: string): string {
  const { width, height } = sizeForRatio(ratio);
  const seed = sha256(`${prompt}-${ratio}`).slice(0, 16);
  return `https://picsum.photos/seed/${seed}/${width}/${height}`;
}

export class PlaceholderImageWorker implements ImageWorker {
  readonly kind = 'placeholder';

  async paint(prompt: string, ratio: string): Promise<string> {
    return placeholderImageUrl(prompt, ratio);
  }
}

const PaintResponseSchema = z.object({
  image_url: z.string().min(1),
});

/** Image worker deployed separately, reached at `POST <base>/paint`. */
export class HttpImageWorker implements ImageWorker {
  readonly kind = 'remote';

  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpOptions,
  ) {}

  async paint(prompt: string, ratio: string): Promise<string> {
    const response = await postJson(
      joinUrl(this.baseUrl, '/paint'),
      { prompt, ratio },
      PaintResponseSchema,
      this.http,
    );
    return response.image_url;
  }
}
