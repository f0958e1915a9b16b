import { z } from 'zod';
import { WireItemSchema, type FeedWorker, type NormalizedItem } from './adapter.js';
import type { SourceRule } from '../rules/schema.js';
import { postJson, joinUrl, type HttpOptions } from '../shared/http.js';

const ScanResponseSchema = z.object({
  source_id: z.string(),
  fetched_at: z.string().optional(),
  items: z.array(WireItemSchema),
});

/** Feed collaborator deployed as a separate worker, reached at `POST <base>/scan`. */
export class HttpFeedWorker implements FeedWorker {
  readonly kind = 'remote';

  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpOptions,
  ) {}

  async scan(source: SourceRule, maxItems: number): Promise<NormalizedItem[]> {
    const response = await postJson(
      joinUrl(this.baseUrl, '/scan'),
      {
        source_config: {
          id: source.id,
          type: source.type,
          url: source.url,
          fetch_interval: source.fetch_interval,
          weight: source.weight,
          max_items: maxItems,
        },
      },
      ScanResponseSchema,
      this.http,
    );
    return response.items.slice(0, maxItems);
  }
}
