import { z } from 'zod';

export const RecordTypeSchema = z.enum(['topic', 'draft']);
export type RecordType = z.infer<typeof RecordTypeSchema>;

/**
 * Unit of archived output. A topic is a raw discovery awaiting review; a draft is
 * one platform's generated rendition of a confirmed topic, addressed by
 * `<topic trace id>-<platform>`.
 */
export const ContentPackageSchema = z.object({
  record_type: RecordTypeSchema,
  trace_id: z.string(),
  title: z.string(),
  summary: z.string(),
  source_id: z.string(),
  source_info: z.string(),
  source_url: z.string(),
  channels: z.array(z.string()),
  status: z.string(),
  keywords: z.array(z.string()).optional(),
  images: z.array(z.string()).optional(),
  // topic only: prior coverage found in the context index
  related_context: z.string().optional(),
  // draft only
  platform: z.string().optional(),
  parent_trace_id: z.string().optional(),
  twitter_draft: z.string().optional(),
  article_markdown: z.string().optional(),
  image_prompt: z.string().optional(),
  image_urls: z.array(z.string()).optional(),
  style: z.string().optional(),
  engine: z.string().optional(),
});

export type ContentPackage = z.infer<typeof ContentPackageSchema>;

/** A storage target for archived packages. Returns the document URL. */
export interface ArchiveBackend {
  readonly name: string;
  store(pkg: ContentPackage): Promise<string>;
}

export interface BackendAttempt {
  backend: string;
  ok: boolean;
  error?: string;
}

export interface ArchiveReceipt {
  doc_url: string;
  /** `archived_<backend>` of the backend that served the request */
  status: string;
  backend: string;
  attempts: BackendAttempt[];
}

/**
 * Archive collaborator as the pipeline sees it: persist a package durably or
 * throw.
 */
export interface Archiver {
  archive(pkg: ContentPackage): Promise<ArchiveReceipt>;
}
