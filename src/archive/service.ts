import { z } from 'zod';
import type { ArchiveBackend, ArchiveReceipt, Archiver, BackendAttempt, ContentPackage } from './types.js';
import type { PackageRepository } from './repository.js';
import { ArchiveError, errorMessage } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { postJson, joinUrl, type HttpOptions } from '../shared/http.js';

const log = componentLogger('archive');

const RemoteArchiveResponseSchema = z.object({
  doc_url: z.string().min(1),
  status: z.string().optional(),
});

/** Document store deployed as a separate worker, reached at `POST <base>/archive`. */
export class RemoteArchiveBackend implements ArchiveBackend {
  readonly name = 'remote';

  constructor(
    private readonly baseUrl: string,
    private readonly http: HttpOptions,
  ) {}

  async store(pkg: ContentPackage): Promise<string> {
    const response = await postJson(
      joinUrl(this.baseUrl, '/archive'),
      { content_pack: pkg },
      RemoteArchiveResponseSchema,
      this.http,
    );
    return response.doc_url;
  }
}

/**
 * Tries each backend in order until one stores the package, then records it in
 * the package table. The receipt names the backend that served it.
 */
export class ArchiveService implements Archiver {
  constructor(
    private readonly backends: ArchiveBackend[],
    private readonly repository: PackageRepository,
  ) {
    if (backends.length === 0) {
      throw new ArchiveError('At least one archive backend is required');
    }
  }

  get backendNames(): string[] {
    return this.backends.map((b) => b.name);
  }

  async archive(pkg: ContentPackage): Promise<ArchiveReceipt> {
    const attempts: BackendAttempt[] = [];

    for (const backend of this.backends) {
      let docUrl: string;
      try {
        docUrl = await backend.store(pkg);
      } catch (err) {
        attempts.push({ backend: backend.name, ok: false, error: errorMessage(err).slice(0, 200) });
        log.warn({ backend: backend.name, error: errorMessage(err) }, 'Archive backend failed');
        continue;
      }

      attempts.push({ backend: backend.name, ok: true });
      const receipt: ArchiveReceipt = {
        doc_url: docUrl,
        status: `archived_${backend.name}`,
        backend: backend.name,
        attempts,
      };
      this.repository.record(pkg, receipt);
      log.info(
        { record_type: pkg.record_type, backend: backend.name, doc_url: docUrl, fallback: attempts.length > 1 },
        'Package archived',
      );
      return receipt;
    }

    throw new ArchiveError(`All archive backends failed for ${pkg.trace_id}`, { attempts });
  }
}
