import type Database from 'better-sqlite3';
import type { Config } from './shared/config.js';
import { loadConfig } from './shared/config.js';
import { httpOptionsFromConfig } from './shared/http.js';
import { attachLogSink, detachLogSink, componentLogger } from './shared/logger.js';
import { resolvePath } from './shared/utils.js';
import { initDb, closeDb } from './db/db.js';
import { runMigrations } from './db/migrate.js';
import { LogStore } from './trace/logStore.js';
import { FingerprintStore } from './memory/fingerprintStore.js';
import { ContextIndex } from './memory/contextIndex.js';
import type { FeedWorker } from './source/adapter.js';
import { LocalFeedWorker } from './source/rss.js';
import { HttpFeedWorker } from './source/remote.js';
import type { GenerationWorker } from './llm/types.js';
import { LlmClient } from './llm/client.js';
import { HttpGenerationWorker, LocalGenerationWorker } from './llm/generator.js';
import { HttpImageWorker, PlaceholderImageWorker, type ImageWorker } from './image/painter.js';
import type { ArchiveBackend } from './archive/types.js';
import { LocalMarkdownBackend } from './archive/markdown.js';
import { ArchiveService, RemoteArchiveBackend } from './archive/service.js';
import { PackageRepository } from './archive/repository.js';
import { loadRules } from './rules/loader.js';
import { PipelineScheduler } from './pipeline/scheduler.js';
import { DraftExpander } from './expander/draftExpander.js';

const log = componentLogger('runtime');

export interface Runtime {
  config: Config;
  db: Database.Database;
  fingerprints: FingerprintStore;
  context: ContextIndex;
  packages: PackageRepository;
  archiver: ArchiveService;
  scheduler: PipelineScheduler;
  expander: DraftExpander;
}

/** Collaborators to use instead of the ones the config selects. */
export interface RuntimeOverrides {
  feed?: FeedWorker;
  generator?: GenerationWorker;
  images?: ImageWorker;
  backends?: ArchiveBackend[];
}

function selectFeed(config: Config): FeedWorker {
  const http = httpOptionsFromConfig(config.http);
  return config.workers.feed_url ? new HttpFeedWorker(config.workers.feed_url, http) : new LocalFeedWorker(http);
}

function selectGenerator(config: Config): GenerationWorker {
  const http = httpOptionsFromConfig(config.http);
  if (config.workers.generation_url) {
    return new HttpGenerationWorker(config.workers.generation_url, http);
  }
  return new LocalGenerationWorker(config.llm.api_key ? new LlmClient(config.llm, http) : null);
}

function selectImages(config: Config): ImageWorker {
  return config.workers.image_url
    ? new HttpImageWorker(config.workers.image_url, httpOptionsFromConfig(config.http))
    : new PlaceholderImageWorker();
}

/** Remote store first when configured; local markdown always last. */
function selectBackends(config: Config): ArchiveBackend[] {
  const backends: ArchiveBackend[] = [];
  if (config.workers.archive_url) {
    backends.push(new RemoteArchiveBackend(config.workers.archive_url, httpOptionsFromConfig(config.http)));
  }
  backends.push(new LocalMarkdownBackend(resolvePath(config.archive.dir), config.archive.public_base_url));
  return backends;
}

/**
 * Wire the stores, collaborators, scheduler and expander around an open,
 * migrated database. Loads the rules file; a missing or invalid file throws.
 */
export function createRuntime(config: Config, db: Database.Database, overrides: RuntimeOverrides = {}): Runtime {
  const fingerprints = new FingerprintStore(db);
  const context = new ContextIndex(db);
  const packages = new PackageRepository(db);
  const archiver = new ArchiveService(overrides.backends ?? selectBackends(config), packages);

  const scheduler = new PipelineScheduler(
    { feed: overrides.feed ?? selectFeed(config), fingerprints, context, archiver },
    loadRules(config.rules.path),
    {
      rulesWatchCron: config.scheduler.rules_watch_cron,
      maintenanceCron: config.scheduler.maintenance_cron,
    },
  );

  const expander = new DraftExpander({
    generator: overrides.generator ?? selectGenerator(config),
    images: overrides.images ?? selectImages(config),
    archiver,
    packages,
    context,
    rules: () => scheduler.currentRules,
  });

  return { config, db, fingerprints, context, packages, archiver, scheduler, expander };
}

/** Load config, open the database, attach the log store and wire everything. */
export async function openRuntime(): Promise<Runtime> {
  const config = await loadConfig();
  const db = initDb(config.db.path);
  const { applied } = runMigrations(db);
  if (config.logs.persist) attachLogSink(new LogStore(db));
  if (applied.length > 0) log.info({ applied }, 'Migrations applied');
  return createRuntime(config, db);
}

export function closeRuntime(runtime: Runtime): void {
  runtime.scheduler.stop();
  detachLogSink();
  closeDb();
}
