#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getPresslineDir, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { runMigrations } from '../db/migrate.js';
import { writeExampleRules } from '../rules/loader.js';
import { RecordTypeSchema } from '../archive/types.js';
import { queryLogs } from '../trace/logStore.js';
import { closeRuntime, openRuntime, type Runtime } from '../runtime.js';
import { startServer } from '../api/server.js';
import { VERSION } from '../api/routes/system.js';
import type { CycleResult } from '../pipeline/heartbeat.js';

const program = new Command();

program
  .name('pressline')
  .description('Feed-to-draft publishing pipeline')
  .version(VERSION);

// === init ===
program
  .command('init')
  .description('Create config, example rules and the database')
  .action(async () => {
    const configPath = path.join(getPresslineDir(), 'config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const config = await loadConfig();
    const rulesPath = resolvePath(config.rules.path);
    log(writeExampleRules(rulesPath) ? `✓ ${rulesPath} created from example` : `✓ ${rulesPath} already exists`);

    const db = initDb(config.db.path);
    const { applied } = runMigrations(db);
    log(
      applied.length > 0
        ? `✓ database ready (${applied.length} migrations applied)`
        : '✓ database already up to date',
    );
    closeDb();
  });

// === serve ===
program
  .command('serve')
  .description('Start the API server and the scheduler')
  .option('-p, --port <n>', 'Port number')
  .action(async (opts: { port?: string }) => {
    await startServer({ port: opts.port ? parseInt(opts.port, 10) : undefined });
  });

// === run-once ===
program
  .command('run-once')
  .description('Run one scan cycle for every enabled source, heaviest first')
  .option('-s, --source <id>', 'Only this source')
  .action(async (opts: { source?: string }) => {
    await withRuntime(async (rt) => {
      const { results } = await rt.scheduler.runOnce(opts.source, 'cli');
      if (results.length === 0) log('No enabled sources.');
      for (const result of results) log(formatCycle(result));
    });
  });

// === status ===
program
  .command('status')
  .description('Show rules, jobs and per-source state')
  .action(async () => {
    await withRuntime((rt) => {
      const status = rt.scheduler.status();
      log(`Rules: ${status.rules_path} (${status.rules_hash.slice(0, 12)})`);
      for (const source of status.sources) {
        const last = source.last_run ? formatCycle(source.last_run) : 'never run';
        log(`${source.source_id.padEnd(20)} ${source.enabled ? 'on ' : 'off'} w=${source.weight} ${source.cron.padEnd(14)} ${last}`);
      }
      log(`Fingerprints: ${rt.fingerprints.count()}  Context entries: ${rt.context.count()}`);
    });
  });

// === sweep ===
program
  .command('sweep')
  .description('Drop fingerprints and context entries older than the retention window')
  .option('-d, --days <n>', 'Retention in days (default: rules global.memory_retention_days)')
  .action(async (opts: { days?: string }) => {
    await withRuntime((rt) => {
      const days = opts.days !== undefined ? parseInt(opts.days, 10) : undefined;
      const result = rt.scheduler.sweep(days);
      log(
        `Swept with ${result.retention_days}d retention: ${result.fingerprints} fingerprints, ${result.context_entries} context entries`,
      );
    });
  });

// === dashboard ===
program
  .command('dashboard')
  .description('List archived topics and drafts, newest first')
  .option('-t, --type <type>', 'topic or draft')
  .option('--trace <id>', 'Topic trace id (drafts derived from it included)')
  .option('-n, --limit <n>', 'Max rows', '20')
  .action(async (opts: { type?: string; trace?: string; limit: string }) => {
    await withRuntime((rt) => {
      const recordType = opts.type ? RecordTypeSchema.parse(opts.type) : undefined;
      const rows = rt.packages.list({ recordType, traceId: opts.trace, limit: parseInt(opts.limit, 10) });
      if (rows.length === 0) {
        log('Nothing archived yet.');
        return;
      }
      for (const row of rows) {
        const label = row.record_type === 'draft' ? `draft/${row.platform}` : 'topic';
        log(`${row.created_at.slice(0, 19)}  ${label.padEnd(20)} ${row.trace_id.padEnd(22)} ${row.title}`);
        log(`${' '.repeat(21)}${row.status} → ${row.doc_url}`);
      }
    });
  });

// === logs ===
interface LogsOptions {
  trace?: string;
  request?: string;
  component?: string;
  level?: string;
  keyword?: string;
  limit: string;
}

program
  .command('logs')
  .description('Query the aggregated service logs')
  .option('--trace <id>', 'Trace id (derived draft ids and nested item scopes included)')
  .option('--request <id>', 'Request id')
  .option('--component <name>', 'Component name')
  .option('--level <level>', 'Level, e.g. ERROR')
  .option('-k, --keyword <text>', 'Message substring')
  .option('-n, --limit <n>', 'Max rows', '100')
  .action(async (opts: LogsOptions) => {
    const config = await loadConfig();
    const db = initDb(config.db.path);
    try {
      runMigrations(db);
      const rows = queryLogs(
        db,
        {
          traceId: opts.trace,
          requestId: opts.request,
          component: opts.component,
          level: opts.level,
          keyword: opts.keyword,
          limit: parseInt(opts.limit, 10),
        },
        config.logs.max_query_limit,
      );
      // Oldest first reads better on a terminal.
      for (const row of rows.reverse()) {
        log(`${row.created_at} ${row.level.padEnd(5)} [${row.component}] ${row.trace_id || '-'} ${row.message}`);
      }
    } finally {
      closeDb();
    }
  });

function formatCycle(result: CycleResult): string {
  const counts = `scanned=${result.scanned} processed=${result.processed} dup=${result.duplicated} filtered=${result.filtered} failed=${result.failed}`;
  const reason = result.reason ? ` (${result.reason})` : '';
  const error = result.error ? ` error: ${result.error}` : '';
  return `${result.source_id}: ${result.outcome}${reason} ${counts} trace=${result.trace_id}${error}`;
}

async function withRuntime(fn: (rt: Runtime) => void | Promise<void>): Promise<void> {
  const rt = await openRuntime();
  try {
    await fn(rt);
  } finally {
    closeRuntime(rt);
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
