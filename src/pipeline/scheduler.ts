import cron from 'node-cron';
import type { LoadedRules } from '../rules/loader.js';
import { intervalToCron, loadRules, rulesFileHash, scheduleToCron } from '../rules/loader.js';
import type { Rules, SourceRule } from '../rules/schema.js';
import { runSourceCycle, skippedCycle, type CycleDeps, type CycleResult, type CycleState } from './heartbeat.js';
import { ValidationError, errorMessage } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import { runWithTrace } from '../trace/context.js';

const log = componentLogger('scheduler');

export interface SchedulerOptions {
  rulesWatchCron: string;
  maintenanceCron: string;
}

export interface SourceStatus {
  source_id: string;
  enabled: boolean;
  weight: number;
  cron: string;
  state: CycleState;
  last_run: CycleResult | null;
}

export interface SchedulerStatus {
  running: boolean;
  rules_path: string;
  rules_hash: string;
  jobs: string[];
  sources: SourceStatus[];
}

export interface RunOnceResult {
  trigger: string;
  results: CycleResult[];
}

export interface ReloadResult {
  changed: boolean;
  sources: number;
  jobs: string[];
}

export interface SweepResult {
  retention_days: number;
  fingerprints: number;
  context_entries: number;
}

interface JobPlan {
  id: string;
  expression: string;
  run: () => void;
}

/** Sources in the order a manual run visits them: heaviest first. */
export function byWeight(sources: SourceRule[]): SourceRule[] {
  return [...sources].sort((a, b) => b.weight - a.weight);
}

/**
 * Owns time for the pipeline. Each enabled source gets a cron job at its fetch
 * interval; platforms with a daily schedule get a job that runs every source
 * once. A watcher job reloads the rules when the file hash changes, and a
 * maintenance job sweeps the memory stores.
 *
 * A source runs at most one cycle at a time. The state map is checked and set
 * before the first await, so an overlapping tick or manual trigger is answered
 * with a skipped result instead of a second run.
 */
export class PipelineScheduler {
  private rules: Rules;
  private rulesHash: string;
  private readonly rulesPath: string;
  private readonly states = new Map<string, CycleState>();
  private readonly lastRuns = new Map<string, CycleResult>();
  private runtimeJobs = new Map<string, cron.ScheduledTask>();
  private fixedJobs: cron.ScheduledTask[] = [];
  private running = false;

  constructor(
    private readonly deps: CycleDeps,
    loaded: LoadedRules,
    private readonly options: SchedulerOptions,
  ) {
    this.planJobs(loaded.rules);
    this.rules = loaded.rules;
    this.rulesHash = loaded.hash;
    this.rulesPath = loaded.path;
  }

  get currentRules(): Rules {
    return this.rules;
  }

  start(): void {
    if (this.running) return;

    for (const [name, expression] of [
      ['rules_watch', this.options.rulesWatchCron],
      ['maintenance', this.options.maintenanceCron],
    ] as const) {
      if (!cron.validate(expression)) {
        throw new ValidationError(`Invalid ${name} cron expression: ${expression}`);
      }
    }

    this.fixedJobs = [
      cron.schedule(this.options.rulesWatchCron, () => this.watchRules()),
      cron.schedule(
        this.options.maintenanceCron,
        () => {
          this.runMaintenance();
        },
        { timezone: this.rules.global.timezone },
      ),
    ];
    this.installJobs(this.planJobs(this.rules));
    this.running = true;
    log.info({ jobs: [...this.runtimeJobs.keys()] }, 'Scheduler started');
  }

  stop(): void {
    for (const task of [...this.fixedJobs, ...this.runtimeJobs.values()]) {
      task.stop();
    }
    this.fixedJobs = [];
    this.runtimeJobs = new Map();
    this.running = false;
    log.info('Scheduler stopped');
  }

  /**
   * Run one cycle for a source unless one is already in progress. Never rejects:
   * every failure lands in the returned result.
   */
  async runSource(source: SourceRule): Promise<CycleResult> {
    const state = this.states.get(source.id) ?? 'idle';
    if (state !== 'idle') {
      log.info({ source_id: source.id, state }, 'Cycle already in progress, skipping');
      return skippedCycle(source.id, 'cycle_in_progress');
    }
    this.states.set(source.id, 'scanning');

    let result: CycleResult;
    try {
      result = await runSourceCycle(this.deps, source, this.rules, (next) => {
        this.states.set(source.id, next);
      });
    } catch (err) {
      result = { ...skippedCycle(source.id, 'cycle_crashed'), outcome: 'failed', error: errorMessage(err) };
      log.error({ source_id: source.id, error: result.error }, 'Cycle crashed');
    } finally {
      this.states.set(source.id, 'idle');
    }

    if (this.findSource(source.id)) {
      this.lastRuns.set(source.id, result);
    } else {
      // Removed by a reload while it ran.
      this.states.delete(source.id);
      this.lastRuns.delete(source.id);
    }
    return result;
  }

  /**
   * Run every enabled source once, heaviest first, or only `sourceId`. Each call
   * is its own unit of work.
   */
  async runOnce(sourceId?: string, trigger = 'manual'): Promise<RunOnceResult> {
    let targets: SourceRule[];
    if (sourceId) {
      const source = this.findSource(sourceId);
      if (!source) {
        throw new ValidationError(`Unknown source: ${sourceId}`, { source_id: sourceId });
      }
      targets = [source];
    } else {
      targets = byWeight(this.rules.sources.filter((s) => s.enabled));
    }

    log.info({ trigger, sources: targets.map((s) => s.id) }, 'Running sources once');
    const results: CycleResult[] = [];
    for (const source of targets) {
      results.push(await this.runSource(source));
    }
    return { trigger, results };
  }

  /**
   * Load the rules file and swap it in. Without `force` nothing happens when the
   * hash is unchanged. Invalid rules leave the current set in place.
   */
  reload(force = true): ReloadResult {
    const hash = rulesFileHash(this.rulesPath);
    if (!force && hash === this.rulesHash) {
      return { changed: false, sources: this.rules.sources.length, jobs: [...this.runtimeJobs.keys()] };
    }

    const loaded = loadRules(this.rulesPath);
    const plan = this.planJobs(loaded.rules);

    this.rules = loaded.rules;
    this.rulesHash = loaded.hash;
    if (this.running) this.installJobs(plan);

    const known = new Set(loaded.rules.sources.map((s) => s.id));
    for (const id of [...this.lastRuns.keys()]) {
      if (!known.has(id)) this.lastRuns.delete(id);
    }

    log.info({ sources: loaded.rules.sources.length, hash: loaded.hash.slice(0, 12) }, 'Rules reloaded');
    return { changed: true, sources: loaded.rules.sources.length, jobs: plan.map((j) => j.id) };
  }

  sweep(retentionDays: number = this.rules.global.memory_retention_days): SweepResult {
    const fingerprints = this.deps.fingerprints.sweep(retentionDays);
    const contextEntries = this.deps.context.prune(retentionDays);
    return { retention_days: retentionDays, fingerprints, context_entries: contextEntries };
  }

  status(): SchedulerStatus {
    return {
      running: this.running,
      rules_path: this.rulesPath,
      rules_hash: this.rulesHash,
      jobs: [...this.runtimeJobs.keys()],
      sources: this.rules.sources.map((source) => ({
        source_id: source.id,
        enabled: source.enabled,
        weight: source.weight,
        cron: intervalToCron(source.fetch_interval),
        state: this.states.get(source.id) ?? 'idle',
        last_run: this.lastRuns.get(source.id) ?? null,
      })),
    };
  }

  private findSource(sourceId: string): SourceRule | undefined {
    return this.rules.sources.find((s) => s.id === sourceId);
  }

  /** Throws on an invalid interval or schedule, before anything is swapped. */
  private planJobs(rules: Rules): JobPlan[] {
    const plan: JobPlan[] = [];
    for (const source of byWeight(rules.sources)) {
      if (!source.enabled) continue;
      const sourceId = source.id;
      plan.push({
        id: `source::${sourceId}`,
        expression: intervalToCron(source.fetch_interval),
        run: () => {
          const current = this.findSource(sourceId);
          if (!current?.enabled) return;
          void this.runSource(current);
        },
      });
    }
    for (const [name, policy] of Object.entries(rules.platforms)) {
      if (!policy.enabled || !policy.schedule) continue;
      plan.push({
        id: `platform::${name}`,
        expression: scheduleToCron(policy.schedule),
        run: () => {
          this.runOnce(undefined, `platform:${name}`).catch((err: unknown) => {
            log.error({ platform: name, error: errorMessage(err) }, 'Platform run failed');
          });
        },
      });
    }
    return plan;
  }

  private installJobs(plan: JobPlan[]): void {
    for (const task of this.runtimeJobs.values()) {
      task.stop();
    }
    const jobs = new Map<string, cron.ScheduledTask>();
    for (const job of plan) {
      jobs.set(job.id, cron.schedule(job.expression, job.run, { timezone: this.rules.global.timezone }));
    }
    this.runtimeJobs = jobs;
  }

  private watchRules(): void {
    try {
      const hash = rulesFileHash(this.rulesPath);
      if (hash === null || hash === this.rulesHash) return;
      log.info('Rules file changed, reloading');
      this.reload(false);
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Rules reload failed, keeping current rules');
    }
  }

  private runMaintenance(): SweepResult | null {
    return runWithTrace({}, () => {
      try {
        const result = this.sweep();
        log.info({ ...result }, 'Maintenance sweep done');
        return result;
      } catch (err) {
        log.error({ error: errorMessage(err) }, 'Maintenance sweep failed');
        return null;
      }
    });
  }
}
