/**
 * Cellar Backend — Install Jobs
 *
 * Installs requested by the agent run in the background; the tool call
 * returns a job id right away. Each job owns an AbortController so it can
 * be cancelled between installer steps.
 */

import { v4 as uuid } from 'uuid';
import type {
  DependencyInstallOutcome,
  DependencyInstallRequest,
  InstallOutcome,
  InstallRequest,
  Logger,
} from '@cellar/engine';
import { InstallService } from './service';

export type JobStatus = 'running' | 'succeeded' | 'failed' | 'cancelled';

interface JobBase {
  id: string;
  status: JobStatus;
  created_at: string;
  finished_at?: string;
  cancel_requested: boolean;
  /** Set when the service itself threw instead of returning an outcome */
  error?: string;
}

/** Full install: bottle, staging, dependencies, execution, shortcut */
export interface InstallJob extends JobBase {
  kind: 'install';
  request: InstallRequest;
  outcome?: InstallOutcome;
}

/** Runtime components only; the binary is never run */
export interface DependencyJob extends JobBase {
  kind: 'dependencies';
  request: DependencyInstallRequest;
  outcome?: DependencyInstallOutcome;
}

export type Job = InstallJob | DependencyJob;

type OutcomeSummary = Pick<InstallOutcome, 'status' | 'error'>;

interface JobEntry {
  job: Job;
  controller: AbortController;
  done: Promise<void>;
}

function statusOf(outcome: OutcomeSummary): JobStatus {
  if (outcome.status === 'succeeded') return 'succeeded';
  return outcome.error?.kind === 'CancellationError' ? 'cancelled' : 'failed';
}

function newJobBase(): JobBase {
  return {
    id: uuid(),
    status: 'running',
    created_at: new Date().toISOString(),
    cancel_requested: false,
  };
}

export class JobRegistry {
  private readonly entries = new Map<string, JobEntry>();

  constructor(
    private readonly service: InstallService,
    private readonly logger: Logger,
    private readonly maxFinished: number = 100,
  ) {}

  startInstall(request: InstallRequest): InstallJob {
    const job: InstallJob = { ...newJobBase(), kind: 'install', request };
    this.launch(job, request.target_path, async (signal) => {
      const outcome = await this.service.install(request, { signal });
      job.outcome = outcome;
      return outcome;
    });
    return { ...job };
  }

  startDependencies(request: DependencyInstallRequest): DependencyJob {
    const job: DependencyJob = { ...newJobBase(), kind: 'dependencies', request };
    this.launch(job, request.binary_path, async (signal) => {
      const outcome = await this.service.installDependencies(request, { signal });
      job.outcome = outcome;
      return outcome;
    });
    return { ...job };
  }

  get(id: string): Job | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry.job } : undefined;
  }

  list(): Job[] {
    return [...this.entries.values()].map((entry) => ({ ...entry.job }));
  }

  /**
   * Request cancellation. The job stops at its next checkpoint.
   * Returns the job as it stands, or undefined for an unknown id.
   */
  cancel(id: string): Job | undefined {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    if (entry.job.status === 'running' && !entry.job.cancel_requested) {
      entry.job.cancel_requested = true;
      entry.controller.abort();
      this.logger.info({ job_id: id }, 'Job cancellation requested');
    }
    return { ...entry.job };
  }

  /** Resolves once the job has finished. */
  async wait(id: string): Promise<Job | undefined> {
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    await entry.done;
    return { ...entry.job };
  }

  /** Cancel every running job and wait for all of them. */
  async shutdown(): Promise<void> {
    const entries = [...this.entries.values()];
    for (const entry of entries) {
      if (entry.job.status === 'running') {
        entry.job.cancel_requested = true;
        entry.controller.abort();
      }
    }
    await Promise.all(entries.map((entry) => entry.done));
  }

  private launch(job: Job, target: string, run: (signal: AbortSignal) => Promise<OutcomeSummary>): void {
    const controller = new AbortController();
    const done = run(controller.signal).then(
      (outcome) => {
        job.status = statusOf(outcome);
        this.settle(job);
      },
      (err: unknown) => {
        job.error = err instanceof Error ? err.message : String(err);
        job.status = 'failed';
        this.settle(job);
      },
    );

    this.entries.set(job.id, { job, controller, done });
    this.logger.info({ job_id: job.id, kind: job.kind, target }, 'Job started');
  }

  private settle(job: Job): void {
    job.finished_at = new Date().toISOString();
    this.logger.info(
      { job_id: job.id, kind: job.kind, status: job.status, error: job.error ?? job.outcome?.error?.message },
      'Job finished',
    );
    this.prune();
  }

  private prune(): void {
    const finished = [...this.entries.values()].filter((e) => e.job.status !== 'running');
    const excess = finished.length - this.maxFinished;
    for (const entry of finished.slice(0, Math.max(excess, 0))) {
      this.entries.delete(entry.job.id);
    }
  }
}
