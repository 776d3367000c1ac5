/**
 * 測試用 Run / Job 建構函數與假的 RunRepositoryClient
 */

import type { Job, Run, RunOutcome } from '../../src/types/pipeline-health.js';
import type {
  RequestOptions,
  RunRepositoryClient,
  RunSelector,
} from '../../src/services/providers/run-repository-client.js';

export const TEST_PROJECT = 'octo-org/octo-repo';

export function createRun(
  id: string,
  outcome: RunOutcome,
  createdAt = '2025-10-20T10:00:00Z',
  updatedAt = createdAt
): Run {
  return {
    id,
    outcome,
    rawOutcome: outcome === 'non_terminal' ? null : outcome,
    createdAt: new Date(createdAt),
    updatedAt: new Date(updatedAt),
    jobsRef: { project: TEST_PROJECT, runId: id },
  };
}

export function createJob(
  name: string,
  outcome: RunOutcome,
  completedAt: string | null = '2025-10-20T10:05:00Z'
): Job {
  return {
    name,
    outcome,
    rawOutcome: outcome === 'non_terminal' ? null : outcome,
    completedAt: completedAt === null ? null : new Date(completedAt),
  };
}

/**
 * 記憶體內的 RunRepositoryClient
 */
export class FakeRunRepositoryClient implements RunRepositoryClient {
  readonly name = 'fake';

  verifyCalls: string[] = [];
  listRunsCalls: Array<{ project: string; selector: RunSelector }> = [];
  listJobsCalls: string[] = [];

  accessError?: Error;
  listRunsError?: Error;
  jobErrors = new Map<string, Error>();
  /** 每次 listJobs 前等待（模擬網路延遲） */
  jobDelayMs = 0;

  private inFlight = 0;
  maxInFlight = 0;

  constructor(
    public runs: Run[] = [],
    public jobsByRun: Record<string, Job[]> = {}
  ) {}

  async verifyAccess(project: string, _options?: RequestOptions): Promise<void> {
    this.verifyCalls.push(project);
    if (this.accessError) throw this.accessError;
  }

  async listRuns(project: string, selector: RunSelector = {}, _options?: RequestOptions): Promise<Run[]> {
    this.listRunsCalls.push({ project, selector });
    if (this.listRunsError) throw this.listRunsError;
    if (selector.runId) {
      return this.runs.filter(run => run.id === selector.runId);
    }
    return [...this.runs];
  }

  async listJobs(run: Run, options: RequestOptions = {}): Promise<Job[]> {
    this.listJobsCalls.push(run.id);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      if (this.jobDelayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.jobDelayMs));
      }
      options.signal?.throwIfAborted();

      const error = this.jobErrors.get(run.id);
      if (error) throw error;
      return this.jobsByRun[run.id] ?? [];
    } finally {
      this.inFlight--;
    }
  }
}
