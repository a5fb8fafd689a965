import type { IngestionReport } from '../report.js';
import { createRun, isDirectusConfigured, updateRun } from './directus.js';
import { log } from './log.js';

export interface RunContext {
  store: string;
  dataRoot: string;
}

function nowIso(): string {
  return new Date().toISOString();
}

function serializeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return typeof error === 'string' ? error : JSON.stringify(error, null, 2);
}

/**
 * Mirrors an ingestion run into the Directus `ingestion_runs` collection. Every method is a
 * no-op when Directus is not configured or the run was never started.
 */
export class IngestionRun {
  private recordId?: string;
  private stats: Record<string, unknown> = {};

  get id(): string | undefined {
    return this.recordId;
  }

  async start(context: RunContext): Promise<void> {
    if (this.recordId || !isDirectusConfigured()) {
      return;
    }

    this.recordId = await createRun({
      state: 'running',
      store: context.store,
      data_root: context.dataRoot,
      stats_json: {},
      log: null,
      started_at: nowIso()
    });
    this.stats = {};
    log.info('Ingestion run started', { ingestion_run_id: this.recordId });
  }

  async updateStats(partial: Record<string, unknown>): Promise<void> {
    if (!this.recordId) return;
    Object.assign(this.stats, partial);
    await updateRun(this.recordId, {
      stats_json: this.stats,
      updated_at: nowIso()
    });
  }

  /** A report with status `failed` marks the run failed; anything else is a success. */
  async finish(report: IngestionReport, reportPath?: string): Promise<void> {
    if (!this.recordId) return;
    const failed = report.status === 'failed';
    await updateRun(this.recordId, {
      state: failed ? 'failed' : 'success',
      stats_json: { ...this.stats, status: report.status, diagnostics: report.diagnosticCounts },
      log: failed && report.failure ? `${report.failure.stage}: ${report.failure.message}` : null,
      report_path: reportPath ?? null,
      finished_at: nowIso()
    });
    log.info('Ingestion run recorded', { ingestion_run_id: this.recordId, status: report.status });
  }

  async finishFail(error: unknown): Promise<void> {
    if (!this.recordId) return;
    await updateRun(this.recordId, {
      state: 'failed',
      stats_json: this.stats,
      log: serializeError(error),
      finished_at: nowIso()
    });
    log.error('Ingestion run failed', { ingestion_run_id: this.recordId, error });
  }
}
