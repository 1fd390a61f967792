/**
 * Error Reporter - Structured error logging for drift runs.
 *
 * Collects stage errors during a `master` or `report` run and produces a
 * structured summary at completion.
 *
 * @module error-reporter
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RunError {
  stage: string;
  message: string;
  timestamp: string;
  fatal: boolean;
  stack?: string;
}

export interface StageSummary {
  stage: string;
  status: 'completed' | 'failed';
  durationMs: number;
  /** Files read or written by the stage. */
  items: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
  stageSummaries: StageSummary[];
  errors: RunError[];
  success: boolean;
}

// ---------------------------------------------------------------------------
// ErrorReporter
// ---------------------------------------------------------------------------

export class ErrorReporter {
  private readonly runId: string;
  private readonly startedAt: string;
  private readonly errors: RunError[] = [];
  private readonly stageSummaries: StageSummary[] = [];

  constructor(runId: string) {
    this.runId = runId;
    this.startedAt = new Date().toISOString();
  }

  /**
   * Record an error that occurred during a stage.
   */
  recordError(stage: string, error: unknown, fatal = false): void {
    const runError: RunError = {
      stage,
      message: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
      fatal,
      stack: error instanceof Error ? error.stack : undefined,
    };

    this.errors.push(runError);

    const prefix = fatal ? 'FATAL' : 'ERROR';
    console.error(`[${prefix}] [${stage}] ${runError.message}`);
  }

  /**
   * Record a finished stage's summary.
   */
  recordStage(summary: StageSummary): void {
    this.stageSummaries.push(summary);
  }

  getStageErrors(stage: string): RunError[] {
    return this.errors.filter(e => e.stage === stage);
  }

  hasFatalError(): boolean {
    return this.errors.some(e => e.fatal);
  }

  /**
   * Generate the final run summary.
   */
  getSummary(): RunSummary {
    const totalDurationMs = this.stageSummaries.reduce((acc, s) => acc + s.durationMs, 0);

    return {
      runId: this.runId,
      startedAt: this.startedAt,
      completedAt: new Date().toISOString(),
      totalDurationMs,
      stageSummaries: [...this.stageSummaries],
      errors: [...this.errors],
      success: !this.hasFatalError() && this.stageSummaries.every(s => s.status !== 'failed'),
    };
  }

  /**
   * Print summary to stdout.
   */
  printSummary(): void {
    const s = this.getSummary();
    console.log('\n=== Run Summary ===');
    console.log(`  Run:       ${s.runId}`);
    console.log(`  Status:    ${s.success ? 'SUCCESS' : 'FAILED'}`);
    console.log(`  Duration:  ${(s.totalDurationMs / 1000).toFixed(1)}s`);
    console.log(`  Stages:    ${s.stageSummaries.length}`);
    console.log(`  Errors:    ${s.errors.length}`);

    if (s.errors.length > 0) {
      console.log('\n  Errors:');
      for (const e of s.errors) {
        const prefix = e.fatal ? 'FATAL' : 'ERROR';
        console.log(`    [${prefix}] [${e.stage}] ${e.message}`);
      }
    }

    console.log('===================\n');
  }
}
