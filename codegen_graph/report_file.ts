import { logWarning } from "../shared/logger.js";
import { errorMessage } from "./errors.js";
import type { DurableFileWriter } from "./file_writer.js";
import type { GenerationReport, TaskOutcome } from "./state.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type ProgressData = {
  runId: string;
  startTime: string;
  lastUpdate: string;
  status: "in_progress";
  progress: {
    completed: number;
    total: number;
    failed: number;
    percentComplete: number;
  };
  outcomes: TaskOutcome[];
  elapsedSeconds: number;
};

export type ReportFileConfig = {
  filePath: string;
  runId: string;
  startedAt: string;
  writer: Pick<DurableFileWriter, "writeOverwriteAtomic">;
  now?: () => Date;
};

// ---------------------------------------------------------------------------
// ReportFileWriter
// ---------------------------------------------------------------------------

/**
 * Keeps a JSON progress file current while tasks run and replaces it with the
 * final report at the end. Every write goes through the atomic writer, so a
 * reader never sees a half-written file.
 */
export class ReportFileWriter {
  private readonly filePath: string;
  private readonly runId: string;
  private readonly startTime: Date;
  private readonly writer: Pick<DurableFileWriter, "writeOverwriteAtomic">;
  private readonly now: () => Date;
  private totalTasks = 0;
  private outcomes: TaskOutcome[] = [];
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(config: ReportFileConfig) {
    this.filePath = config.filePath;
    this.runId = config.runId;
    this.startTime = new Date(config.startedAt);
    this.writer = config.writer;
    this.now = config.now ?? (() => new Date());
  }

  /** Create / overwrite the file with the outcomes known before execution. */
  async initialize(totalTasks: number, knownOutcomes: readonly TaskOutcome[] = []): Promise<void> {
    this.totalTasks = totalTasks;
    this.outcomes = [...knownOutcomes];
    await this.writeProgress();
  }

  /** Record one finished task; the flush happens in the background. */
  record(outcome: TaskOutcome): void {
    this.outcomes.push(outcome);
    this.enqueue(() => this.writeProgress());
  }

  /** Resolves once every queued progress write has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private enqueue(write: () => Promise<void>): void {
    this.writeQueue = this.writeQueue.then(write).catch((error) => {
      logWarning("report-file", `Failed to write ${this.filePath}: ${errorMessage(error)}`);
    });
  }

  private async writeProgress(): Promise<void> {
    const now = this.now();
    const completed = this.outcomes.length;

    const data: ProgressData = {
      runId: this.runId,
      startTime: this.startTime.toISOString(),
      lastUpdate: now.toISOString(),
      status: "in_progress",
      progress: {
        completed,
        total: this.totalTasks,
        failed: this.outcomes.filter((outcome) => outcome.status === "failed").length,
        percentComplete:
          this.totalTasks > 0 ? Math.round((completed / this.totalTasks) * 100) : 0,
      },
      outcomes: this.outcomes,
      elapsedSeconds: Math.floor((now.getTime() - this.startTime.getTime()) / 1000),
    };

    await this.writer.writeOverwriteAtomic(this.filePath, `${JSON.stringify(data, null, 2)}\n`);
  }
}

export async function writeReportFile(
  writer: Pick<DurableFileWriter, "writeOverwriteAtomic">,
  filePath: string,
  report: GenerationReport,
): Promise<void> {
  await writer.writeOverwriteAtomic(filePath, `${JSON.stringify(report, null, 2)}\n`);
}
