import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DurableFileWriter } from "../file_writer.js";
import { ReportFileWriter } from "../report_file.js";
import type { TaskOutcome } from "../state.js";

function outcome(table: string, status: TaskOutcome["status"]): TaskOutcome {
  return {
    table,
    layer: "entity_base",
    targetPath: `/out/${table}.java`,
    writeMode: "overwrite",
    status,
    failedStage: status === "failed" ? "synthesizing" : null,
    errorKind: status === "failed" ? "OracleUnavailable" : null,
    error: status === "failed" ? "Oracle unavailable: reset" : null,
    attempts: 1,
  };
}

describe("ReportFileWriter", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "codegen-report-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("keeps the progress file current", async () => {
    const filePath = join(root, "progress.json");
    const writer = new ReportFileWriter({
      filePath,
      runId: "run-1",
      startedAt: "2026-03-01T10:00:00.000Z",
      writer: new DurableFileWriter(),
      now: () => new Date("2026-03-01T10:00:30.000Z"),
    });

    await writer.initialize(4);
    writer.record(outcome("orders", "generated"));
    writer.record(outcome("customers", "failed"));
    await writer.flush();

    const data: unknown = JSON.parse(await readFile(filePath, "utf8"));
    expect(data).toEqual({
      runId: "run-1",
      startTime: "2026-03-01T10:00:00.000Z",
      lastUpdate: "2026-03-01T10:00:30.000Z",
      status: "in_progress",
      progress: { completed: 2, total: 4, failed: 1, percentComplete: 50 },
      outcomes: [outcome("orders", "generated"), outcome("customers", "failed")],
      elapsedSeconds: 30,
    });
  });

  it("keeps running when a progress write fails", async () => {
    const writer = new ReportFileWriter({
      filePath: join(root, "progress.json"),
      runId: "run-2",
      startedAt: "2026-03-01T10:00:00.000Z",
      writer: {
        writeOverwriteAtomic: async () => {
          throw new Error("disk full");
        },
      },
    });

    writer.record(outcome("orders", "generated"));

    await expect(writer.flush()).resolves.toBeUndefined();
  });
});
