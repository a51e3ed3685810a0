import "dotenv/config";
import { intro, note, outro, spinner } from "@clack/prompts";
import pc from "picocolors";

import { checkNodeVersion } from "./helpers.js";
import { log } from "../shared/logger.js";
import { REQUIRED_NODE_VERSION } from "./constants.js";
import { gatherCodegenResponses } from "./gather-codegen-responses.js";
import type { CodegenUserAnswers, ConnectionParams } from "./codegen-types.js";
import { CodegenService } from "../codegen_graph/service.js";
import type { GenerationReport, TaskOutcome } from "../codegen_graph/state.js";

checkNodeVersion(REQUIRED_NODE_VERSION);

const service = new CodegenService();

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  intro(
    pc.blue(pc.bold("Schema Codegen")) +
      pc.dim("  —  Generate layered backend code from PostgreSQL tables")
  );

  const answers = await gatherCodegenResponses();

  if (answers.operation === "check") {
    await runCheck(answers.connection);
    return;
  }

  if (answers.operation === "list") {
    await runList(answers.connection, answers.listPrefix ?? "");
    return;
  }

  const report = await runGenerate(answers);
  if (report.status !== "success") {
    process.exitCode = 1;
    outro(pc.yellow(`Finished with status ${report.status}`));
    return;
  }

  outro(pc.green("Done!"));
}

function connectionConfigurable(connection: ConnectionParams): Record<string, unknown> {
  return {
    sourceDbUrl: connection.sourceDbUrl,
    sourceSchema: connection.sourceSchema,
  };
}

// ---------------------------------------------------------------------------
// Database operations
// ---------------------------------------------------------------------------

async function runCheck(connection: ConnectionParams): Promise<void> {
  const s = spinner();
  s.start("Connecting to the database...");
  const info = await service.getDatabaseInfo(connectionConfigurable(connection));

  if (!info.connected) {
    s.stop(pc.red("Connection failed"));
    log(pc.red(info.error ?? "unknown error"));
    process.exitCode = 1;
    outro(pc.red("Database unreachable"));
    return;
  }

  s.stop(pc.green("Connected"));
  note(
    [
      `Host:      ${pc.white(`${info.host}:${info.port}`)}`,
      `Database:  ${pc.white(info.database)}`,
      `User:      ${pc.white(info.user)}`,
      `Version:   ${pc.dim(info.version ?? "unknown")}`,
    ].join("\n"),
    pc.green("Database")
  );
  outro(pc.green("Done!"));
}

async function runList(connection: ConnectionParams, prefix: string): Promise<void> {
  const s = spinner();
  s.start("Reading tables...");
  const tables = await service.listTables(connectionConfigurable(connection), prefix);
  s.stop(pc.green(`${tables.length} table(s) found`));

  if (tables.length > 0) {
    note(tables.map((table) => `  ${pc.cyan(table)}`).join("\n"), `Schema ${connection.sourceSchema}`);
  }
  outro(pc.green("Done!"));
}

// ---------------------------------------------------------------------------
// Generation runner
// ---------------------------------------------------------------------------

async function runGenerate(answers: CodegenUserAnswers): Promise<GenerationReport> {
  const { connection, generate } = answers;
  if (!generate) throw new Error("Missing generation parameters");

  if (generate.apiKey) {
    const provider = generate.chatModel.includes("/") ? generate.chatModel.split("/")[0] : "openai";
    process.env[`${provider.toUpperCase()}_API_KEY`] = generate.apiKey;
  }

  log("", { newline: "before" });
  log(pc.bold(pc.cyan("Code generation")));
  log(pc.dim("Press Ctrl+C once to stop dispatching new tasks."), { newline: "after" });

  const controller = new AbortController();
  const onInterrupt = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    log(pc.yellow("Cancelling: running tasks finish their writes, queued tasks are skipped."));
    controller.abort();
  };
  process.on("SIGINT", onInterrupt);

  try {
    const report = await service.generate(
      {
        ...connectionConfigurable(connection),
        chatModel: generate.chatModel,
        moduleName: generate.moduleName,
        basePackage: generate.basePackage,
        projectRoot: generate.projectRoot,
        tableAllowlist: generate.selectionMode === "allowlist" ? generate.tables : [],
        tablePrefixes: generate.selectionMode === "prefix" ? generate.tables : [],
        maxConcurrency: generate.maxConcurrency,
        reportFilePath: generate.reportFilePath,
      },
      {
        signal: controller.signal,
        onTaskComplete: (outcome, completed, total) => {
          log(`${pc.dim(`[${completed}/${total}]`)} ${formatOutcome(outcome)}`);
        },
      }
    );

    displayReport(report, generate.reportFilePath);
    return report;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

// ---------------------------------------------------------------------------
// Results display
// ---------------------------------------------------------------------------

function formatOutcome(outcome: TaskOutcome): string {
  const target = `${outcome.table} ${pc.dim(outcome.layer)}`;
  if (outcome.status === "generated") {
    return `${pc.green("✓")} ${target}`;
  }
  if (outcome.status === "skipped_preserved") {
    return `${pc.dim("•")} ${target} ${pc.dim("(preserved)")}`;
  }
  return `${pc.red("✗")} ${target} ${pc.red(`${outcome.errorKind ?? "error"}: ${outcome.error ?? ""}`)}`;
}

function displayReport(report: GenerationReport, reportFilePath: string): void {
  const sep = pc.dim("─".repeat(60));
  const { summary } = report;
  const statusColor =
    report.status === "success"
      ? pc.green
      : report.status === "partial_success"
        ? pc.yellow
        : pc.red;

  const lines: string[] = [
    "",
    sep,
    pc.bold("  GENERATION REPORT"),
    sep,
    "",
    `  Run:                 ${pc.dim(report.runId)}`,
    `  Status:              ${statusColor(pc.bold(report.status.toUpperCase()))}`,
    `  Tables:              ${pc.white(String(summary.tablesTotal))}`,
    `  Files generated:     ${pc.green(String(summary.generated))}`,
    `  Files preserved:     ${pc.dim(String(summary.skippedPreserved))}`,
    `  Tasks failed:        ${summary.failed > 0 ? pc.red(String(summary.failed)) : pc.dim("0")}`,
    `  Report file:         ${pc.dim(reportFilePath)}`,
  ];

  const compositeKeyTables = report.tables.filter((table) => table.primaryKey === null);
  if (compositeKeyTables.length > 0) {
    lines.push("");
    lines.push(
      `  ${pc.yellow("No single-column primary key:")} ${compositeKeyTables.map((table) => table.table).join(", ")}`
    );
  }

  if (report.fatalError) {
    lines.push("");
    lines.push(
      `  ${pc.red(pc.bold("Fatal error:"))} ${pc.red(`${report.fatalError.kind}: ${report.fatalError.message}`)}`
    );
  }

  for (const warning of report.warnings) {
    lines.push(`  ${pc.yellow("!")} ${warning}`);
  }

  if (summary.errors.length > 0) {
    lines.push("");
    lines.push(`  ${pc.red(pc.bold(`Errors by task (${summary.errors.length}):`))}`);
    for (const err of summary.errors) {
      lines.push(`    ${pc.red("✗")} ${err.target} ${pc.dim(`[${err.kind}] ${err.message}`)}`);
    }
  }

  lines.push(sep);
  lines.push("");

  const noteTitle =
    report.status === "success"
      ? pc.green("Generation complete")
      : report.status === "partial_success"
        ? pc.yellow("Generation partially complete")
        : pc.red("Generation failed");

  note(lines.join("\n"), noteTitle);
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  log(pc.red("\nFatal error: " + msg));
  process.exit(1);
});
