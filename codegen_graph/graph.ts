import { RunnableConfig } from "@langchain/core/runnables";
import { END, START, StateGraph } from "@langchain/langgraph";
import { v4 as uuidv4 } from "uuid";
import { logWarning } from "../shared/logger.js";
import { CodegenConfiguration, ensureCodegenConfiguration } from "./configuration.js";
import { asCodegenError, CodegenError, errorMessage } from "./errors.js";
import type { CodegenErrorKind } from "./errors.js";
import { DurableFileWriter } from "./file_writer.js";
import { isWithinProjectRoot, LAYER_ORDER, resolveTargetPath, resolveWriteMode } from "./layers.js";
import { CodeSynthesisClient, createChatOracle } from "./oracle.js";
import { PostgresSchemaIntrospector } from "./postgres.js";
import type { SchemaIntrospector } from "./postgres.js";
import { buildGenerationRequest } from "./prompt.js";
import { ReportFileWriter, writeReportFile } from "./report_file.js";
import {
  CodegenState,
  CodegenStateAnnotation,
  FatalError,
  GenerationConfig,
  GenerationReport,
  GenerationTask,
  ReportSummary,
  RunError,
  RunStatus,
  TableReport,
  TableSchema,
  TaskOutcome,
  TaskStage,
  taskKey,
} from "./state.js";
import { processTasksInParallel } from "./task_pool.js";

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export type CodegenDependencies = {
  introspector: SchemaIntrospector;
  synthesizer: Pick<CodeSynthesisClient, "synthesize">;
  writer: DurableFileWriter;
  /** Run-level cancellation. Kept out of RunnableConfig so the graph itself finishes. */
  signal?: AbortSignal;
  onTaskComplete?: (outcome: TaskOutcome, completed: number, total: number) => void;
};

export type DependencyFactory = (configuration: CodegenConfiguration) => CodegenDependencies;

export function createDefaultDependencies(configuration: CodegenConfiguration): CodegenDependencies {
  return {
    introspector: new PostgresSchemaIntrospector({
      sourceDbUrl: configuration.sourceDbUrl,
      sourceSchema: configuration.sourceSchema,
    }),
    synthesizer: new CodeSynthesisClient(createChatOracle(configuration.chatModel), {
      maxAttempts: configuration.maxAttempts,
      initialBackoffMs: configuration.initialBackoffMs,
      maxBackoffMs: configuration.maxBackoffMs,
      attemptTimeoutMs: configuration.attemptTimeoutMs,
    }),
    writer: new DurableFileWriter(),
  };
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

function failedOutcome(
  task: GenerationTask,
  stage: TaskStage,
  error: CodegenError,
): TaskOutcome {
  return {
    table: task.table.table,
    layer: task.layer,
    targetPath: task.targetPath,
    writeMode: task.writeMode,
    status: "failed",
    failedStage: stage,
    errorKind: error.kind,
    error: error.message,
    attempts: error.attempts,
  };
}

/**
 * One task per (table, layer), tables in the given order and layers in
 * `LAYER_ORDER`. A task whose target path was already claimed by an earlier
 * task is not run; it is returned as a `TargetPathConflict` outcome.
 */
export function planGenerationTasks(params: {
  tables: readonly TableSchema[];
  config: GenerationConfig;
}): { tasks: GenerationTask[]; conflicts: TaskOutcome[] } {
  const tasks: GenerationTask[] = [];
  const conflicts: TaskOutcome[] = [];
  const claimedBy = new Map<string, string>();

  for (const table of params.tables) {
    for (const layer of LAYER_ORDER) {
      const task: GenerationTask = {
        table,
        layer,
        targetPath: resolveTargetPath(table, layer, params.config),
        writeMode: resolveWriteMode(layer, params.config.writeModeOverrides),
      };

      if (!isWithinProjectRoot(params.config.projectRoot, task.targetPath)) {
        conflicts.push(
          failedOutcome(
            task,
            "planning",
            new CodegenError(
              "TargetPathConflict",
              `${task.targetPath} is outside the project root ${params.config.projectRoot}`,
            ),
          ),
        );
        continue;
      }

      const owner = claimedBy.get(task.targetPath);
      if (owner !== undefined) {
        conflicts.push(
          failedOutcome(
            task,
            "planning",
            new CodegenError(
              "TargetPathConflict",
              `${task.targetPath} is already produced by ${owner}`,
            ),
          ),
        );
        continue;
      }

      claimedBy.set(task.targetPath, taskKey(table.table, layer));
      tasks.push(task);
    }
  }

  return { tasks, conflicts };
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

const STAGE_FALLBACK_KIND: Record<TaskStage, CodegenErrorKind> = {
  planning: "WriteFailure",
  prompting: "ConfigurationError",
  synthesizing: "OracleUnavailable",
  writing: "WriteFailure",
};

type TaskDependencies = Pick<CodegenDependencies, "synthesizer" | "writer" | "signal">;

/**
 * Prompting → Synthesizing → Writing for a single task. Never throws: every
 * failure becomes a `failed` outcome carrying the stage it happened in.
 */
export async function runGenerationTask(
  task: GenerationTask,
  deps: TaskDependencies,
  config: Pick<GenerationConfig, "moduleName" | "basePackage" | "promptTemplate">,
): Promise<TaskOutcome> {
  let stage: TaskStage = "planning";
  let attempts = 0;
  const outcome = (status: TaskOutcome["status"]): TaskOutcome => ({
    table: task.table.table,
    layer: task.layer,
    targetPath: task.targetPath,
    writeMode: task.writeMode,
    status,
    failedStage: null,
    errorKind: null,
    error: null,
    attempts,
  });

  try {
    if (task.writeMode === "preserve" && (await deps.writer.exists(task.targetPath))) {
      return outcome("skipped_preserved");
    }

    stage = "prompting";
    const request = buildGenerationRequest(task.table, task.layer, config);

    stage = "synthesizing";
    const result = await deps.synthesizer.synthesize(request, deps.signal);
    attempts = result.attempts;

    stage = "writing";
    const written =
      task.writeMode === "overwrite"
        ? await deps.writer.writeOverwriteAtomic(task.targetPath, result.code)
        : await deps.writer.writeIfNotExists(task.targetPath, result.code);

    return outcome(written === "written" ? "generated" : "skipped_preserved");
  } catch (error) {
    const failure = asCodegenError(error, STAGE_FALLBACK_KIND[stage]);
    return {
      ...failedOutcome(task, stage, failure),
      attempts: Math.max(attempts, failure.attempts),
    };
  }
}

export async function executeGenerationTasks(params: {
  tasks: readonly GenerationTask[];
  deps: TaskDependencies;
  config: Pick<GenerationConfig, "moduleName" | "basePackage" | "promptTemplate">;
  maxConcurrency: number;
  onTaskComplete?: (outcome: TaskOutcome) => void;
}): Promise<TaskOutcome[]> {
  return processTasksInParallel(params.tasks, {
    maxConcurrency: params.maxConcurrency,
    signal: params.deps.signal,
    run: (task) => runGenerationTask(task, params.deps, params.config),
    onCancelled: (task) =>
      failedOutcome(task, "planning", new CodegenError("Cancelled", "Run cancelled before the task started")),
    onError: (task, error) => failedOutcome(task, "planning", asCodegenError(error, "WriteFailure")),
    onTaskComplete: (_task, outcome) => params.onTaskComplete?.(outcome),
  });
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export function summarizeOutcomes(params: {
  tablesTotal: number;
  outcomes: readonly TaskOutcome[];
}): ReportSummary {
  const errors: RunError[] = [];
  let generated = 0;
  let skippedPreserved = 0;

  for (const outcome of params.outcomes) {
    if (outcome.status === "generated") {
      generated += 1;
    } else if (outcome.status === "skipped_preserved") {
      skippedPreserved += 1;
    } else {
      errors.push({
        target: taskKey(outcome.table, outcome.layer),
        kind: outcome.errorKind ?? "WriteFailure",
        message: outcome.error || "unknown_task_error",
      });
    }
  }

  return {
    tablesTotal: params.tablesTotal,
    tasksTotal: params.outcomes.length,
    generated,
    skippedPreserved,
    failed: errors.length,
    errors,
  };
}

export function computeRunStatus(params: {
  fatalError: FatalError | null;
  outcomes: readonly TaskOutcome[];
}): RunStatus {
  if (params.fatalError) {
    return "failed";
  }

  const failed = params.outcomes.filter((outcome) => outcome.status === "failed").length;
  if (failed === 0) {
    return "success";
  }

  // Nothing generated or preserved means nothing usable came out of the run.
  return failed === params.outcomes.length ? "failed" : "partial_success";
}

function compareCodePoints(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/** Tables sorted by name, each table's layers in `LAYER_ORDER`. */
export function buildGenerationReport(params: {
  runId: string;
  startedAt: string;
  finishedAt: string;
  fatalError: FatalError | null;
  warnings: readonly string[];
  tables: readonly TableSchema[];
  outcomes: readonly TaskOutcome[];
}): GenerationReport {
  const outcomesByTable = new Map<string, TaskOutcome[]>();
  for (const outcome of params.outcomes) {
    const bucket = outcomesByTable.get(outcome.table) ?? [];
    bucket.push(outcome);
    outcomesByTable.set(outcome.table, bucket);
  }

  const tables: TableReport[] = [...params.tables]
    .sort((left, right) => compareCodePoints(left.table, right.table))
    .map((table) =>
      Object.freeze({
        table: table.table,
        primaryKey: table.primaryKey,
        layers: Object.freeze(
          [...(outcomesByTable.get(table.table) ?? [])].sort(
            (left, right) => LAYER_ORDER.indexOf(left.layer) - LAYER_ORDER.indexOf(right.layer),
          ),
        ),
      }),
    );

  return Object.freeze({
    runId: params.runId,
    startedAt: params.startedAt,
    finishedAt: params.finishedAt,
    status: computeRunStatus({ fatalError: params.fatalError, outcomes: params.outcomes }),
    fatalError: params.fatalError,
    warnings: Object.freeze([...params.warnings]),
    tables: Object.freeze(tables),
    summary: summarizeOutcomes({
      tablesTotal: params.tables.length,
      outcomes: params.outcomes,
    }),
  });
}

function toFatalError(error: unknown, fallbackKind: CodegenErrorKind): FatalError {
  const failure = asCodegenError(error, fallbackKind);
  return { kind: failure.kind, message: failure.message };
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

export function createCodegenGraph(createDependencies: DependencyFactory = createDefaultDependencies) {
  // One dependency set per run, released by finalizeRun.
  const runDependencies = new Map<string, CodegenDependencies>();

  function dependenciesFor(state: CodegenState, configuration: CodegenConfiguration): CodegenDependencies {
    const key = state.runId ?? "";
    let deps = runDependencies.get(key);
    if (!deps) {
      deps = createDependencies(configuration);
      runDependencies.set(key, deps);
    }
    return deps;
  }

  async function startRun(
    state: CodegenState,
    config: RunnableConfig,
  ): Promise<typeof CodegenStateAnnotation.Update> {
    const runId = state.runId ?? uuidv4();
    const startedAt = new Date().toISOString();

    try {
      ensureCodegenConfiguration(config);
      return { runId, startedAt, fatalError: null, status: "running", outcomes: [] };
    } catch (error) {
      return {
        runId,
        startedAt,
        fatalError: toFatalError(error, "ConfigurationError"),
        status: "failed",
      };
    }
  }

  async function introspectSchema(
    state: CodegenState,
    config: RunnableConfig,
  ): Promise<typeof CodegenStateAnnotation.Update> {
    if (state.fatalError) {
      return {};
    }

    try {
      const configuration = ensureCodegenConfiguration(config);
      const { introspector } = dependenciesFor(state, configuration);
      const tables = await introspector.introspect({ selection: configuration.tableSelection });

      if (tables.length === 0) {
        const selection = configuration.tableSelection;
        const described =
          selection.kind === "allowlist"
            ? `allow-list [${selection.tables.join(", ")}]`
            : `prefixes [${selection.prefixes.join(", ")}]`;
        return {
          tables,
          warnings: [`TableSelectionEmpty: no table in schema ${configuration.sourceSchema} matches ${described}`],
        };
      }

      return { tables };
    } catch (error) {
      return {
        fatalError: toFatalError(error, "SchemaConnectionFailure"),
        status: "failed",
      };
    }
  }

  async function planTasks(
    state: CodegenState,
    config: RunnableConfig,
  ): Promise<typeof CodegenStateAnnotation.Update> {
    if (state.fatalError) {
      return {};
    }

    const configuration = ensureCodegenConfiguration(config);
    const { tasks, conflicts } = planGenerationTasks({
      tables: state.tables,
      config: configuration,
    });

    return { tasks, outcomes: conflicts };
  }

  async function executeTasks(
    state: CodegenState,
    config: RunnableConfig,
  ): Promise<typeof CodegenStateAnnotation.Update> {
    if (state.fatalError) {
      return {};
    }

    let configuration: CodegenConfiguration;
    let deps: CodegenDependencies;
    try {
      configuration = ensureCodegenConfiguration(config);
      deps = dependenciesFor(state, configuration);
    } catch (error) {
      return {
        fatalError: toFatalError(error, "ConfigurationError"),
        status: "failed",
      };
    }

    const total = state.tasks.length + state.outcomes.length;
    const reportFile = configuration.reportFilePath
      ? new ReportFileWriter({
          filePath: configuration.reportFilePath,
          runId: state.runId ?? "",
          startedAt: state.startedAt ?? new Date().toISOString(),
          writer: deps.writer,
        })
      : null;

    const warnings: string[] = [];
    if (reportFile) {
      try {
        await reportFile.initialize(total, state.outcomes);
      } catch (error) {
        warnings.push(`Report file could not be written: ${errorMessage(error)}`);
      }
    }

    let completed = state.outcomes.length;
    const results = await executeGenerationTasks({
      tasks: state.tasks,
      deps,
      config: configuration,
      maxConcurrency: configuration.maxConcurrency,
      onTaskComplete: (outcome) => {
        completed += 1;
        reportFile?.record(outcome);
        deps.onTaskComplete?.(outcome, completed, total);
      },
    });
    await reportFile?.flush();

    return { outcomes: [...state.outcomes, ...results], warnings };
  }

  async function finalizeRun(
    state: CodegenState,
    config: RunnableConfig,
  ): Promise<typeof CodegenStateAnnotation.Update> {
    const finishedAt = new Date().toISOString();
    const warnings = [...state.warnings];

    const buildReport = () =>
      buildGenerationReport({
        runId: state.runId ?? "",
        startedAt: state.startedAt ?? finishedAt,
        finishedAt,
        fatalError: state.fatalError,
        warnings,
        tables: state.tables,
        outcomes: state.outcomes,
      });

    let report = buildReport();

    if (!state.fatalError) {
      try {
        const configuration = ensureCodegenConfiguration(config);
        if (configuration.reportFilePath) {
          const { writer } = dependenciesFor(state, configuration);
          await writeReportFile(writer, configuration.reportFilePath, report);
        }
      } catch (error) {
        const message = `Report file could not be written: ${errorMessage(error)}`;
        logWarning("codegen", message);
        warnings.push(message);
        report = buildReport();
      }
    }
    runDependencies.delete(state.runId ?? "");

    return {
      status: report.status,
      finishedAt,
      report,
    };
  }

  const builder = new StateGraph(CodegenStateAnnotation)
    .addNode("startRun", startRun)
    .addNode("introspectSchema", introspectSchema)
    .addNode("planTasks", planTasks)
    .addNode("executeTasks", executeTasks)
    .addNode("finalizeRun", finalizeRun)
    .addEdge(START, "startRun")
    .addEdge("startRun", "introspectSchema")
    .addEdge("introspectSchema", "planTasks")
    .addEdge("planTasks", "executeTasks")
    .addEdge("executeTasks", "finalizeRun")
    .addEdge("finalizeRun", END);

  return builder.compile().withConfig({ runName: "CodegenGraph" });
}

export const graph = createCodegenGraph(createDefaultDependencies);
