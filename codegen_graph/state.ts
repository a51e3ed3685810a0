import { Annotation } from "@langchain/langgraph";
import type { CodegenErrorKind } from "./errors.js";

export type RunStatus = "running" | "success" | "partial_success" | "failed";

export type LayerKind =
  | "entity_base"
  | "entity_impl"
  | "data_access"
  | "service"
  | "service_impl"
  | "request_handler"
  | "mapping_config";

export type WriteMode = "overwrite" | "preserve";

export type TaskStatus = "generated" | "skipped_preserved" | "failed";

export type TaskStage = "planning" | "prompting" | "synthesizing" | "writing";

export type ColumnDefinition = {
  readonly name: string;
  readonly dataType: string;
  readonly isNullable: boolean;
  readonly isPrimaryKey: boolean;
  readonly ordinalPosition: number;
  readonly columnDefault: string | null;
  readonly characterMaximumLength: number | null;
  readonly numericPrecision: number | null;
  readonly numericScale: number | null;
  readonly comment: string | null;
};

export type TableSchema = {
  readonly schema: string;
  readonly table: string;
  readonly comment: string | null;
  readonly columns: readonly ColumnDefinition[];
  /** Single-column primary key; composite keys are reported as `null`. */
  readonly primaryKey: string | null;
};

export type TableSelection =
  | { readonly kind: "allowlist"; readonly tables: readonly string[] }
  | { readonly kind: "prefix"; readonly prefixes: readonly string[] };

export type GenerationConfig = {
  readonly moduleName: string;
  readonly basePackage: string;
  readonly projectRoot: string;
  readonly promptTemplate: string;
  readonly tableSelection: TableSelection;
  readonly writeModeOverrides: Readonly<Partial<Record<LayerKind, WriteMode>>>;
};

export type GenerationTask = {
  readonly table: TableSchema;
  readonly layer: LayerKind;
  readonly targetPath: string;
  readonly writeMode: WriteMode;
};

export type TaskOutcome = {
  readonly table: string;
  readonly layer: LayerKind;
  readonly targetPath: string;
  readonly writeMode: WriteMode;
  readonly status: TaskStatus;
  readonly failedStage: TaskStage | null;
  readonly errorKind: CodegenErrorKind | null;
  readonly error: string | null;
  readonly attempts: number;
};

export type TableReport = {
  readonly table: string;
  readonly primaryKey: string | null;
  readonly layers: readonly TaskOutcome[];
};

export type RunError = {
  readonly target: string;
  readonly kind: CodegenErrorKind;
  readonly message: string;
};

export type ReportSummary = {
  readonly tablesTotal: number;
  readonly tasksTotal: number;
  readonly generated: number;
  readonly skippedPreserved: number;
  readonly failed: number;
  readonly errors: readonly RunError[];
};

export type FatalError = {
  readonly kind: CodegenErrorKind;
  readonly message: string;
};

export type GenerationReport = {
  readonly runId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly status: RunStatus;
  readonly fatalError: FatalError | null;
  readonly warnings: readonly string[];
  readonly tables: readonly TableReport[];
  readonly summary: ReportSummary;
};

export function taskKey(table: string, layer: LayerKind): string {
  return `${table}:${layer}`;
}

export const CodegenStateAnnotation = Annotation.Root({
  runId: Annotation<string | null>({
    reducer: (_existing: string | null, incoming: string | null) => incoming,
    default: () => null,
  }),
  startedAt: Annotation<string | null>({
    reducer: (_existing: string | null, incoming: string | null) => incoming,
    default: () => null,
  }),
  finishedAt: Annotation<string | null>({
    reducer: (_existing: string | null, incoming: string | null) => incoming,
    default: () => null,
  }),
  fatalError: Annotation<FatalError | null>({
    default: () => null,
    reducer: (existing: FatalError | null, incoming: FatalError | null) =>
      incoming ?? existing,
  }),
  status: Annotation<RunStatus>({
    reducer: (_existing: RunStatus, incoming: RunStatus) => incoming,
    default: () => "running",
  }),
  warnings: Annotation<string[]>({
    reducer: (existing: string[], incoming: string[]) => [...existing, ...incoming],
    default: () => [],
  }),
  tables: Annotation<TableSchema[]>({
    reducer: (_existing: TableSchema[], incoming: TableSchema[]) => incoming,
    default: () => [],
  }),
  tasks: Annotation<GenerationTask[]>({
    reducer: (_existing: GenerationTask[], incoming: GenerationTask[]) => incoming,
    default: () => [],
  }),
  outcomes: Annotation<TaskOutcome[]>({
    reducer: (_existing: TaskOutcome[], incoming: TaskOutcome[]) => incoming,
    default: () => [],
  }),
  report: Annotation<GenerationReport | null>({
    reducer: (_existing: GenerationReport | null, incoming: GenerationReport | null) =>
      incoming,
    default: () => null,
  }),
});

export type CodegenState = typeof CodegenStateAnnotation.State;
