import {
  createCodegenGraph,
  createDefaultDependencies,
  type CodegenDependencies,
  type DependencyFactory,
} from "./graph.js";
import { ensureSourceDatabaseConfiguration } from "./configuration.js";
import { CodegenError } from "./errors.js";
import { PostgresSchemaIntrospector, type DatabaseInfo } from "./postgres.js";
import type { GenerationReport, TaskOutcome } from "./state.js";

export type CodegenStatus = {
  running: boolean;
  lastRun: GenerationReport | null;
};

export type GenerateOptions = {
  signal?: AbortSignal;
  onTaskComplete?: CodegenDependencies["onTaskComplete"];
};

type IntrospectorFactory = (configurable: Record<string, unknown>) => Pick<
  PostgresSchemaIntrospector,
  "checkConnection" | "getDatabaseInfo" | "listTables"
>;

function createIntrospector(configurable: Record<string, unknown>): PostgresSchemaIntrospector {
  return new PostgresSchemaIntrospector(ensureSourceDatabaseConfiguration({ configurable }));
}

/**
 * Front door for one process: runs at most one generation at a time and
 * remembers the last report for `status()`.
 */
export class CodegenService {
  private running = false;
  private lastRun: GenerationReport | null = null;

  constructor(
    private readonly createDependencies: DependencyFactory = createDefaultDependencies,
    private readonly createSchemaIntrospector: IntrospectorFactory = createIntrospector,
  ) {}

  status(): CodegenStatus {
    return { running: this.running, lastRun: this.lastRun };
  }

  async generate(
    configurable: Record<string, unknown>,
    options: GenerateOptions = {},
  ): Promise<GenerationReport> {
    if (this.running) {
      throw new CodegenError("ConfigurationError", "A generation run is already in progress");
    }

    this.running = true;
    try {
      const graph = createCodegenGraph((configuration) => ({
        ...this.createDependencies(configuration),
        signal: options.signal,
        onTaskComplete: options.onTaskComplete,
      }));
      const state = await graph.invoke({}, { configurable });
      if (!state.report) {
        throw new Error("Generation finished without a report");
      }
      this.lastRun = state.report;
      return state.report;
    } finally {
      this.running = false;
    }
  }

  async checkDatabaseConnection(configurable: Record<string, unknown>): Promise<boolean> {
    return this.createSchemaIntrospector(configurable).checkConnection();
  }

  async getDatabaseInfo(configurable: Record<string, unknown>): Promise<DatabaseInfo> {
    return this.createSchemaIntrospector(configurable).getDatabaseInfo();
  }

  async listTables(configurable: Record<string, unknown>, prefix = ""): Promise<string[]> {
    return this.createSchemaIntrospector(configurable).listTables(prefix);
  }
}

export function failedOutcomes(report: GenerationReport): TaskOutcome[] {
  return report.tables.flatMap((table) => table.layers.filter((layer) => layer.status === "failed"));
}
