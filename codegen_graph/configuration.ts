import { RunnableConfig } from "@langchain/core/runnables";
import { ensureBaseConfiguration } from "../shared/configuration.js";
import { CodegenError } from "./errors.js";
import { LAYER_ORDER } from "./layers.js";
import { DEFAULT_PROMPT_TEMPLATE, findUnknownPlaceholders } from "./prompt.js";
import type { GenerationConfig, LayerKind, TableSelection, WriteMode } from "./state.js";

const DEFAULT_SOURCE_SCHEMA = "public";
const DEFAULT_BASE_PACKAGE = "com.example";
const DEFAULT_MAX_CONCURRENCY = 4;
const DEFAULT_MAX_ATTEMPTS = 4;
const DEFAULT_INITIAL_BACKOFF_MS = 1_000;
const DEFAULT_MAX_BACKOFF_MS = 30_000;
const DEFAULT_ATTEMPT_TIMEOUT_MS = 120_000;

const JAVA_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type CodegenConfiguration = GenerationConfig & {
  chatModel: string;
  sourceDbUrl: string;
  sourceSchema: string;
  maxConcurrency: number;
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  attemptTimeoutMs: number;
  /** Empty string disables the report file. */
  reportFilePath: string;
};

export function parseStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .map((item) => `${item}`.trim())
      .filter((item) => item.length > 0);
  }

  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  return [];
}

function parsePositiveInt(value: unknown, fallback: number): number {
  const numeric = Number(value);
  if (value !== undefined && value !== "" && Number.isFinite(numeric) && numeric > 0) {
    return Math.floor(numeric);
  }
  return fallback;
}

export function firstDefinedString(...values: unknown[]): string | undefined {
  for (const value of values) {
    if (typeof value === "string" && value.trim().length > 0) {
      const normalized = value.trim();
      if (
        (normalized.startsWith("\"") && normalized.endsWith("\"")) ||
        (normalized.startsWith("'") && normalized.endsWith("'"))
      ) {
        return normalized.slice(1, -1).trim();
      }
      return normalized;
    }
  }
  return undefined;
}

export function buildDbUrlFromLegacyEnv(
  rawConfig: Record<string, unknown> = {},
): string | undefined {
  const host = firstDefinedString(rawConfig.dbHost, process.env.DB_HOST);
  const port = firstDefinedString(rawConfig.dbPort, process.env.DB_PORT) || "5432";
  const dbName = firstDefinedString(rawConfig.dbName, process.env.DB_NAME);
  const username = firstDefinedString(
    rawConfig.dbUsername,
    process.env.DB_USERNAME,
    process.env.DB_USER,
  );
  const password = firstDefinedString(
    rawConfig.dbPassword,
    process.env.DB_PASSWORD,
  );

  if (!host || !dbName || !username || !password) {
    return undefined;
  }

  return `postgres://${encodeURIComponent(username)}:${encodeURIComponent(
    password,
  )}@${host}:${port}/${encodeURIComponent(dbName)}`;
}

function isLayerKind(value: string): value is LayerKind {
  return (LAYER_ORDER as readonly string[]).includes(value);
}

/**
 * Accepts either an object (`{ service: "preserve" }`) or the env form
 * `service=preserve,request_handler=preserve`.
 */
export function parseWriteModeOverrides(
  value: unknown,
): Partial<Record<LayerKind, WriteMode>> {
  const entries: Array<[string, unknown]> =
    typeof value === "string"
      ? parseStringList(value).map((pair) => {
          const [layer, mode] = pair.split("=").map((part) => part.trim());
          return [layer, mode];
        })
      : typeof value === "object" && value !== null
        ? Object.entries(value)
        : [];

  const overrides: Partial<Record<LayerKind, WriteMode>> = {};
  for (const [layer, mode] of entries) {
    if (!isLayerKind(layer)) {
      throw new CodegenError("ConfigurationError", `Unknown layer in write mode overrides: ${layer}`);
    }
    if (mode !== "overwrite" && mode !== "preserve") {
      throw new CodegenError(
        "ConfigurationError",
        `Write mode for ${layer} must be "overwrite" or "preserve", got ${String(mode)}`,
      );
    }
    overrides[layer] = mode;
  }
  return overrides;
}

/**
 * An explicit allow-list wins; otherwise prefixes are used, defaulting to the
 * module name itself (`sys` selects every `sys*` table).
 */
export function resolveTableSelection(params: {
  tableAllowlist: string[];
  tablePrefixes: string[];
  moduleName: string;
}): TableSelection {
  if (params.tableAllowlist.length > 0) {
    return { kind: "allowlist", tables: params.tableAllowlist };
  }
  if (params.tablePrefixes.length > 0) {
    return { kind: "prefix", prefixes: params.tablePrefixes };
  }
  return { kind: "prefix", prefixes: [params.moduleName] };
}

/**
 * Connection settings only; enough for connection checks and table listing.
 */
export function ensureSourceDatabaseConfiguration(
  config: RunnableConfig,
): { sourceDbUrl: string; sourceSchema: string } {
  const rawConfig: Record<string, unknown> = config?.configurable ?? {};

  const sourceDbUrl =
    firstDefinedString(rawConfig.sourceDbUrl) ||
    buildDbUrlFromLegacyEnv(rawConfig) ||
    firstDefinedString(process.env.SOURCE_DB_URL);

  if (!sourceDbUrl) {
    throw new CodegenError(
      "ConfigurationError",
      "Missing sourceDbUrl. Set configurable.sourceDbUrl or SOURCE_DB_URL, or provide DB_HOST/DB_PORT/DB_NAME/DB_USER/DB_PASSWORD.",
    );
  }

  const sourceSchema =
    firstDefinedString(
      rawConfig.sourceSchema,
      process.env.SOURCE_SCHEMA,
      process.env.DB_SCHEMA,
    ) || DEFAULT_SOURCE_SCHEMA;

  return { sourceDbUrl, sourceSchema };
}

/**
 * Build code generation configuration from RunnableConfig with env fallback.
 */
export function ensureCodegenConfiguration(
  config: RunnableConfig,
): CodegenConfiguration {
  const rawConfig: Record<string, unknown> = config?.configurable ?? {};
  const baseConfig = ensureBaseConfiguration(config);
  const { sourceDbUrl, sourceSchema } = ensureSourceDatabaseConfiguration(config);

  const moduleName = firstDefinedString(rawConfig.moduleName, process.env.MODULE_NAME);
  if (!moduleName || !JAVA_IDENTIFIER.test(moduleName)) {
    throw new CodegenError(
      "ConfigurationError",
      "moduleName is required and must be a valid package segment. Set configurable.moduleName or MODULE_NAME.",
    );
  }

  const basePackage =
    firstDefinedString(rawConfig.basePackage, process.env.BASE_PACKAGE) || DEFAULT_BASE_PACKAGE;
  if (!basePackage.split(".").every((segment) => JAVA_IDENTIFIER.test(segment))) {
    throw new CodegenError("ConfigurationError", `Invalid basePackage: ${basePackage}`);
  }

  const projectRoot = firstDefinedString(rawConfig.projectRoot, process.env.PROJECT_ROOT);
  if (!projectRoot) {
    throw new CodegenError(
      "ConfigurationError",
      "projectRoot is required. Set configurable.projectRoot or PROJECT_ROOT.",
    );
  }

  const promptTemplate =
    typeof rawConfig.promptTemplate === "string" && rawConfig.promptTemplate.trim().length > 0
      ? rawConfig.promptTemplate
      : DEFAULT_PROMPT_TEMPLATE;
  const unknownPlaceholders = findUnknownPlaceholders(promptTemplate);
  if (unknownPlaceholders.length > 0) {
    throw new CodegenError(
      "ConfigurationError",
      `Prompt template uses unknown placeholders: ${unknownPlaceholders.join(", ")}`,
    );
  }

  const tableSelection = resolveTableSelection({
    tableAllowlist: parseStringList(rawConfig.tableAllowlist ?? process.env.TABLE_ALLOWLIST),
    tablePrefixes: parseStringList(rawConfig.tablePrefixes ?? process.env.TABLE_PREFIXES),
    moduleName,
  });

  const writeModeOverrides = parseWriteModeOverrides(
    rawConfig.writeModeOverrides ?? process.env.WRITE_MODE_OVERRIDES,
  );

  const reportFilePath =
    typeof rawConfig.reportFilePath === "string"
      ? rawConfig.reportFilePath.trim()
      : process.env.CODEGEN_REPORT_FILE?.trim() ?? "";

  return {
    ...baseConfig,
    sourceDbUrl,
    sourceSchema,
    moduleName,
    basePackage,
    projectRoot,
    promptTemplate,
    tableSelection,
    writeModeOverrides,
    maxConcurrency: parsePositiveInt(
      rawConfig.maxConcurrency ?? process.env.MAX_CONCURRENCY,
      DEFAULT_MAX_CONCURRENCY,
    ),
    maxAttempts: parsePositiveInt(
      rawConfig.maxAttempts ?? process.env.ORACLE_MAX_ATTEMPTS,
      DEFAULT_MAX_ATTEMPTS,
    ),
    initialBackoffMs: parsePositiveInt(
      rawConfig.initialBackoffMs ?? process.env.ORACLE_INITIAL_BACKOFF_MS,
      DEFAULT_INITIAL_BACKOFF_MS,
    ),
    maxBackoffMs: parsePositiveInt(
      rawConfig.maxBackoffMs ?? process.env.ORACLE_MAX_BACKOFF_MS,
      DEFAULT_MAX_BACKOFF_MS,
    ),
    attemptTimeoutMs: parsePositiveInt(
      rawConfig.attemptTimeoutMs ?? process.env.ORACLE_TIMEOUT_MS,
      DEFAULT_ATTEMPT_TIMEOUT_MS,
    ),
    reportFilePath,
  };
}
