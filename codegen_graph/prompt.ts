import { CodegenError } from "./errors.js";
import { LAYER_DEFINITIONS, resolveLayerNames } from "./layers.js";
import type { ColumnDefinition, GenerationConfig, LayerKind, TableSchema } from "./state.js";

export type GenerationRequest = {
  layer: LayerKind;
  system: string;
  user: string;
};

export const PROMPT_PLACEHOLDERS = [
  "layerLabel",
  "moduleName",
  "basePackage",
  "packageName",
  "className",
  "typeName",
  "fileName",
  "tableName",
  "tableComment",
  "primaryKey",
  "columns",
  "layerInstructions",
  "fenceLanguage",
] as const;

export type PromptPlaceholder = (typeof PROMPT_PLACEHOLDERS)[number];

export const DEFAULT_PROMPT_TEMPLATE = [
  "You are a senior Java backend engineer working on a Spring Boot project that uses MyBatis-Plus on PostgreSQL.",
  "Write the {{layerLabel}} layer for the table `{{tableName}}` of module `{{moduleName}}`.",
  "",
  "Target type: {{typeName}} (file {{fileName}})",
  "Package: {{packageName}}",
  "Table comment: {{tableComment}}",
  "Primary key: {{primaryKey}}",
  "",
  "Columns:",
  "{{columns}}",
  "",
  "Requirements:",
  "{{layerInstructions}}",
].join("\n");

const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z]+)\s*\}\}/g;

function isPromptPlaceholder(name: string): name is PromptPlaceholder {
  return (PROMPT_PLACEHOLDERS as readonly string[]).includes(name);
}

/** Placeholders in `template` that the renderer does not know. */
export function findUnknownPlaceholders(template: string): string[] {
  const unknown = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (!isPromptPlaceholder(match[1])) {
      unknown.add(match[1]);
    }
  }
  return [...unknown].sort();
}

export function describeColumn(column: ColumnDefinition): string {
  const parts = [formatDataType(column), column.isNullable ? "NULL" : "NOT NULL"];
  if (column.isPrimaryKey) {
    parts.push("PRIMARY KEY");
  }
  if (column.columnDefault !== null) {
    parts.push(`DEFAULT ${column.columnDefault}`);
  }
  const comment = column.comment ? ` -- ${column.comment}` : "";
  return `- ${column.name}: ${parts.join(", ")}${comment}`;
}

function formatDataType(column: ColumnDefinition): string {
  if (column.characterMaximumLength !== null) {
    return `${column.dataType}(${column.characterMaximumLength})`;
  }
  if (column.numericPrecision !== null && column.numericScale !== null && column.numericScale > 0) {
    return `${column.dataType}(${column.numericPrecision},${column.numericScale})`;
  }
  return column.dataType;
}

function outputContract(fenceLanguage: string, typeName: string): string {
  return [
    "Output rules:",
    `1. Produce code for this single layer only (${typeName}); do not include any other layer.`,
    `2. Answer with exactly one fenced code block that starts with \`\`\`${fenceLanguage} and ends with \`\`\`.`,
    "3. Put nothing outside that block: no explanations, no second block.",
  ].join("\n");
}

/**
 * Renders the oracle request for one layer of one table. Pure: the same table,
 * layer and config always produce the same request.
 */
export function buildGenerationRequest(
  table: TableSchema,
  layer: LayerKind,
  config: Pick<GenerationConfig, "moduleName" | "basePackage" | "promptTemplate">,
): GenerationRequest {
  const definition = LAYER_DEFINITIONS[layer];
  const names = resolveLayerNames(table, config);
  const packageName =
    definition.subPackage === null
      ? `${names.tablePackage}.mapper`
      : `${names.tablePackage}.${definition.subPackage}`;

  const values: Record<PromptPlaceholder, string> = {
    layerLabel: definition.label,
    moduleName: config.moduleName,
    basePackage: config.basePackage,
    packageName,
    className: names.className,
    typeName: definition.typeName(names),
    fileName: definition.fileName(names),
    tableName: table.table,
    tableComment: table.comment ?? "(none)",
    primaryKey: table.primaryKey ?? "(none detected)",
    columns: table.columns.map(describeColumn).join("\n"),
    layerInstructions: definition
      .instructions(names)
      .map((line, index) => `${index + 1}. ${line}`)
      .join("\n"),
    fenceLanguage: definition.fenceLanguage,
  };

  const user = config.promptTemplate.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    if (!isPromptPlaceholder(name)) {
      throw new CodegenError("ConfigurationError", `Unknown prompt placeholder {{${name}}}`);
    }
    return values[name];
  });

  return {
    layer,
    system: outputContract(definition.fenceLanguage, values.typeName),
    user,
  };
}
