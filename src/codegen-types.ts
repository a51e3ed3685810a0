export type CodegenOperation = "generate" | "list" | "check";

export type TableSelectionMode = "prefix" | "allowlist";

export interface ConnectionParams {
  sourceDbUrl: string;
  sourceSchema: string;
}

export interface GenerateParams {
  moduleName: string;
  basePackage: string;
  projectRoot: string;
  selectionMode: TableSelectionMode;
  /** Prefixes or exact table names, depending on `selectionMode`. */
  tables: string[];
  chatModel: string;
  apiKey?: string;
  maxConcurrency: number;
  reportFilePath: string;
}

export interface CodegenUserAnswers {
  operation: CodegenOperation;
  connection: ConnectionParams;
  listPrefix?: string;
  generate?: GenerateParams;
}
