export const REQUIRED_NODE_VERSION = ">=20.0.0";

export const DEFAULT_REPORT_FILE = "codegen_report.json";
