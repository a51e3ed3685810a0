import pc from "picocolors";

type LogOptions = {
  newline?: "before" | "after" | "both";
};

export function log(message: string, options: LogOptions = {}): void {
  const { newline } = options;
  const before = newline === "before" || newline === "both" ? "\n" : "";
  const after = newline === "after" || newline === "both" ? "\n" : "";
  console.log(`${before}${message}${after}`);
}

/** Scoped diagnostic line on stderr, e.g. `[file-writer] could not remove ...`. */
export function logWarning(scope: string, message: string): void {
  console.error(pc.yellow(`[${scope}] ${message}`));
}
