/** Where in a run a log line comes from. */
export type Stage = "args" | "load" | "render" | "save";

const STAGE_WIDTH = 6;

function ts(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour12: false,
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  });
}

function format(stage: Stage, msg: string, tag?: string): string {
  const prefix = tag ? `${tag} ` : "";
  return `[${ts()}] ${prefix}${stage.padEnd(STAGE_WIDTH)} ${msg}`;
}

export function info(stage: Stage, msg: string) {
  console.log(format(stage, msg));
}

export function success(stage: Stage, msg: string) {
  console.log(format(stage, msg, "✅"));
}

export function fail(stage: Stage, msg: string) {
  console.error(format(stage, msg, "❌"));
}

export function warn(stage: Stage, msg: string) {
  console.error(format(stage, msg, "⚠️ "));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Boxed summary printed at the start and end of a run. */
export function banner(title: string, details: Record<string, string | number>) {
  const line = "═".repeat(60);
  console.log(`\n${line}`);
  console.log(`  ${title}`);
  console.log(line);
  for (const [k, v] of Object.entries(details)) {
    console.log(`  ${k.padEnd(14)} ${v}`);
  }
  console.log(`${line}\n`);
}
