#!/usr/bin/env tsx
/**
 * Renders one PDF per top-level type of a documentation model.
 *
 * Usage: tsx scripts/render-docs.ts <model.json> [options]
 */
import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { parseArgs } from "util";
import { loadConfig } from "./lib/config";
import { banner, errorMessage, fail, info, warn } from "./lib/log";
import { displayName, loadModel, type TypeDoc } from "./lib/model";
import { pdfOutputPath } from "./lib/output-paths";
import { runParallel } from "./lib/parallel";
import { renderToFile } from "./lib/pdf/render-document";

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      config: { type: "string", short: "c" },
      parallel: { type: "string", short: "j" },
      strict: { type: "boolean" },
      "no-strict": { type: "boolean" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

/** Runs the CLI and returns its exit code: 0 ok, 1 failures, 2 usage error. */
export async function main(argv: string[]): Promise<number> {
  let cli: ReturnType<typeof parseCli>;
  try {
    cli = parseCli(argv);
  } catch (err) {
    fail("args", errorMessage(err));
    printHelp();
    return 2;
  }
  const { values, positionals } = cli;

  if (values.help) {
    printHelp();
    return 0;
  }
  if (positionals.length !== 1) {
    fail("args", positionals.length === 0 ? "missing <model.json>" : "expected exactly one model file");
    printHelp();
    return 2;
  }

  let parallel: number | undefined;
  if (values.parallel !== undefined) {
    parallel = Number(values.parallel);
    if (!Number.isInteger(parallel) || parallel < 1) {
      fail("args", `--parallel must be a positive integer, got "${values.parallel}"`);
      return 2;
    }
  }

  if (values.strict && values["no-strict"]) {
    fail("args", "--strict and --no-strict are mutually exclusive");
    return 2;
  }

  const modelPath = positionals[0];
  let types: TypeDoc[];
  let config: ReturnType<typeof loadConfig>;
  try {
    config = loadConfig(values.config);
    types = loadModel(modelPath);
  } catch (err) {
    fail("load", errorMessage(err));
    return 1;
  }

  const outDir = values.out ?? config.outDir;
  const concurrency = parallel ?? config.concurrency;
  const strict = values["no-strict"] ? false : (values.strict ?? config.strict);

  if (types.length === 0) {
    warn("load", `${modelPath} contains no types`);
    return 0;
  }

  banner("API reference PDFs", {
    Model: modelPath,
    Types: types.length,
    Output: outDir,
    "Page size": config.theme.pageSize,
    Parallel: concurrency,
    Strict: strict ? "yes" : "no",
  });

  const results = await runParallel({
    items: types,
    concurrency,
    fn: (type) =>
      renderToFile(type, pdfOutputPath(outDir, type), {
        theme: config.theme,
        toc: config.toc,
        strict,
      }),
    onStart: (type) => info("render", displayName(type)),
    onError: (type, err) => fail("render", `${displayName(type)}: ${err.message}`),
  });

  const failed = results.filter((r) => r.error).length;
  banner("Done", {
    Generated: results.length - failed,
    Failed: failed,
  });
  return failed > 0 ? 1 : 0;
}

function printHelp() {
  console.log(`
Render API reference PDFs

Usage: tsx scripts/render-docs.ts <model.json> [options]

Options:
  -o, --out <dir>           Output directory (default: docs/pdf)
  -c, --config <file>       JSON configuration file
  -j, --parallel <N>        Documents rendered concurrently (default: 2)
      --strict              Fail a document on the first layout bounds violation
      --no-strict           Record bounds violations instead (overrides config and env)
  -h, --help                Show this help

Environment:
  APIDOC_OUT_DIR, APIDOC_CONCURRENCY, APIDOC_PAGE_SIZE, APIDOC_STRICT

Examples:
  tsx scripts/render-docs.ts examples/sample-model.json
  tsx scripts/render-docs.ts model.json -o build/pdf -j 4 --strict
`);
}

function invokedDirectly(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  process.exitCode = await main(process.argv.slice(2));
}
