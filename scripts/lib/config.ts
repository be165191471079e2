import { z } from "zod";
import { readJson } from "./store";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const hexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected a #rrggbb colour");

export const PAGE_SIZES = ["A4", "Letter", "Legal"] as const;
export type PageSizeName = (typeof PAGE_SIZES)[number];

export const ThemeConfigSchema = z.object({
  pageSize: z.enum(PAGE_SIZES).default("A4"),
  margins: z
    .object({
      left: z.number().nonnegative().default(54), // 0.75"
      right: z.number().nonnegative().default(54),
      top: z.number().nonnegative().default(72), // 1.0"
      bottom: z.number().nonnegative().default(72),
    })
    .default({}),
  pageHeaderTop: z.number().nonnegative().default(36),
  paragraphSpacing: z.number().nonnegative().default(6),
  tableColGap: z.number().nonnegative().default(10),
  lineSpacingHeading: z.number().min(1).default(1),
  colors: z
    .object({
      primary: hexColor.default("#282828"),
      dark: hexColor.default("#1e1e1e"),
      muted: hexColor.default("#808080"),
    })
    .default({}),
  // Standard PDF font faces; checked when the theme is built.
  fonts: z
    .object({
      sans: z.string().default("Helvetica"),
      sansBold: z.string().default("Helvetica-Bold"),
      mono: z.string().default("Courier"),
    })
    .default({}),
  title: z.string().default("API Reference"),
});

export const TocConfigSchema = z.object({
  wrap: z.boolean().default(true),
  includeSignature: z.boolean().default(true),
  includeDescription: z.boolean().default(true),
  maxSignatureChars: z.number().int().min(4).default(80),
  maxDescriptionChars: z.number().int().min(4).default(100),
  hangingIndent: z.number().nonnegative().default(10),
});

export const ConfigSchema = z.object({
  outDir: z.string().min(1).default("docs/pdf"),
  concurrency: z.number().int().positive().default(2),
  strict: z.boolean().default(false),
  theme: ThemeConfigSchema.default({}),
  toc: TocConfigSchema.default({}),
});

export type ThemeConfig = z.infer<typeof ThemeConfigSchema>;
export type TocConfig = z.infer<typeof TocConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    .join("; ");
}

export function parseConfig(data: unknown, source = "config"): Config {
  const parsed = ConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function envOverrides(env: Env): Partial<Config> {
  const out: Partial<Config> = {};
  if (env.APIDOC_OUT_DIR) out.outDir = env.APIDOC_OUT_DIR;
  if (env.APIDOC_CONCURRENCY) {
    const n = Number(env.APIDOC_CONCURRENCY);
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigError(`APIDOC_CONCURRENCY must be a positive integer, got "${env.APIDOC_CONCURRENCY}"`);
    }
    out.concurrency = n;
  }
  if (env.APIDOC_STRICT) out.strict = env.APIDOC_STRICT === "1" || env.APIDOC_STRICT === "true";
  return out;
}

function pageSizeOverride(env: Env): PageSizeName | undefined {
  const value = env.APIDOC_PAGE_SIZE;
  if (!value) return undefined;
  const size = PAGE_SIZES.find((s) => s.toLowerCase() === value.toLowerCase());
  if (!size) {
    throw new ConfigError(`APIDOC_PAGE_SIZE must be one of ${PAGE_SIZES.join(", ")}, got "${value}"`);
  }
  return size;
}

/**
 * Loads the configuration: defaults, then the optional JSON file, then
 * APIDOC_* environment variables.
 */
export function loadConfig(configPath?: string, env: Env = process.env): Config {
  let fileConfig: unknown = {};
  if (configPath) {
    try {
      fileConfig = readJson(configPath);
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Failed to load config from ${configPath}: ${reason}`);
    }
  }

  const config = parseConfig(fileConfig, configPath ?? "config");
  const pageSize = pageSizeOverride(env);
  return {
    ...config,
    ...envOverrides(env),
    theme: pageSize ? { ...config.theme, pageSize } : config.theme,
  };
}
