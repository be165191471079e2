/**
 * Documentation model consumed by the renderers: documented types, their
 * members and their nested types, as produced by the source extractor.
 */
import { z } from "zod";
import { readJson } from "./store";

export class ModelError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(issues.length ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ModelError";
  }
}

export const MemberDocSchema = z.object({
  /** "ctor", "method", "property", "event", "field" or "enum-member" */
  kind: z.string().default(""),
  signature: z.string().default(""),
  modifiers: z.string().default(""),
  summary: z.string().default(""),
});

export type MemberDoc = z.infer<typeof MemberDocSchema>;
export type MemberDocInput = z.input<typeof MemberDocSchema>;

export interface TypeDoc {
  /** "class", "struct", "interface", "record", "enum", "delegate" */
  kind: string;
  name: string;
  namespace: string;
  modifiers: string;
  attributes: string[];
  baseTypes: string[];
  summary: string;
  filePath: string;
  /** Display name of the enclosing type, for nested types. */
  parent?: string;
  signature?: string;
  constructors: MemberDoc[];
  properties: MemberDoc[];
  methods: MemberDoc[];
  events: MemberDoc[];
  fields: MemberDoc[];
  nestedTypes: TypeDoc[];
}

export interface TypeDocInput {
  kind?: string;
  name: string;
  namespace?: string;
  modifiers?: string;
  attributes?: string[];
  baseTypes?: string[];
  summary?: string;
  filePath?: string;
  parent?: string;
  signature?: string;
  constructors?: MemberDocInput[];
  properties?: MemberDocInput[];
  methods?: MemberDocInput[];
  events?: MemberDocInput[];
  fields?: MemberDocInput[];
  nestedTypes?: TypeDocInput[];
}

const members = z.array(MemberDocSchema).default([]);

export const TypeDocSchema: z.ZodType<TypeDoc, z.ZodTypeDef, TypeDocInput> = z.lazy(() =>
  z.object({
    kind: z.string().default(""),
    name: z.string().min(1, "type name must not be empty"),
    namespace: z.string().default(""),
    modifiers: z.string().default(""),
    attributes: z.array(z.string()).default([]),
    baseTypes: z.array(z.string()).default([]),
    summary: z.string().default(""),
    filePath: z.string().default(""),
    parent: z.string().optional(),
    signature: z.string().optional(),
    constructors: members,
    properties: members,
    methods: members,
    events: members,
    fields: members,
    nestedTypes: z.array(TypeDocSchema).default([]),
  })
);

const TypeListSchema = z.array(TypeDocSchema);
const TypeListFileSchema = z.object({ types: TypeListSchema }).transform((m) => m.types);
const SingleTypeSchema = TypeDocSchema.transform((t) => [t]);

function schemaFor(data: unknown) {
  if (Array.isArray(data)) return TypeListSchema;
  if (typeof data === "object" && data !== null && "types" in data) return TypeListFileSchema;
  return SingleTypeSchema;
}

export function displayName(type: TypeDoc): string {
  return type.parent && type.parent.trim() !== "" ? `${type.parent}.${type.name}` : type.name;
}

/** The type itself, then every nested type, depth-first pre-order. */
export function* flattenNested(type: TypeDoc): Generator<TypeDoc> {
  yield type;
  for (const nested of type.nestedTypes) {
    yield* flattenNested(nested);
  }
}

export function parseModel(data: unknown): TypeDoc[] {
  const parsed = schemaFor(data).safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.length ? i.path.join(".") : "<root>"}: ${i.message}`
    );
    throw new ModelError("Invalid documentation model", issues);
  }
  return parsed.data;
}

export function loadModel(path: string): TypeDoc[] {
  let data: unknown;
  try {
    data = readJson(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ModelError(`Cannot read model ${path}: ${reason}`);
  }
  return parseModel(data);
}
