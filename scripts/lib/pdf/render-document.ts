import { PDFDocument, type PDFPage } from "pdf-lib";
import { DEFAULT_CONFIG, type ThemeConfig, type TocConfig } from "../config";
import { displayName, flattenNested, type MemberDoc, type TypeDoc } from "../model";
import { success } from "../log";
import { saveDocument } from "../store";
import { Outline, type OutlineNode } from "./links";
import { PageWriter, type BoundsViolation, type DrawOp } from "./page-writer";
import { RenderContext } from "./render-context";
import type { TableColumnSpec } from "./table";
import { createTheme, type PdfTheme } from "./theme";
import { TOC_TITLE, drawToc, sectionTitle, tocFields, tocLabel, type TocEntry } from "./toc";

export class LayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LayoutError";
  }
}

export interface RenderOptions {
  theme?: ThemeConfig;
  toc?: TocConfig;
  /** Throw on the first bounds violation (default: false). */
  strict?: boolean;
  /** Fixed page-header text instead of the current section title. */
  headerTitle?: string;
  onViolation?: (v: BoundsViolation) => void;
  onDraw?: (op: DrawOp) => void;
}

export interface RenderedDocument {
  doc: PDFDocument;
  toc: TocEntry[];
  pageCount: number;
  tocPageCount: number;
  violations: BoundsViolation[];
}

const MEMBER_GROUPS: ReadonlyArray<readonly [string, (t: TypeDoc) => MemberDoc[]]> = [
  ["Constructors", (t) => t.constructors],
  ["Properties", (t) => t.properties],
  ["Methods", (t) => t.methods],
  ["Events", (t) => t.events],
  ["Fields", (t) => t.fields],
];

function memberColumns(theme: PdfTheme): TableColumnSpec[] {
  return [
    { header: "Signature", widthRatio: 0.45, font: theme.fontMono },
    { header: "Modifiers", widthRatio: 0.17 },
    { header: "Summary", widthRatio: 0.38 },
  ];
}

function overviewPairs(type: TypeDoc): Array<[string, string]> {
  const pairs: Array<[string, string]> = [
    ["Kind", type.kind],
    ["Namespace", type.namespace],
    ["Modifiers", type.modifiers],
    ["Attributes", type.attributes.join(", ")],
    ["Base types", type.baseTypes.join(", ")],
  ];
  return pairs.filter(([, value]) => value.trim() !== "");
}

interface SectionState {
  writer: PageWriter;
  toc: TocConfig;
  entries: TocEntry[];
  outline: Outline;
}

function renderType(state: SectionState, type: TypeDoc, level: number, parent?: OutlineNode) {
  const { writer } = state;
  const title = sectionTitle(type);
  writer.ctx.sectionTitle = displayName(type);

  const anchor = writer.heading(Math.min(level, 3), title);
  state.entries.push({
    ...tocFields(type, state.toc),
    level,
    pageNumber: anchor.pageNumber,
    page: anchor.page,
    y: anchor.y,
  });
  const node = state.outline.add(title, anchor, parent);

  const overview = overviewPairs(type);
  if (overview.length) writer.definitionList("Overview", overview);
  if (type.filePath.trim()) writer.bulletLine("Source", type.filePath);
  if (type.summary.trim()) {
    writer.subheading("Description");
    writer.paragraph(type.summary);
  }

  const columns = memberColumns(writer.theme);
  for (const [label, pick] of MEMBER_GROUPS) {
    const members = pick(type);
    if (members.length === 0) continue;
    writer.subheading(`${label} (${members.length})`);
    writer.table(
      columns,
      members.map((m) => [m.signature, m.modifiers, m.summary])
    );
  }

  for (const nested of type.nestedTypes) {
    renderType(state, nested, level + 1, node);
  }
}

/**
 * Lays out one type (and its nested types) into a new document: reserved
 * TOC pages first, then one section per type, then the TOC drawn onto the
 * reserved pages with links to every section.
 */
export async function layoutDocument(root: TypeDoc, options: RenderOptions = {}): Promise<RenderedDocument> {
  const tocConfig = options.toc ?? DEFAULT_CONFIG.toc;
  const doc = await PDFDocument.create({ updateMetadata: false });
  const theme = await createTheme(doc, options.theme ?? DEFAULT_CONFIG.theme);
  const ctx = new RenderContext(doc, theme);

  const tocPages: PDFPage[] = [ctx.addPage()];
  const writer = new PageWriter(
    ctx,
    tocPages[0],
    { drawHeaderFooter: false },
    {
      strict: options.strict ?? false,
      headerTitle: options.headerTitle,
      onViolation: options.onViolation,
      onDraw: options.onDraw,
    }
  );

  const labels = Array.from(flattenNested(root), (t) => tocLabel(tocFields(t, tocConfig)));
  const tocPageCount = writer.planTocPages(TOC_TITLE, labels, {
    wrap: tocConfig.wrap,
    hangingIndent: tocConfig.hangingIndent,
  });
  while (tocPages.length < tocPageCount) tocPages.push(ctx.addPage());

  // Content pass
  const state: SectionState = { writer, toc: tocConfig, entries: [], outline: new Outline() };
  ctx.sectionTitle = displayName(root);
  writer.bindPage(ctx.addPage());
  renderType(state, root, 1);

  // TOC pass, onto the reserved pages only
  let nextTocPage = 1;
  writer.bindPage(tocPages[0], {
    drawHeaderFooter: false,
    nextPage: () => {
      if (nextTocPage >= tocPages.length) {
        throw new LayoutError(`Table of contents needs more than the ${tocPages.length} reserved page(s)`);
      }
      return tocPages[nextTocPage++];
    },
  });
  drawToc(writer, doc, state.entries, tocConfig);

  state.outline.attach(doc);
  doc.setTitle(`${theme.title}: ${displayName(root)}`);

  return {
    doc,
    toc: state.entries,
    pageCount: ctx.pageCount,
    tocPageCount,
    violations: writer.getViolations(),
  };
}

export async function renderDocument(root: TypeDoc, options: RenderOptions = {}): Promise<Uint8Array> {
  const { doc } = await layoutDocument(root, options);
  return doc.save();
}

/** Renders `root` and writes the PDF to `path`; returns the absolute path. */
export async function renderToFile(root: TypeDoc, path: string, options: RenderOptions = {}): Promise<string> {
  const bytes = await renderDocument(root, options);
  const full = saveDocument(bytes, path);
  success("save", `${displayName(root)} → ${full}`);
  return full;
}
