import {
  clip,
  endPath,
  popGraphicsState,
  pushGraphicsState,
  rectangle,
  rgb,
  type PDFPage,
  type RGB,
} from "pdf-lib";
import type { RenderContext } from "./render-context";
import { CELL_PADDING, columnOffsets, columnWidths, type TableColumnSpec } from "./table";
import { encodable, lineHeight, measureWith, type PdfTheme, type ThemeFont } from "./theme";
import { ellipsize, withEllipsis, wrapText } from "./wrap";

// Bounds violation tracking
export class BoundsError extends Error {
  constructor(message: string, public details: BoundsViolation) {
    super(message);
    this.name = "BoundsError";
  }
}

export interface BoundsViolation {
  type: "horizontal_overflow" | "vertical_overflow" | "negative_position";
  context: string;
  page: number;
  expected: { min: number; max: number };
  actual: number;
  content?: string;
}

export interface DrawOp {
  kind: "text" | "rule" | "header" | "footer";
  /** 1-based page number */
  page: number;
  x: number;
  /** Top of the drawn box, measured from the top edge of the page. */
  y: number;
  width: number;
  height: number;
  text?: string;
  /** Table or definition-list row the op belongs to. */
  row?: number;
}

/** Where something was drawn: page and top-down y offset. */
export interface Anchor {
  page: PDFPage;
  pageNumber: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TocLinePlacement extends Anchor {
  rect: Rect;
}

export interface PageWriterOptions {
  /** Header text override; defaults to the current section, then the theme title. */
  headerTitle?: string;
  /** If true, throw on bounds violations (default: true) */
  strict?: boolean;
  onViolation?: (v: BoundsViolation) => void;
  onDraw?: (op: DrawOp) => void;
}

export interface PageBinding {
  /** Draw page header and footer on this page and on pages added after it (default: true). */
  drawHeaderFooter?: boolean;
  /** Source of overflow pages (default: append to the document). */
  nextPage?: () => PDFPage;
}

const HEADER_GAP = 6;
const FOOTER_GAP = 6;
const KEY_COLUMN_GAP = 6;
const TOC_LINE_GAP = 2;
const TOC_NUMBER_PLACEHOLDER = "0000";
const TOC_NUMBER_PADDING = 6;
const EPSILON = 0.001;

const BLACK = rgb(0, 0, 0);
const SEPARATOR_GRAY = rgb(0.75, 0.75, 0.75);

interface RowCell {
  text: string;
  font: ThemeFont;
  x: number;
  width: number;
  padding: number;
}

interface RowOptions {
  /** Shared line height for every cell; per-font line height when unset. */
  lineHeight?: number;
  /** Space that must remain below the row on the same page. */
  after: number;
  context: string;
  clip: boolean;
  separators?: number[];
}

interface TocLineLayout {
  font: ThemeFont;
  lh: number;
  lines: string[];
  dots: string;
  indent: number;
  height: number;
  block: number;
}

/**
 * Writes content top to bottom onto the pages of one document. Every write
 * checks the remaining space first and moves to a new page when it would
 * cross the bottom margin.
 */
export class PageWriter {
  /** Header text override for pages started from now on. */
  headerTitle?: string;

  readonly left: number;
  readonly right: number;
  readonly top: number;
  readonly bottom: number;
  readonly contentWidth: number;

  private _page: PDFPage;
  private _pageNumber: number;
  private _y: number;
  private drawHeaderFooter: boolean;
  private nextPage: () => PDFPage;
  // Nothing drawn in the content area of the current page yet.
  private fresh = true;
  private rowCounter = 0;
  private strict: boolean;
  private violations: BoundsViolation[] = [];

  constructor(
    readonly ctx: RenderContext,
    page: PDFPage,
    binding: PageBinding = {},
    private readonly options: PageWriterOptions = {}
  ) {
    const theme = ctx.theme;
    const [width, height] = theme.pageSize;
    this.left = theme.marginLeft;
    this.right = width - theme.marginRight;
    this.top = theme.marginTop;
    this.bottom = height - theme.marginBottom;
    this.contentWidth = this.right - this.left;
    this.headerTitle = options.headerTitle;
    this.strict = options.strict !== false; // default true

    this._page = page;
    this._pageNumber = ctx.pageNumberOf(page);
    this._y = this.top;
    this.drawHeaderFooter = binding.drawHeaderFooter ?? true;
    this.nextPage = binding.nextPage ?? (() => ctx.addPage());
    this.startPage();
  }

  get theme(): PdfTheme {
    return this.ctx.theme;
  }

  get page(): PDFPage {
    return this._page;
  }

  get pageNumber(): number {
    return this._pageNumber;
  }

  get y(): number {
    return this._y;
  }

  /** First y available for content on the current page. */
  get contentTop(): number {
    return this.top + (this.drawHeaderFooter ? HEADER_GAP : 0);
  }

  get usableHeight(): number {
    return this.bottom - this.contentTop;
  }

  getViolations(): BoundsViolation[] {
    return this.violations;
  }

  /** Moves the writer to `page`, resetting the cursor to its top. */
  bindPage(page: PDFPage, binding: PageBinding = {}) {
    this._page = page;
    this._pageNumber = this.ctx.pageNumberOf(page);
    this.drawHeaderFooter = binding.drawHeaderFooter ?? true;
    this.nextPage = binding.nextPage ?? (() => this.ctx.addPage());
    this.startPage();
  }

  spacer(pt: number) {
    this._y = Math.min(this._y + pt, this.bottom);
  }

  /**
   * Starts a new page unless `height` fits below the cursor. Returns true
   * when a page was added. An untouched page is never replaced: the cursor
   * goes back to its top instead.
   */
  ensureSpace(height: number): boolean {
    if (this._y + height <= this.bottom + EPSILON) return false;
    if (this.fresh) {
      this._y = this.contentTop;
      return false;
    }
    this._page = this.nextPage();
    this._pageNumber = this.ctx.pageNumberOf(this._page);
    this.startPage();
    return true;
  }

  heading(level: number, text: string): Anchor {
    const layout = this.headingLayout(level, text, this.usableHeight);
    this.ensureSpace(layout.needed);
    const anchor: Anchor = { page: this._page, pageNumber: this._pageNumber, y: this._y };
    this.drawLines(layout.lines, layout.font, this.left, this._y, layout.color, `H${level}`);
    this._y += layout.advance;
    this.hairline();
    this.spacer(layout.after);
    return anchor;
  }

  subheading(text: string) {
    const font = this.theme.fontH4;
    const lh = lineHeight(font);
    const maxLines = Math.max(1, Math.floor(this.usableHeight / lh));
    const lines = this.fitLines(wrapText(text, measureWith(font), this.contentWidth), maxLines, font, this.contentWidth);
    this.ensureSpace(lines.length * lh);
    this.drawLines(lines, font, this.left, this._y, BLACK, "subheading");
    this._y += lines.length * lh;
    this.hairline(0.25);
    this.spacer(4);
  }

  definitionList(title: string, pairs: Iterable<readonly [string, string]>) {
    const items = Array.from(pairs);
    this.subheading(title);

    const keyFont = this.theme.fontNormalBold;
    const valFont = this.theme.fontNormal;
    const measureKey = measureWith(keyFont);
    const widest = items.reduce((max, [key]) => Math.max(max, measureKey(key)), 0);
    const keyWidth = Math.min(Math.max(widest + KEY_COLUMN_GAP, this.contentWidth * 0.12), this.contentWidth * 0.35);
    const valX = this.left + keyWidth + KEY_COLUMN_GAP;
    const valWidth = this.contentWidth - keyWidth - KEY_COLUMN_GAP;
    const rowLh = Math.max(lineHeight(keyFont), lineHeight(valFont));

    for (const [key, value] of items) {
      this.drawRow(
        [
          { text: key, font: keyFont, x: this.left, width: keyWidth, padding: 0 },
          { text: value, font: valFont, x: valX, width: valWidth, padding: 0 },
        ],
        { lineHeight: rowLh, after: 2, context: "definition", clip: false }
      );
      this.spacer(2);
    }
    this.spacer(4);
  }

  bulletLine(title: string, value: string) {
    const font = this.theme.fontNormal;
    this.flowText(wrapText(`${title}: ${value}`, measureWith(font), this.contentWidth), font, "bullet");
    this.spacer(4);
  }

  paragraph(text: string, font: ThemeFont = this.theme.fontNormal) {
    this.flowText(wrapText(text, measureWith(font), this.contentWidth), font, "paragraph");
    this.spacer(this.theme.paragraphSpacing);
  }

  table(columns: readonly TableColumnSpec[], rows: Iterable<readonly string[]>) {
    if (columns.length === 0) return;
    const gap = this.theme.tableColGap;
    const widths = columnWidths(
      columns.map((c) => c.widthRatio),
      this.contentWidth - gap * (columns.length - 1)
    );
    const xs = columnOffsets(this.left, widths, gap);
    const separators = xs.slice(1).map((x) => x - gap / 2);

    this.drawRow(
      columns.map((c, i) => ({
        text: c.header,
        font: this.theme.fontSmallBold,
        x: xs[i],
        width: widths[i],
        padding: CELL_PADDING,
      })),
      { after: 0, context: "table header", clip: true, separators }
    );
    this.hairline(0.5);
    this.spacer(4);

    for (const row of rows) {
      this.drawRow(
        columns.map((c, i) => ({
          text: row[i] ?? "",
          font: c.font ?? this.theme.fontNormal,
          x: xs[i],
          width: widths[i],
          padding: CELL_PADDING,
        })),
        { after: 4, context: "table cell", clip: true, separators }
      );
      this.spacer(4);
      this.hairline(0.1);
      this.spacer(2);
    }
  }

  /** Single-line TOC entry: label shortened to fit, dot leaders, page number. */
  tocLine(label: string, pageNumber: number): TocLinePlacement {
    return this.drawTocBlock(this.tocLineLayout(label, false, 0, this.usableHeight), pageNumber);
  }

  /**
   * Wrapped TOC entry. Dot leaders and the page number go on the first line;
   * continuation lines are indented by `hangingIndent`.
   */
  tocLineWrapped(label: string, pageNumber: number, hangingIndent = 10): TocLinePlacement {
    return this.drawTocBlock(this.tocLineLayout(label, true, hangingIndent, this.usableHeight), pageNumber);
  }

  /**
   * Number of pages a TOC with `labels` takes on pages without header and
   * footer. Page numbers do not change the layout since their column has a
   * fixed width.
   */
  planTocPages(title: string, labels: readonly string[], opts: { wrap: boolean; hangingIndent: number }): number {
    const usable = this.bottom - this.top;
    let pages = 1;
    let y = this.top;

    const heading = this.headingLayout(1, title, usable);
    y = Math.min(y + heading.advance + heading.after, this.bottom);

    for (const label of labels) {
      const line = this.tocLineLayout(label, opts.wrap, opts.hangingIndent, usable);
      if (y + line.block > this.bottom + EPSILON) {
        pages++;
        y = this.top;
      }
      y += line.block;
    }
    return pages;
  }

  hairline(alpha = 0.35) {
    this.checkVertical(this._y, 0, "rule");
    const y = this.pdfY(this._y);
    this._page.drawLine({
      start: { x: this.left, y },
      end: { x: this.right, y },
      thickness: 0.5,
      color: BLACK,
      opacity: alpha,
    });
    this.fresh = false;
    this.options.onDraw?.({ kind: "rule", page: this._pageNumber, x: this.left, y: this._y, width: this.contentWidth, height: 0 });
  }

  private startPage() {
    this._y = this.top;
    this.fresh = true;
    if (this.drawHeaderFooter) {
      this.drawHeaderFooterArea();
      this._y += HEADER_GAP;
    }
  }

  private drawHeaderFooterArea() {
    const font = this.theme.fontSmall;
    const measure = measureWith(font);
    const title = this.headerTitle ?? this.ctx.sectionTitle ?? this.theme.title;
    this.drawChrome("header", ellipsize(title, measure, this.contentWidth), this.left, this.theme.pageHeaderTop, font);

    const pn = String(this._pageNumber);
    this.drawChrome("footer", pn, this.right - measure(pn), this.bottom + FOOTER_GAP, font);
  }

  private drawChrome(kind: "header" | "footer", raw: string, x: number, y: number, font: ThemeFont) {
    const text = encodable(font, raw);
    this._page.drawText(text, {
      x,
      y: this.pdfY(y) - font.size,
      size: font.size,
      font: font.face,
      color: this.theme.colorMuted,
    });
    this.options.onDraw?.({
      kind,
      page: this._pageNumber,
      x,
      y,
      width: measureWith(font)(text),
      height: lineHeight(font),
      text,
    });
  }

  private headingLayout(level: number, text: string, usable: number) {
    const style =
      level <= 1
        ? { font: this.theme.fontH1, color: this.theme.colorPrimary, spacing: 10, after: 8 }
        : level === 2
          ? { font: this.theme.fontH2, color: this.theme.colorPrimary, spacing: 8, after: 6 }
          : { font: this.theme.fontH3, color: this.theme.colorDark, spacing: 6, after: 6 };
    const lh = lineHeight(style.font);
    const factor = this.theme.lineSpacingHeading;
    const maxLines = Math.max(1, Math.floor((usable - style.spacing) / (lh * factor)));
    const lines = this.fitLines(
      wrapText(text, measureWith(style.font), this.contentWidth),
      maxLines,
      style.font,
      this.contentWidth
    );
    return {
      ...style,
      lines,
      needed: lines.length * lh * factor + style.spacing,
      advance: lines.length * lh + style.spacing,
    };
  }

  private tocLineLayout(label: string, wrap: boolean, hangingIndent: number, usable: number): TocLineLayout {
    const font = this.theme.fontNormal;
    const measure = measureWith(font);
    const lh = lineHeight(font);
    const avail = this.contentWidth - measure(TOC_NUMBER_PLACEHOLDER) - TOC_NUMBER_PADDING;
    const indent = wrap ? Math.max(0, Math.min(hangingIndent, avail / 2)) : 0;

    let lines: string[];
    if (wrap) {
      // The first line is always a prefix of the normalized label.
      const normalized = label.replace(/\s+/g, " ").trim();
      const first = wrapText(normalized, measure, avail)[0];
      const rest = normalized.slice(first.length).trimStart();
      lines = rest ? [first, ...wrapText(rest, measure, avail - indent)] : [first];
    } else {
      lines = [ellipsize(label.replace(/\s+/g, " ").trim(), measure, avail)];
    }
    const maxLines = Math.max(1, Math.floor((usable - TOC_LINE_GAP) / lh));
    lines = this.fitLines(lines, maxLines, font, maxLines === 1 ? avail : avail - indent);

    const dotWidth = Math.max(1, measure("."));
    const remaining = Math.max(0, avail - measure(lines[0]));
    const dotCount = Math.floor(Math.max(0, remaining - 1) / dotWidth);

    return {
      font,
      lh,
      lines,
      dots: ".".repeat(dotCount),
      indent,
      height: lines.length * lh,
      block: lines.length * lh + TOC_LINE_GAP,
    };
  }

  private drawTocBlock(layout: TocLineLayout, pageNumber: number): TocLinePlacement {
    const { font, lh, lines } = layout;
    this.ensureSpace(layout.block);
    const top = this._y;
    const anchor: Anchor = { page: this._page, pageNumber: this._pageNumber, y: top };

    this.drawText(lines[0] + layout.dots, font, this.left, top, BLACK, "toc");
    const number = String(pageNumber);
    const numberWidth = measureWith(font)(number);
    this.drawText(number, font, this.right - numberWidth, top, BLACK, "toc page number");
    for (let i = 1; i < lines.length; i++) {
      this.drawText(lines[i], font, this.left + layout.indent, top + i * lh, BLACK, "toc");
    }

    this._y = top + layout.block;
    return { ...anchor, rect: { x: this.left, y: top, width: this.contentWidth, height: layout.height } };
  }

  private flowText(lines: string[], font: ThemeFont, context: string) {
    const lh = lineHeight(font);
    const total = lines.length * lh;
    if (total <= this.usableHeight) {
      this.ensureSpace(total);
      this.drawLines(lines, font, this.left, this._y, BLACK, context);
      this._y += total;
      return;
    }
    // Taller than a page: flow line by line.
    for (const line of lines) {
      this.ensureSpace(lh);
      this.drawText(line, font, this.left, this._y, BLACK, context);
      this._y += lh;
    }
  }

  /**
   * Draws one row of side-by-side cells. The whole row goes on one page;
   * cells taller than a page keep the lines that fit and end in an ellipsis.
   */
  private drawRow(cells: RowCell[], opts: RowOptions) {
    if (cells.length === 0) return;
    const room = this.usableHeight - opts.after;
    const laidOut = cells.map((cell) => {
      const lh = opts.lineHeight ?? lineHeight(cell.font);
      const inner = Math.max(1, cell.width - cell.padding * 2);
      const maxLines = Math.max(1, Math.floor(room / lh));
      const lines = this.fitLines(wrapText(cell.text, measureWith(cell.font), inner), maxLines, cell.font, inner);
      return { ...cell, lh, lines };
    });
    const rowHeight = Math.max(...laidOut.map((c) => c.lines.length * c.lh));

    this.ensureSpace(rowHeight + opts.after);
    const row = ++this.rowCounter;
    const top = this._y;

    for (const cell of laidOut) {
      if (opts.clip) this.pushClip(cell.x, top, cell.width, rowHeight);
      this.drawLines(cell.lines, cell.font, cell.x + cell.padding, top, BLACK, opts.context, {
        clipped: opts.clip,
        row,
        lineHeight: cell.lh,
      });
      if (opts.clip) this.popClip();
    }
    for (const x of opts.separators ?? []) {
      this.drawSeparator(x, top, rowHeight);
    }
    this._y = top + rowHeight;
  }

  private drawLines(
    lines: readonly string[],
    font: ThemeFont,
    x: number,
    y: number,
    color: RGB,
    context: string,
    opts: { clipped?: boolean; row?: number; lineHeight?: number } = {}
  ) {
    const lh = opts.lineHeight ?? lineHeight(font);
    lines.forEach((line, i) => this.drawText(line, font, x, y + i * lh, color, context, { ...opts, lineHeight: lh }));
  }

  private drawText(
    raw: string,
    font: ThemeFont,
    x: number,
    y: number,
    color: RGB,
    context: string,
    opts: { clipped?: boolean; row?: number; lineHeight?: number } = {}
  ) {
    if (raw === "") return;
    const text = encodable(font, raw);
    const width = measureWith(font)(text);
    const height = opts.lineHeight ?? lineHeight(font);
    if (!opts.clipped) this.checkHorizontal(x, width, context, text);
    this.checkVertical(y, height, context, text);

    // Baseline one font size below the top of the line box.
    this._page.drawText(text, { x, y: this.pdfY(y) - font.size, size: font.size, font: font.face, color });
    this.fresh = false;
    this.options.onDraw?.({ kind: "text", page: this._pageNumber, x, y, width, height, text, row: opts.row });
  }

  private drawSeparator(x: number, y: number, height: number) {
    this.checkVertical(y, height, "column separator");
    this._page.drawLine({
      start: { x, y: this.pdfY(y) },
      end: { x, y: this.pdfY(y + height) },
      thickness: 0.5,
      color: SEPARATOR_GRAY,
      dashArray: [1, 2],
    });
  }

  private pushClip(x: number, y: number, width: number, height: number) {
    this._page.pushOperators(
      pushGraphicsState(),
      rectangle(x, this.pdfY(y + height), width, height),
      clip(),
      endPath()
    );
  }

  private popClip() {
    this._page.pushOperators(popGraphicsState());
  }

  private fitLines(lines: string[], maxLines: number, font: ThemeFont, width: number): string[] {
    if (lines.length <= maxLines) return lines;
    const kept = lines.slice(0, maxLines);
    kept[maxLines - 1] = withEllipsis(kept[maxLines - 1], measureWith(font), width);
    return kept;
  }

  private pdfY(y: number): number {
    return this._page.getHeight() - y;
  }

  private recordViolation(v: BoundsViolation) {
    this.violations.push(v);
    if (this.options.onViolation) this.options.onViolation(v);
    if (this.strict) {
      throw new BoundsError(
        `${v.type}: ${v.context} on page ${v.page} (expected ${v.expected.min}-${v.expected.max}, got ${v.actual})`,
        v
      );
    }
  }

  private checkHorizontal(x: number, width: number, context: string, content?: string) {
    if (x < this.left - EPSILON) {
      this.recordViolation({
        type: "horizontal_overflow",
        context: `${context} - left edge before margin`,
        page: this._pageNumber,
        expected: { min: this.left, max: this.right },
        actual: x,
        content,
      });
    }
    if (x + width > this.right + EPSILON) {
      this.recordViolation({
        type: "horizontal_overflow",
        context: `${context} - right edge past margin`,
        page: this._pageNumber,
        expected: { min: this.left, max: this.right },
        actual: x + width,
        content,
      });
    }
  }

  private checkVertical(y: number, height: number, context: string, content?: string) {
    if (y < this.top - EPSILON) {
      this.recordViolation({
        type: "negative_position",
        context,
        page: this._pageNumber,
        expected: { min: this.top, max: this.bottom },
        actual: y,
        content,
      });
    }
    if (y + height > this.bottom + EPSILON) {
      this.recordViolation({
        type: "vertical_overflow",
        context,
        page: this._pageNumber,
        expected: { min: this.top, max: this.bottom },
        actual: y + height,
        content,
      });
    }
  }
}
