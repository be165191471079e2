import type { PDFDocument, PDFPage } from "pdf-lib";
import type { PdfTheme } from "./theme";

/** Shared state of one document render. */
export class RenderContext {
  /** Title shown in the page header; the section currently being rendered. */
  sectionTitle?: string;

  constructor(
    readonly doc: PDFDocument,
    readonly theme: PdfTheme
  ) {}

  /** Appends a page of the theme's size. */
  addPage(): PDFPage {
    return this.doc.addPage(this.theme.pageSize);
  }

  get pageCount(): number {
    return this.doc.getPageCount();
  }

  /** 1-based ordinal of `page`, or 0 if it does not belong to this document. */
  pageNumberOf(page: PDFPage): number {
    return this.doc.getPages().indexOf(page) + 1;
  }
}
