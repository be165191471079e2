import type { PDFDocument, PDFPage } from "pdf-lib";
import type { TocConfig } from "../config";
import { displayName, type TypeDoc } from "../model";
import { addGoToLink } from "./links";
import type { PageWriter } from "./page-writer";
import { truncate } from "./wrap";

export const TOC_TITLE = "Table of Contents";
const LABEL_SEPARATOR = " — ";

export interface TocFields {
  title: string;
  signature?: string;
  description?: string;
}

/** One rendered section, recorded where its heading was drawn. */
export interface TocEntry extends TocFields {
  level: number;
  pageNumber: number;
  page: PDFPage;
  y: number;
}

/** Section heading of a type, e.g. "class Parser.Token". */
export function sectionTitle(type: TypeDoc): string {
  return [type.kind, displayName(type)].filter(Boolean).join(" ");
}

export function firstSentence(text: string): string {
  const clean = text.replace(/\s+/g, " ").trim();
  const match = /^(.+?[.!?])(?:\s|$)/.exec(clean);
  return match ? match[1] : clean;
}

/** The declared signature, or one assembled from modifiers, kind, name and bases. */
export function compactSignature(type: TypeDoc): string {
  if (type.signature && type.signature.trim() !== "") return type.signature;
  const head = [type.modifiers, type.kind, displayName(type)].filter(Boolean).join(" ");
  return type.baseTypes.length ? `${head} : ${type.baseTypes.join(", ")}` : head;
}

export function tocFields(type: TypeDoc, cfg: TocConfig): TocFields {
  const fields: TocFields = { title: sectionTitle(type) };
  if (cfg.includeSignature) {
    const signature = truncate(compactSignature(type), cfg.maxSignatureChars);
    if (signature) fields.signature = signature;
  }
  if (cfg.includeDescription) {
    const description = truncate(firstSentence(type.summary), cfg.maxDescriptionChars);
    if (description) fields.description = description;
  }
  return fields;
}

export function tocLabel(fields: TocFields): string {
  return [fields.title, fields.signature, fields.description].filter(Boolean).join(LABEL_SEPARATOR);
}

/**
 * Draws the TOC heading and one linked line per entry, in recorded order.
 * The writer must already be bound to the TOC pages.
 */
export function drawToc(writer: PageWriter, doc: PDFDocument, entries: readonly TocEntry[], cfg: TocConfig) {
  writer.heading(1, TOC_TITLE);
  for (const entry of entries) {
    const label = tocLabel(entry);
    const placed = cfg.wrap
      ? writer.tocLineWrapped(label, entry.pageNumber, cfg.hangingIndent)
      : writer.tocLine(label, entry.pageNumber);
    addGoToLink(doc, placed.page, placed.rect, entry.page, entry.y);
  }
}
