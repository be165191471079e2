import { PDFHexString, PDFName, PDFNumber, type PDFDocument, type PDFPage, type PDFRef } from "pdf-lib";
import type { Anchor, Rect } from "./page-writer";

/**
 * Adds a clickable area on `fromPage` that jumps to `targetY` (top-down) on
 * `toPage`. `rect` is in top-down coordinates as well.
 */
export function addGoToLink(
  doc: PDFDocument,
  fromPage: PDFPage,
  rect: Rect,
  toPage: PDFPage,
  targetY: number
): PDFRef {
  const height = fromPage.getHeight();
  const llx = rect.x;
  const urx = rect.x + rect.width;
  const ury = height - rect.y;
  const lly = Math.max(0, height - rect.y - rect.height);

  const annot = doc.context.obj({
    Type: "Annot",
    Subtype: "Link",
    Rect: [llx, lly, urx, ury],
    Border: [0, 0, 0],
    Dest: [toPage.ref, "XYZ", null, toPage.getHeight() - targetY, null],
  });
  const ref = doc.context.register(annot);
  fromPage.node.addAnnot(ref);
  return ref;
}

export interface OutlineNode {
  title: string;
  anchor: Anchor;
  children: OutlineNode[];
}

/** Bookmark tree, written into the document catalog once layout is done. */
export class Outline {
  private readonly roots: OutlineNode[] = [];

  add(title: string, anchor: Anchor, parent?: OutlineNode): OutlineNode {
    const node: OutlineNode = { title, anchor, children: [] };
    (parent ? parent.children : this.roots).push(node);
    return node;
  }

  attach(doc: PDFDocument): PDFRef | undefined {
    if (this.roots.length === 0) return undefined;
    const context = doc.context;
    const rootRef = context.nextRef();
    const level = this.writeLevel(doc, this.roots, rootRef);

    context.assign(
      rootRef,
      context.obj({ Type: "Outlines", First: level.first, Last: level.last, Count: level.count })
    );
    doc.catalog.set(PDFName.of("Outlines"), rootRef);
    doc.catalog.set(PDFName.of("PageMode"), PDFName.of("UseOutlines"));
    return rootRef;
  }

  // Items are written open, so Count is the number of visible descendants.
  private writeLevel(
    doc: PDFDocument,
    nodes: readonly OutlineNode[],
    parentRef: PDFRef
  ): { first: PDFRef; last: PDFRef; count: number } {
    const context = doc.context;
    const refs = nodes.map(() => context.nextRef());
    let count = nodes.length;

    nodes.forEach((node, i) => {
      const { page, y } = node.anchor;
      const dict = context.obj({
        Title: PDFHexString.fromText(node.title),
        Parent: parentRef,
        Dest: [page.ref, "XYZ", null, page.getHeight() - y, null],
      });
      if (i > 0) dict.set(PDFName.of("Prev"), refs[i - 1]);
      if (i < nodes.length - 1) dict.set(PDFName.of("Next"), refs[i + 1]);
      if (node.children.length > 0) {
        const children = this.writeLevel(doc, node.children, refs[i]);
        dict.set(PDFName.of("First"), children.first);
        dict.set(PDFName.of("Last"), children.last);
        dict.set(PDFName.of("Count"), PDFNumber.of(children.count));
        count += children.count;
      }
      context.assign(refs[i], dict);
    });

    return { first: refs[0], last: refs[refs.length - 1], count };
  }
}
