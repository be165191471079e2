import { join } from "path";
import { displayName, type TypeDoc } from "./model";

const GLOBAL_NAMESPACE_DIR = "_global";
const UNSAFE_FILE_CHARS = /[<>:"/\\|?*\s]/g;

export function safeFileName(name: string): string {
  return name.trim().replace(UNSAFE_FILE_CHARS, "_");
}

export function namespaceDir(outDir: string, namespace: string): string {
  const ns = namespace.trim() === "" ? GLOBAL_NAMESPACE_DIR : safeFileName(namespace);
  return join(outDir, ns);
}

/** `<outDir>/<namespace>/<displayName>.pdf` */
export function pdfOutputPath(outDir: string, type: TypeDoc): string {
  return join(namespaceDir(outDir, type.namespace), `${safeFileName(displayName(type))}.pdf`);
}
