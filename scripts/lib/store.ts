import { dirname, resolve } from "path";
import { mkdirSync, readFileSync, writeFileSync } from "fs";

export function readJson(path: string): unknown {
  const text = readFileSync(resolve(path), "utf-8");
  return JSON.parse(text);
}

/** Writes `bytes` to `path`, creating parent directories as needed. */
export function saveDocument(bytes: Uint8Array, path: string): string {
  const full = resolve(path);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, bytes);
  return full;
}
