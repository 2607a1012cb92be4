import fs from "fs";
import path from "path";
import { errorMessage } from "../errors";

export type JsonRead = { found: false } | { found: true; value: unknown } | { found: true; error: string };

function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function writeTextAtomic(file: string, text: string): void {
  ensureDir(path.dirname(file));
  const temp = path.join(path.dirname(file), `.${path.basename(file)}.${process.pid}.tmp`);
  fs.writeFileSync(temp, text, "utf-8");
  fs.renameSync(temp, file);
}

export function writeJsonAtomic(file: string, value: unknown): void {
  writeTextAtomic(file, `${JSON.stringify(value, null, 2)}\n`);
}

export function readJsonFile(file: string): JsonRead {
  if (!fs.existsSync(file)) {
    return { found: false };
  }
  try {
    const raw = fs.readFileSync(file, "utf-8");
    const value: unknown = JSON.parse(raw);
    return { found: true, value };
  } catch (error) {
    return { found: true, error: errorMessage(error) };
  }
}

export function removeFile(file: string): void {
  fs.rmSync(file, { force: true });
}
