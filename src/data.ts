import { readFileSync, mkdirSync, existsSync, appendFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Nearest ancestor holding package.json; src/ under tsx, dist/src/ after a build. */
function findRootDir(start: string): string {
  let dir = start;
  while (!existsSync(join(dir, "package.json"))) {
    const parent = dirname(dir);
    if (parent === dir) return join(start, "..");
    dir = parent;
  }
  return dir;
}

export const ROOT_DIR = findRootDir(__dirname);
export const DATA_DIR = join(ROOT_DIR, "data");
export const RUNS_FILE = join(DATA_DIR, "runs.jsonl");

export function readJsonl<T>(filePath: string): T[] {
  if (!existsSync(filePath)) return [];
  const content = readFileSync(filePath, "utf-8").trim();
  if (!content) return [];
  const results: T[] = [];
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      results.push(JSON.parse(trimmed) as T);
    } catch {
      process.stderr.write(`Warning: skipping malformed JSONL line in ${filePath}\n`);
    }
  }
  return results;
}

export function appendJsonl(filePath: string, record: unknown): void {
  mkdirSync(dirname(filePath), { recursive: true });
  appendFileSync(filePath, JSON.stringify(record) + "\n", "utf-8");
}
