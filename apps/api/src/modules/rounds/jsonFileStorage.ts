import { promises as fs } from "node:fs";
import { createHash } from "node:crypto";
import { z } from "zod";

/**
 * JSON storage helpers for the filesystem artifact store.
 * - Writes go through temp file + rename so a crash never leaves half a record.
 * - Reads are parsed with zod so corrupt files fail loudly.
 */

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

function isMissingFile(err: unknown) {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function readJson<T>(filePath: string, schema: z.ZodType<T>): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return schema.parse(JSON.parse(raw));
}

// Like readJson, but a missing file yields undefined instead of throwing.
export async function readJsonIfExists<T>(filePath: string, schema: z.ZodType<T>): Promise<T | undefined> {
  try {
    return await readJson(filePath, schema);
  } catch (err) {
    if (isMissingFile(err)) {
      return undefined;
    }
    throw err;
  }
}

export async function listDirEntries(dirPath: string): Promise<string[]> {
  try {
    return await fs.readdir(dirPath);
  } catch (err) {
    if (isMissingFile(err)) {
      return [];
    }
    throw err;
  }
}

// Temp names are unique per write so concurrent writers never share a temp file.
let tmpCounter = 0;

async function atomicWriteFile(filePath: string, contents: string): Promise<void> {
  tmpCounter += 1;
  const tmpPath = `${filePath}.${process.pid}.${tmpCounter}.tmp`;
  await fs.writeFile(tmpPath, contents, "utf8");

  try {
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    // Windows can fail renaming over an existing file.
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "EEXIST" || code === "EPERM" || code === "EACCES") {
      await fs.rm(filePath, { force: true });
      await fs.rename(tmpPath, filePath);
      return;
    }
    throw err;
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  const json = JSON.stringify(value, null, 2) + "\n";
  await atomicWriteFile(filePath, json);
}

export function sha256Hex(input: string): string {
  return createHash("sha256").update(input, "utf8").digest("hex");
}

// Key-sorted JSON so the same files always hash the same.
export function canonicalJson(files: Record<string, string>): string {
  const sorted = Object.keys(files)
    .sort()
    .map((key) => [key, files[key]] as const);
  return JSON.stringify(sorted);
}
