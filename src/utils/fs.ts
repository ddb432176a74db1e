/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir, readFile, writeFile } from "fs/promises";
import { constants } from "node:fs";
import { dirname } from "node:path";
import { InputNotFoundError } from "./errors";

/**
 * Check if a regular path is reachable
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a UTF-8 input file, failing with InputNotFoundError when it is absent
 */
export async function readInputFile(path: string): Promise<string> {
  if (!(await fileExists(path))) {
    throw new InputNotFoundError(path);
  }
  return readFile(path, "utf-8");
}

/**
 * Write a UTF-8 output file in one call, creating parent directories
 */
export async function writeOutputFile(
  path: string,
  content: string,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
}
