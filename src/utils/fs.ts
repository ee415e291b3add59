/**
 * File System Utilities
 * Source discovery for analysis front ends and file output for renderers
 */

import * as fs from "node:fs";
import * as fsPromises from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";

/**
 * Options for file discovery
 */
export interface GlobOptions {
  patterns: string[];
  ignore?: string[];
  cwd?: string;
  absolute?: boolean;
  onlyFiles?: boolean;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns, sorted for stable output
 *
 * @param options - Glob options
 * @returns Array of matching file paths
 */
export async function findFiles(options: GlobOptions): Promise<string[]> {
  const {
    patterns,
    ignore = [],
    cwd = process.cwd(),
    absolute = true,
    onlyFiles = true,
  } = options;

  const files = await fg(patterns, {
    cwd,
    absolute,
    onlyFiles,
    ignore: [
      // Default ignores
      "**/node_modules/**",
      "**/.git/**",
      "**/dist/**",
      ...ignore,
    ],
    dot: false,
  });
  return files.sort();
}

/**
 * Check if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check that a path exists and is a directory
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    return (await fsPromises.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Write content to a file, creating parent directories if needed
 */
export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.writeFile(filePath, content);
}

/**
 * Copy a file, creating parent directories of the target if needed
 */
export async function copyFile(from: string, to: string): Promise<void> {
  await ensureDirectory(path.dirname(to));
  await fsPromises.copyFile(from, to);
}
