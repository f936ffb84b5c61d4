/**
 * File system helpers with path validation.
 *
 * Backup and resource files are named after operator-supplied node names, so
 * every path is validated and resolved before use, and file names joined onto
 * the workspace directory must stay inside it.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return path.resolve(filePath);
}

/**
 * Joins a file name onto a directory, rejecting names that would leave it.
 *
 * @param directory - The containing directory.
 * @param fileName - A bare file name such as `worker-3_bmh.yaml`.
 * @returns The resolved absolute path inside `directory`.
 * @throws {PathValidationError} If the result escapes the directory.
 */
export function resolveWithin(directory: string, fileName: string): string {
  const root = validatePath(directory);
  const resolved = validatePath(path.join(root, fileName));

  if (path.dirname(resolved) !== root) {
    throw new PathValidationError(`File name must not leave ${root}`, fileName);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Checks if a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory and any missing parents after validating the path.
 *
 * @param dirPath - The directory to create.
 * @returns The resolved directory path.
 */
export async function safeMkdirp(dirPath: string): Promise<string> {
  const validatedPath = validatePath(dirPath);
  await fs.mkdir(validatedPath, { recursive: true });
  return validatedPath;
}
