/**
 * Dataset file loading for CLI commands. The engine itself never reads
 * from disk.
 *
 * @module cli/lib/files
 */

import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { InputValidationError } from '../../core/errors.js';

/**
 * Read and parse a JSON dataset
 *
 * @throws {InputValidationError} If the file cannot be read or is not JSON
 */
export async function readDatasetFile(
  filePath: string,
  dataset: 'survey' | 'engineering'
): Promise<unknown> {
  const absolutePath = resolve(filePath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new InputValidationError(dataset, [
      { path: absolutePath, message: `Cannot read file: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InputValidationError(dataset, [
      { path: absolutePath, message: `Not valid JSON: ${error instanceof Error ? error.message : String(error)}` },
    ]);
  }
}

/**
 * Write command output to a file, or print it when no path is given
 */
export async function emitOutput(output: string, filePath: string | undefined): Promise<void> {
  if (filePath) {
    await writeFile(resolve(filePath), output.endsWith('\n') ? output : `${output}\n`, 'utf-8');
    return;
  }
  console.log(output);
}
