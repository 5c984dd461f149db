import { readFile } from 'node:fs/promises';

import { err, ok, type Result } from 'neverthrow';

/**
 * Read and parse a JSON file.
 */
export async function readJsonFile(filePath: string): Promise<Result<unknown, Error>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new Error(`Unable to read ${filePath}: ${reason}`));
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new Error(`${filePath} is not valid JSON: ${reason}`));
  }
}
