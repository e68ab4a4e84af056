import { readFileSync } from 'node:fs';
import { AdvisorError } from './errors.js';

/** Read a JSON file, reporting unreadable or unparseable content as a malformed source. */
export function readJsonFile(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new AdvisorError('MALFORMED_SOURCE', `Cannot read ${filePath}: ${detail}`, { sourcePath: filePath });
  }

  try {
    const raw: unknown = JSON.parse(content);
    return raw;
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new AdvisorError('MALFORMED_SOURCE', `Invalid JSON in ${filePath}: ${detail}`, { sourcePath: filePath });
  }
}
