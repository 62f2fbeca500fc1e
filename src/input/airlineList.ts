import { promises as fs } from 'node:fs';
import { isNotFoundError } from '../utils/errors.js';

/** One airline per line; blank lines are skipped, order and duplicates are kept. */
export function parseAirlineList(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function readAirlineList(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new Error(`Airline list not found at ${filePath}`);
    }
    throw error;
  }

  return parseAirlineList(raw);
}
