import * as fs from 'fs/promises';

/**
 * Trims entries and drops blanks, keeping the original order.
 */
export function cleanEntries(entries: readonly string[]): string[] {
  return entries.map(entry => entry.trim()).filter(entry => entry.length > 0);
}

/**
 * Loads the page URLs to harvest.
 */
export class UrlListLoader {
  /**
   * Reads a text file with one URL per line.
   */
  static async fromFile(filePath: string): Promise<string[]> {
    const content = await fs.readFile(filePath, 'utf-8');
    return cleanEntries(content.split(/\r?\n/));
  }

  /**
   * Splits a comma-separated list.
   */
  static fromList(list: string): string[] {
    return cleanEntries(list.split(','));
  }
}
