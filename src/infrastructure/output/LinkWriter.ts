import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Writes harvested links to a text file, one per line.
 */
export class LinkWriter {
  static async write(links: readonly string[], filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const body = links.map(link => `${link}\n`).join('');
    await fs.writeFile(filePath, body, 'utf-8');
  }
}
