import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { LinkWriter } from '../../../src/infrastructure/output/LinkWriter';

describe('LinkWriter', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvester-links-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should write one link per line, creating the directory', async () => {
    const file = path.join(tmpDir, 'nested', 'links.txt');

    await LinkWriter.write(['https://cdn.example.com/a.mp4', 'https://cdn.example.com/b.m3u8'], file);

    expect(fs.readFileSync(file, 'utf-8')).toBe('https://cdn.example.com/a.mp4\nhttps://cdn.example.com/b.m3u8\n');
  });

  it('should write an empty file for no links', async () => {
    const file = path.join(tmpDir, 'links.txt');

    await LinkWriter.write([], file);

    expect(fs.readFileSync(file, 'utf-8')).toBe('');
  });
});
