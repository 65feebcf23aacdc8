import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { documents } from './documents.js';

describe('documents command', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'wetlands-cli-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('lists loaded documents with page and chunk counts', async () => {
    await writeFile(join(dir, 'bogs.txt'), 'Bogs are acidic peatlands fed by rain.');

    await documents({ docs: dir });

    expect(console.log).toHaveBeenCalledWith('  📄 bogs.txt');
    expect(console.log).toHaveBeenCalledWith('     1 pages, 1 chunks (text)');
    expect(console.log).toHaveBeenCalledWith('\n  1 documents, 1 chunks\n');
  });

  it('says so when the folder is empty', async () => {
    await documents({ docs: dir });

    expect(console.log).toHaveBeenCalledWith('  No documents loaded. Add PDF, text or Markdown files and try again.\n');
  });
});
