import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

export async function makeTempDir(prefix = 'batch-store-'): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function readText(path: string): Promise<string> {
  return fs.readFile(path, 'utf8');
}
