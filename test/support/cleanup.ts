import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

type CleanupTask = () => Promise<void> | void;

const cleanupTasks: CleanupTask[] = [];

export function addCleanupTask(task: CleanupTask): void {
  cleanupTasks.push(task);
}

/**
 * Run and forget every registered task; failures are reported, not thrown
 */
export async function runCleanupTasks(): Promise<void> {
  const tasks = cleanupTasks.splice(0, cleanupTasks.length);
  const results = await Promise.allSettled(tasks.map(async task => task()));
  for (const result of results) {
    if (result.status === 'rejected') {
      console.warn('Cleanup task failed:', result.reason);
    }
  }
}

/**
 * Fresh temporary directory, removed after the current test
 */
export async function createTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  addCleanupTask(() => fs.rm(dir, { recursive: true, force: true }));
  return dir;
}
