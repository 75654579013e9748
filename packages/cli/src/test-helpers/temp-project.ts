import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';

export interface TempProject {
  readonly root: string;
  write(relativePath: string, contents: string): Promise<void>;
  read(relativePath: string): Promise<string>;
  cleanup(): Promise<void>;
}

export const json = (value: unknown) => `${JSON.stringify(value, null, 2)}\n`;

export async function createTempProject(files: Record<string, string> = {}): Promise<TempProject> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'glot-cli-'));

  const write = async (relativePath: string, contents: string) => {
    const target = path.join(root, relativePath);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, contents, 'utf8');
  };

  for (const [relativePath, contents] of Object.entries(files)) {
    await write(relativePath, contents);
  }

  return {
    root,
    write,
    read: (relativePath) => fs.readFile(path.join(root, relativePath), 'utf8'),
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export interface ConsoleCapture {
  /** Every `console.log` call, one entry per call. */
  readonly stdout: string[];
  /** Every `console.error` call. */
  readonly stderr: string[];
  restore(): void;
}

export function captureConsole(): ConsoleCapture {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const log = vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    stdout.push(args.map(String).join(' '));
  });
  const error = vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(' '));
  });
  return {
    stdout,
    stderr,
    restore: () => {
      log.mockRestore();
      error.mockRestore();
    },
  };
}
