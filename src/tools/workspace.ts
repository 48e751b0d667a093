import { mkdir, mkdtemp, readFile, rename, rm, stat, writeFile, copyFile } from 'node:fs/promises';
import { tmpdir as systemTmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { WorkspaceIOError } from '../errors.js';
import type { JobSource, PipelineOutput } from '../control-plane/types.js';

export const BASENAME = 'texloop';
const TMP_PREFIX = 'texloop-';

export interface Workspace {
  dir: string;
  basename: string;
  /** False for a caller-supplied directory, which is never removed. */
  owned: boolean;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function artifactPath(ws: Workspace, extension: string): string {
  return join(ws.dir, `${ws.basename}.${extension}`);
}

/**
 * Creates a fresh 0700 directory under the system temp directory, or the
 * caller's persistent one (resolved against the same root) if given.
 */
export async function createWorkspace(
  persistent?: string,
  root: string = systemTmpdir()
): Promise<Workspace> {
  try {
    if (persistent) {
      const dir = resolve(root, persistent);
      await mkdir(dir, { recursive: true, mode: 0o700 });
      return { dir, basename: BASENAME, owned: false };
    }
    const dir = await mkdtemp(join(root, TMP_PREFIX));
    return { dir, basename: BASENAME, owned: true };
  } catch (err) {
    throw new WorkspaceIOError(`failed to create temporary directory: ${reason(err)}`);
  }
}

export async function cleanupWorkspace(ws: Workspace): Promise<void> {
  if (!ws.owned) return;
  await rm(ws.dir, { recursive: true, force: true });
}

export interface LoadedSource {
  text: string;
  sourceDir?: string;
}

export async function loadSource(source: JobSource): Promise<LoadedSource> {
  if ('text' in source) return { text: source.text };
  const path = resolve(source.path);
  try {
    return { text: await readFile(path, 'utf-8'), sourceDir: dirname(path) };
  } catch (err) {
    throw new WorkspaceIOError(`failed to open ${path} for input: ${reason(err)}`);
  }
}

export async function writeSource(ws: Workspace, text: string): Promise<void> {
  const file = artifactPath(ws, 'tex');
  try {
    await writeFile(file, text, 'utf-8');
  } catch (err) {
    throw new WorkspaceIOError(`failed to open ${file} for output: ${reason(err)}`);
  }
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export async function readIfExists(path: string): Promise<Buffer | null> {
  if (!(await fileExists(path))) return null;
  return readFile(path);
}

export async function backupFile(from: string, to: string): Promise<void> {
  try {
    await copyFile(from, to);
  } catch (err) {
    throw new WorkspaceIOError(`failed to copy ${from} to ${to}: ${reason(err)}`);
  }
}

/**
 * Moves the finished document to the destination. Rename is tried first;
 * when it fails (typically across filesystems) the bytes are copied instead.
 * Without a destination the bytes are handed back.
 */
export async function deliverOutput(
  ws: Workspace,
  extension: string,
  destination?: string
): Promise<PipelineOutput> {
  const file = artifactPath(ws, extension);

  if (destination) {
    try {
      await rename(file, destination);
      return { kind: 'written', path: destination };
    } catch {
      // fall through to the copy path
    }
  }

  let data: Buffer;
  try {
    data = await readFile(file);
  } catch {
    throw new WorkspaceIOError(`failed to open ${file} for input`);
  }

  if (!destination) return { kind: 'bytes', data };

  try {
    await writeFile(destination, data);
  } catch (err) {
    throw new WorkspaceIOError(`failed to write ${destination}: ${reason(err)}`);
  }
  return { kind: 'written', path: destination };
}
