import { promises as fs, Stats } from 'fs';
import * as os from 'os';
import * as path from 'path';

/**
 * The 'code' of a Node system error
 *
 * Not checked with 'instanceof Error': errors from fs may come from another realm.
 */
export function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.lstat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return false; }
    throw e;
  }
}

/**
 * Like 'exists', but follows symlinks
 */
export async function pathExists(f: string) {
  try {
    await fs.stat(f);
    return true;
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return false; }
    throw e;
  }
}

export async function rimraf(x: string) {
  try {
    const s = await fs.lstat(x);
    if (s.isDirectory()) {
      for (const child of await fs.readdir(x)) {
        await rimraf(path.join(x, child));
      }
      await fs.rmdir(x);
    } else {
      await fs.unlink(x);
    }
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return; }
    throw e;
  }
}

export async function readFileIfExists(filename: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filename, { encoding: 'utf-8' });
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return undefined; }
    throw e;
  }
}

export async function makeTemporaryDirectory(prefix: string, root: string = os.tmpdir()) {
  return fs.mkdtemp(path.join(root, prefix));
}

/**
 * Run a block with a fresh temporary directory, removing it afterwards whatever happens
 */
export async function withTemporaryDirectory<A>(prefix: string, fn: (dir: string) => A | Promise<A>): Promise<A> {
  const dir = await makeTemporaryDirectory(prefix);
  try {
    return await fn(dir);
  } finally {
    await rimraf(dir);
  }
}

/**
 * Find the most specific file with the given name up from the starting directory
 */
export async function findFileUp(filename: string, startDir: string, rootDir?: string): Promise<string | undefined> {
  const ret = await findFilesUp(filename, startDir, rootDir);
  return ret.pop();
}

/**
 * Find all files with the given name up from the starting directory
 *
 * Returns the most specific file at the end.
 */
export async function findFilesUp(filename: string, startDir: string, rootDir?: string): Promise<string[]> {
  const ret = new Array<string>();
  const resolvedRoot = rootDir !== undefined ? path.resolve(rootDir) : undefined;

  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath)) {
      ret.push(fullPath);
    }

    if (currentDir === resolvedRoot) { break; }
    const next = path.dirname(currentDir);
    if (next === currentDir) { break; }
    currentDir = next;
  }

  // Most specific file at the end
  return ret.reverse();
}
