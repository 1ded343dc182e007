import * as path from 'path';
import { Interpreter, InterpreterDescription } from '../python/interpreter';

export interface VenvPaths {
  readonly scripts: string;
  readonly pythonExecutable: string;
  readonly purelib: string;
}

/**
 * Pick the sysconfig scheme to lay out a virtual environment with
 *
 * Distributors may change the default scheme to one that doesn't work inside
 * a virtual environment. They are supposed to define 'venv' for that, but
 * Debian (which defines 'posix_local') and the macOS developer tools Python
 * (which defines 'osx_framework_library') don't always, and there
 * 'posix_prefix' gives the right layout. Undefined means the default scheme.
 */
export function selectInstallScheme(schemeNames: readonly string[]): string | undefined {
  if (schemeNames.includes('venv')) { return 'venv'; }
  if (schemeNames.includes('posix_local')) { return 'posix_prefix'; }
  if (schemeNames.includes('osx_framework_library')) { return 'posix_prefix'; }
  return undefined;
}

/**
 * Locate the interpreter, scripts and library directories of the environment at 'root'
 */
export async function findVenvPaths(host: Interpreter, root: string, description: InterpreterDescription): Promise<VenvPaths> {
  const paths = await host.schemePaths(selectInstallScheme(description.schemeNames), root);
  return {
    scripts: paths.scripts,
    purelib: paths.purelib,
    pythonExecutable: path.join(paths.scripts, `python${description.exeSuffix}`),
  };
}
