import * as child_process from 'child_process';
import * as util from 'util';
import { z } from 'zod';
import { MarkerEnvironment } from '../requirements/markers';
import { errorMessage, SimpleError } from '../util/flow';

const cpExecFile = util.promisify(child_process.execFile);

export interface InstalledDistribution {
  readonly name: string;
  readonly version: string;
  readonly requires: string[];
}

export interface InterpreterDescription {
  readonly markers: MarkerEnvironment;
  readonly schemeNames: string[];
  readonly exeSuffix: string;

  /**
   * macOS product version, empty elsewhere
   */
  readonly macRelease: string;
  readonly versionInfo: readonly [number, number];
}

export interface SchemePaths {
  readonly scripts: string;
  readonly purelib: string;
}

/**
 * The questions we ask of a Python interpreter
 */
export interface Interpreter {
  readonly executable: string;

  describe(): Promise<InterpreterDescription>;

  /**
   * Installed distributions, optionally only those found on the given paths
   */
  distributions(paths?: string[]): Promise<InstalledDistribution[]>;

  /**
   * Install paths of the given sysconfig scheme (the default scheme if undefined) relocated to 'base'
   */
  schemePaths(scheme: string | undefined, base: string): Promise<SchemePaths>;
}

export class InterpreterError extends SimpleError {
}

const DESCRIBE_SCRIPT = `
import json, os, platform, sys, sysconfig

def fmt(info):
    v = '{0.major}.{0.minor}.{0.micro}'.format(info)
    if info.releaselevel != 'final':
        v += info.releaselevel[0] + str(info.serial)
    return v

print(json.dumps({
    'markers': {
        'implementation_name': sys.implementation.name,
        'implementation_version': fmt(sys.implementation.version),
        'os_name': os.name,
        'platform_machine': platform.machine(),
        'platform_release': platform.release(),
        'platform_system': platform.system(),
        'platform_version': platform.version(),
        'python_full_version': platform.python_version(),
        'platform_python_implementation': platform.python_implementation(),
        'python_version': '.'.join(platform.python_version_tuple()[:2]),
        'sys_platform': sys.platform,
    },
    'schemeNames': list(sysconfig.get_scheme_names()),
    'exeSuffix': sysconfig.get_config_var('EXE') or '',
    'macRelease': platform.mac_ver()[0],
    'versionInfo': list(sys.version_info[:2]),
}))
`;

const DISTRIBUTIONS_SCRIPT = `
import json, sys
from importlib import metadata

paths = sys.argv[1:]
dists = metadata.distributions(path=paths) if paths else metadata.distributions()
print(json.dumps([
    {'name': d.metadata['Name'], 'version': d.version, 'requires': d.requires or []}
    for d in dists if d.metadata['Name']
]))
`;

const SCHEME_PATHS_SCRIPT = `
import json, sys, sysconfig

scheme, base = sys.argv[1], sys.argv[2]
config_vars = sysconfig.get_config_vars().copy()
config_vars['base'] = base
paths = sysconfig.get_paths(scheme=scheme, vars=config_vars) if scheme else sysconfig.get_paths(vars=config_vars)
print(json.dumps({'scripts': paths['scripts'], 'purelib': paths['purelib']}))
`;

const markersSchema = z.object({
  implementation_name: z.string(),
  implementation_version: z.string(),
  os_name: z.string(),
  platform_machine: z.string(),
  platform_release: z.string(),
  platform_system: z.string(),
  platform_version: z.string(),
  python_full_version: z.string(),
  platform_python_implementation: z.string(),
  python_version: z.string(),
  sys_platform: z.string(),
});

const descriptionSchema = z.object({
  markers: markersSchema,
  schemeNames: z.array(z.string()),
  exeSuffix: z.string(),
  macRelease: z.string(),
  versionInfo: z.tuple([z.number(), z.number()]),
});

const distributionsSchema = z.array(z.object({
  name: z.string(),
  version: z.string(),
  requires: z.array(z.string()),
}));

const schemePathsSchema = z.object({
  scripts: z.string(),
  purelib: z.string(),
});

/**
 * A Python interpreter on disk, queried through small scripts
 */
export class PythonInterpreter implements Interpreter {
  /**
   * The interpreter this frontend runs builds with when there is no isolated environment
   */
  public static host(env: NodeJS.ProcessEnv = process.env): PythonInterpreter {
    return new PythonInterpreter(env.PYBUILD_PYTHON || (process.platform === 'win32' ? 'python' : 'python3'));
  }

  constructor(public readonly executable: string) {
  }

  public async describe(): Promise<InterpreterDescription> {
    return this.query(DESCRIBE_SCRIPT, [], descriptionSchema);
  }

  public async distributions(paths: string[] = []): Promise<InstalledDistribution[]> {
    return this.query(DISTRIBUTIONS_SCRIPT, paths, distributionsSchema);
  }

  public async schemePaths(scheme: string | undefined, base: string): Promise<SchemePaths> {
    return this.query(SCHEME_PATHS_SCRIPT, [scheme ?? '', base], schemePathsSchema);
  }

  private async query<A>(script: string, args: string[], schema: z.ZodType<A>): Promise<A> {
    let stdout: string;
    try {
      ({ stdout } = await cpExecFile(this.executable, ['-c', script, ...args], {
        encoding: 'utf-8',
        maxBuffer: 10_000_000,
      }));
    } catch (e) {
      throw new InterpreterError(`Could not query Python interpreter '${this.executable}': ${errorMessage(e)}`);
    }

    let answer: unknown;
    try {
      answer = JSON.parse(stdout);
    } catch (e) {
      throw new InterpreterError(`Unreadable answer from '${this.executable}': ${stdout.trim()}`);
    }

    const parsed = schema.safeParse(answer);
    if (!parsed.success) {
      throw new InterpreterError(`Unexpected answer from '${this.executable}': ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
