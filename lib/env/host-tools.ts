import * as path from 'path';
import { checkDependencies, DistributionIndex, InstalledDistributions } from '../dependency-check';
import { Interpreter, InterpreterDescription } from '../python/interpreter';
import { Version } from '../requirements/version';
import { exists } from '../util/files';

/**
 * Whether a tool can be used: not there, there but too old, or good to go
 */
export type ToolProbe =
  | { readonly status: 'absent' }
  | { readonly status: 'outdated'; readonly version: string }
  | { readonly status: 'usable'; readonly version: string };

/**
 * First pip release with '--python', which lets it install into another environment
 */
export const OUTER_PIP_MINIMUM = '22.3';

/**
 * virtualenv release (with dependencies) that the virtualenv strategy is known to work with
 */
export const VIRTUALENV_REQUIREMENT = 'virtualenv>=20.0.35';

export interface HostTools {
  readonly description: InterpreterDescription;
  readonly outerPip: ToolProbe;
  readonly virtualenv: ToolProbe;
}

/**
 * Inspect the host interpreter once for one provisioning decision
 *
 * Nothing is cached between calls, so a tool installed in the meantime is seen.
 */
export async function probeHostTools(host: Interpreter): Promise<HostTools> {
  const description = await host.describe();
  const installed = await InstalledDistributions.fromInterpreter(host);
  return {
    description,
    outerPip: probePip(installed, description),
    virtualenv: probeVirtualenv(installed, description),
  };
}

/**
 * Lowest pip that builds for the platform
 *
 * macOS 11 changed the platform tags, which older pips don't understand.
 */
export function minimumPipVersion(description: Pick<InterpreterDescription, 'markers' | 'macRelease'>): string {
  if (description.markers.platform_system === 'Darwin') {
    const major = parseInt(description.macRelease.split('.')[0] ?? '', 10);
    if (major >= 11) {
      return description.markers.platform_machine !== 'x86_64' ? '21.0.1' : '20.3.0';
    }
  }
  return '19.1.0';
}

/**
 * Whether the host pip may install into an environment by path
 */
export function probePip(installed: DistributionIndex, description: Pick<InterpreterDescription, 'markers' | 'macRelease'>): ToolProbe {
  const minimum = maxVersion(OUTER_PIP_MINIMUM, minimumPipVersion(description));
  return probeVersion(installed, 'pip', minimum);
}

/**
 * virtualenv counts only if it and everything it depends on is installed at a working version
 */
export function probeVirtualenv(installed: DistributionIndex, description: Pick<InterpreterDescription, 'markers'>): ToolProbe {
  const dist = installed.find('virtualenv');
  if (!dist) { return { status: 'absent' }; }

  const unmet = checkDependencies([VIRTUALENV_REQUIREMENT], { markers: description.markers, installed });
  return unmet.length === 0
    ? { status: 'usable', version: dist.version }
    : { status: 'outdated', version: dist.version };
}

export function probeVersion(installed: DistributionIndex, name: string, minimum: string): ToolProbe {
  const dist = installed.find(name);
  if (!dist) { return { status: 'absent' }; }

  const version = Version.tryParse(dist.version);
  return version && version.compare(Version.parse(minimum)) >= 0
    ? { status: 'usable', version: dist.version }
    : { status: 'outdated', version: dist.version };
}

function maxVersion(a: string, b: string) {
  return Version.parse(a).compare(Version.parse(b)) >= 0 ? a : b;
}

/**
 * Look up an executable on the PATH
 */
export async function findExecutable(name: string, env: NodeJS.ProcessEnv = process.env): Promise<string | undefined> {
  const extensions = process.platform === 'win32'
    ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')]
    : [''];

  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (dir === '') { continue; }
    for (const ext of extensions) {
      const fullPath = path.resolve(dir, name + ext);
      if (await exists(fullPath, s => !s.isDirectory())) {
        return fullPath;
      }
    }
  }
  return undefined;
}
