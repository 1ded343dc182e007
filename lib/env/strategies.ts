import { promises as fs } from 'fs';
import { ProvisioningError } from '../errors';
import { InstalledDistributions } from '../dependency-check';
import { Interpreter } from '../python/interpreter';
import { Version } from '../requirements/version';
import { Logger } from '../util/log';
import { ProcessError, ProcessRunner } from '../util/process';
import { findExecutable, HostTools, minimumPipVersion, probeHostTools, probeVersion } from './host-tools';
import { Installer, PipInstaller, UvInstaller } from './installer';
import { findVenvPaths, VenvPaths } from './paths';

export type EnvImpl = 'venv' | 'virtualenv' | 'uv';

export const ENV_IMPLS: readonly EnvImpl[] = ['venv', 'virtualenv', 'uv'];

export function isEnvImpl(x: string): x is EnvImpl {
  return ENV_IMPLS.some(impl => impl === x);
}

export interface ProvisionedEnv {
  readonly paths: VenvPaths;
  readonly installer: Installer;
}

/**
 * One way of creating a virtual environment
 */
export interface EnvStrategy {
  readonly name: EnvImpl;

  /**
   * Create the environment in 'root', which exists and is empty
   */
  create(root: string): Promise<ProvisionedEnv>;
}

export interface StrategyContext {
  readonly host: Interpreter;
  readonly tools: HostTools;
  readonly runner: ProcessRunner;
  readonly log: Logger;
  readonly environment?: Record<string, string>;
}

/**
 * Decides on a strategy for a requested implementation (undefined for no preference)
 */
export type StrategyResolver = (requested: EnvImpl | undefined) => Promise<EnvStrategy>;

/**
 * Resolve strategies by probing the host interpreter for every decision
 */
export function hostStrategyResolver(options: Omit<StrategyContext, 'tools'>): StrategyResolver {
  return async (requested) => {
    const tools = await probeHostTools(options.host);
    return createStrategy(selectEnvImpl(requested, tools), { ...options, tools });
  };
}

/**
 * virtualenv is faster, so it's used when nothing was asked for and it works
 */
export function selectEnvImpl(requested: EnvImpl | undefined, tools: Pick<HostTools, 'virtualenv'>): EnvImpl {
  if (requested !== undefined) { return requested; }
  return tools.virtualenv.status === 'usable' ? 'virtualenv' : 'venv';
}

export function createStrategy(impl: EnvImpl, context: StrategyContext): EnvStrategy {
  switch (impl) {
    case 'venv': return new VenvStrategy(context);
    case 'virtualenv': return new VirtualenvStrategy(context);
    case 'uv': return new UvStrategy(context);
  }
}

export class VenvStrategy implements EnvStrategy {
  public readonly name: EnvImpl = 'venv';

  constructor(private readonly context: StrategyContext) {
  }

  public async create(root: string): Promise<ProvisionedEnv> {
    const { host, tools, runner, environment } = this.context;

    // Without a host pip that can install into the environment, it needs its own
    const withPip = tools.outerPip.status !== 'usable';
    // Resolved, or the scheme paths don't line up with what venv writes on macOS
    const realRoot = await fs.realpath(root);

    try {
      await runner.run([host.executable, '-m', 'venv', ...(withPip ? [] : ['--without-pip']), realRoot], { extraEnv: environment });
    } catch (e) {
      throw new ProvisioningError('Failed to create venv. Maybe try installing virtualenv.', e);
    }

    const paths = await findVenvPaths(host, realRoot, tools.description);
    if (withPip) {
      await this.preparePip(paths);
    }

    return { paths, installer: new PipInstaller(host, tools.outerPip, this.context) };
  }

  /**
   * Make the seeded pip recent enough for the platform, and get rid of the setuptools it brought along
   */
  private async preparePip(paths: VenvPaths) {
    const { host, tools, runner, environment } = this.context;
    const minimum = minimumPipVersion(tools.description);

    const installed = await InstalledDistributions.fromInterpreter(host, [paths.purelib]);
    if (probeVersion(installed, 'pip', minimum).status !== 'usable') {
      await runEnvCommand(runner, [paths.pythonExecutable, '-Im', 'pip', 'install', `pip>=${minimum}`], environment);
    }

    // Python 3.12 stopped bundling setuptools
    const [major, minor] = tools.description.versionInfo;
    if (Version.parse(`${major}.${minor}`).compare(Version.parse('3.12')) < 0) {
      await runEnvCommand(runner, [paths.pythonExecutable, '-Im', 'pip', 'uninstall', 'setuptools', '-y'], environment);
    }
  }
}

export class VirtualenvStrategy implements EnvStrategy {
  public readonly name: EnvImpl = 'virtualenv';

  constructor(private readonly context: StrategyContext) {
  }

  public async create(root: string): Promise<ProvisionedEnv> {
    const { host, tools, runner, environment } = this.context;

    const seed = tools.outerPip.status === 'usable'
      ? ['--no-seed']
      : ['--no-setuptools', '--no-wheel'];
    await runEnvCommand(runner, [host.executable, '-m', 'virtualenv', root, '--activators', '', ...seed], environment);

    const paths = await findVenvPaths(host, root, tools.description);
    return { paths, installer: new PipInstaller(host, tools.outerPip, this.context) };
  }
}

export class UvStrategy implements EnvStrategy {
  public readonly name: EnvImpl = 'uv';

  constructor(private readonly context: StrategyContext) {
  }

  public async create(root: string): Promise<ProvisionedEnv> {
    const { host, tools, runner, log, environment } = this.context;

    const uv = await findExecutable('uv', { ...process.env, ...environment });
    if (uv === undefined) {
      throw new ProvisioningError('isolated env backend not found: uv');
    }

    // Pin the interpreter, so the environment matches the host we described
    await runEnvCommand(runner, [uv, 'venv', root, '--python', host.executable, ...(log.verbosity > 1 ? ['-v'] : [])], environment);

    const paths = await findVenvPaths(host, root, tools.description);
    return { paths, installer: new UvInstaller(uv, root, this.context) };
  }
}

async function runEnvCommand(runner: ProcessRunner, argv: string[], environment?: Record<string, string>) {
  try {
    await runner.run(argv, { extraEnv: environment });
  } catch (e) {
    if (e instanceof ProcessError) {
      throw new ProvisioningError(`Failed to create isolated environment: ${e.message}`, e);
    }
    throw e;
  }
}
