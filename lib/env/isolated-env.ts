import * as crypto from 'crypto';
import * as fsSync from 'fs';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InstallerError, ProvisioningError } from '../errors';
import { Interpreter, PythonInterpreter } from '../python/interpreter';
import { exists, makeTemporaryDirectory, pathExists, rimraf } from '../util/files';
import { errorMessage } from '../util/flow';
import { Logger } from '../util/log';
import { ProcessRunner, SubprocessRunner } from '../util/process';
import { IsolatedEnvironment } from './environment';
import { EnvImpl, hostStrategyResolver, ProvisionedEnv, StrategyResolver } from './strategies';

export interface DefaultIsolatedEnvOptions {
  /**
   * Force an implementation instead of picking the best available one
   */
  readonly envImpl?: EnvImpl;
  readonly log?: Logger;
  readonly host?: Interpreter;
  readonly runner?: ProcessRunner;

  /**
   * Added to the environment of every process provisioning and installing runs
   */
  readonly environment?: Record<string, string>;

  /**
   * Directory to allocate environment roots and requirement files in
   *
   * @default the OS temporary directory
   */
  readonly tempRoot?: string;

  /**
   * @default probe the host interpreter
   */
  readonly strategies?: StrategyResolver;
}

type EnvState =
  | { readonly type: 'fresh' }
  | { readonly type: 'creating' }
  | { readonly type: 'active'; readonly root: string; readonly provisioned: ProvisionedEnv }
  | { readonly type: 'closed' };

/**
 * A throwaway virtual environment for one build
 *
 * Created in a fresh temporary directory, which is removed on cleanup, or when
 * the process is interrupted while the environment is still around.
 */
export class DefaultIsolatedEnv implements IsolatedEnvironment {
  /**
   * Create an environment, run a block with it, and clean it up whatever happens
   */
  public static async with<A>(options: DefaultIsolatedEnvOptions, fn: (env: DefaultIsolatedEnv) => A | Promise<A>): Promise<A> {
    const env = new DefaultIsolatedEnv(options);
    await env.create();
    try {
      return await fn(env);
    } finally {
      await env.cleanup();
    }
  }

  private state: EnvState = { type: 'fresh' };
  private root?: string;
  private disarmInterruptHandler?: () => void;
  private readonly log: Logger;
  private readonly tempRoot: string;
  private readonly strategies: StrategyResolver;

  constructor(private readonly options: DefaultIsolatedEnvOptions = {}) {
    this.log = options.log ?? Logger.silent();
    this.tempRoot = options.tempRoot ?? os.tmpdir();
    this.strategies = options.strategies ?? hostStrategyResolver({
      host: options.host ?? PythonInterpreter.host(),
      runner: options.runner ?? new SubprocessRunner(this.log),
      log: this.log,
      environment: options.environment,
    });
  }

  public async create(): Promise<this> {
    if (this.state.type !== 'fresh') {
      throw new ProvisioningError('An isolated environment can only be created once');
    }
    // Claim the instance before the first await, so a concurrent create() is refused too
    this.state = { type: 'creating' };

    try {
      const root = await makeTemporaryDirectory('pybuild-env-', this.tempRoot);
      this.root = root;
      this.disarmInterruptHandler = removeOnInterrupt(root);

      const strategy = await this.strategies(this.options.envImpl);
      this.log.info(`Creating isolated environment: ${strategy.name}...`);
      const provisioned = await strategy.create(root);

      if (!await pathExists(provisioned.paths.pythonExecutable)) {
        throw new ProvisioningError(`Virtual environment creation failed, executable ${provisioned.paths.pythonExecutable} missing`);
      }

      this.state = { type: 'active', root, provisioned };
      return this;
    } catch (e) {
      await this.cleanup();
      if (e instanceof ProvisioningError || e instanceof InstallerError) { throw e; }
      throw new ProvisioningError(`Failed to create isolated environment: ${errorMessage(e)}`, e);
    }
  }

  /**
   * Root directory of the environment
   */
  public get path(): string {
    return this.active().root;
  }

  public get pythonExecutable(): string {
    return this.active().provisioned.paths.pythonExecutable;
  }

  public get scriptsDir(): string {
    return this.active().provisioned.paths.scripts;
  }

  public extraEnvironment(): Record<string, string> {
    const searchPath = [this.scriptsDir, process.env.PATH].filter(p => p !== undefined && p !== '');
    return { PATH: searchPath.join(path.delimiter) };
  }

  /**
   * Install requirements into the environment
   */
  public async install(requirements: Iterable<string>) {
    const reqs = Array.from(new Set(requirements));
    if (reqs.length === 0) { return; }
    const { provisioned } = this.active();

    const reqFile = path.join(this.tempRoot, `pybuild-reqs-${crypto.randomBytes(8).toString('hex')}.txt`);
    await fs.writeFile(reqFile, reqs.join(os.EOL), { encoding: 'utf-8', flag: 'wx' });
    try {
      this.log.info(['Installing packages in isolated environment:', ...[...reqs].sort().map(r => `- ${r}`)].join('\n'));
      await provisioned.installer.install(this, reqFile);
    } finally {
      await rimraf(reqFile);
    }
  }

  public async cleanup() {
    this.state = { type: 'closed' };
    this.disarmInterruptHandler?.();
    this.disarmInterruptHandler = undefined;

    if (this.root !== undefined && await exists(this.root)) {
      await rimraf(this.root);
    }
  }

  private active() {
    if (this.state.type !== 'active') {
      throw new ProvisioningError('Isolated environment is not active');
    }
    return this.state;
  }
}

/**
 * Remove a directory if the process is interrupted or exits while it's still there
 *
 * Returns a function that takes the handlers off again. A signal is
 * re-delivered after cleanup, so the process still dies of it.
 */
function removeOnInterrupt(dir: string): () => void {
  const remove = () => {
    fsSync.rmSync(dir, { recursive: true, force: true });
  };
  const onSignal = (signal: NodeJS.Signals) => {
    disarm();
    remove();
    process.kill(process.pid, signal);
  };
  const disarm = () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    process.off('exit', remove);
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  process.once('exit', remove);
  return disarm;
}
