import { InstallerError } from '../errors';
import { Interpreter } from '../python/interpreter';
import { Logger } from '../util/log';
import { ProcessError, ProcessRunner } from '../util/process';
import { IsolatedEnvironment } from './environment';
import { ToolProbe } from './host-tools';

/**
 * Installs the requirements listed in a file into an environment
 *
 * An undefined target means the host interpreter.
 */
export interface Installer {
  install(target: IsolatedEnvironment | undefined, requirementsFile: string): Promise<void>;
}

export interface InstallerOptions {
  readonly runner: ProcessRunner;
  readonly log: Logger;

  /**
   * Added to the installer's process environment
   */
  readonly environment?: Record<string, string>;
}

export class PipInstaller implements Installer {
  /**
   * @param outerPip whether the host pip is recent enough to install into another environment
   */
  constructor(
    private readonly host: Interpreter,
    private readonly outerPip: ToolProbe,
    private readonly options: InstallerOptions) {
  }

  public async install(target: IsolatedEnvironment | undefined, requirementsFile: string) {
    const argv = this.pipCommand(target);
    if (this.options.log.verbosity > 1) {
      argv.push(`-${'v'.repeat(this.options.log.verbosity - 1)}`);
    }
    argv.push('install', '--use-pep517', '--no-warn-script-location', '-r', requirementsFile);

    await runInstaller(argv, this.options, {});
  }

  public pipCommand(target: IsolatedEnvironment | undefined): string[] {
    if (target === undefined) {
      return [this.host.executable, '-m', 'pip'];
    }
    if (this.outerPip.status === 'usable') {
      return [this.host.executable, '-m', 'pip', '--python', target.pythonExecutable];
    }
    // Too old or missing on the host: use the pip seeded into the environment itself
    return [target.pythonExecutable, '-Im', 'pip'];
  }
}

export class UvInstaller implements Installer {
  constructor(
    private readonly uv: string,
    private readonly environmentRoot: string,
    private readonly options: InstallerOptions) {
  }

  public async install(target: IsolatedEnvironment | undefined, requirementsFile: string) {
    const argv = [this.uv, 'pip'];
    if (this.options.log.verbosity > 1) {
      // uv doesn't take more than one -v here
      argv.push('-v');
    }
    argv.push('install', ...(target === undefined ? ['--system'] : []), '-r', requirementsFile);

    await runInstaller(argv, this.options, target === undefined ? {} : { VIRTUAL_ENV: this.environmentRoot });
  }
}

async function runInstaller(argv: string[], options: InstallerOptions, extraEnv: Record<string, string>) {
  try {
    await options.runner.run(argv, { extraEnv: { ...options.environment, ...extraEnv } });
  } catch (e) {
    if (e instanceof ProcessError) {
      throw new InstallerError(`Failed to install requirements: ${e.message}`, e.argv, e.exitCode, e.output);
    }
    throw e;
  }
}
