import * as child_process from 'child_process';
import * as readline from 'readline';
import { Logger } from './log';
import { errorMessage, SimpleError } from './flow';

export interface RunOptions {
  readonly cwd?: string;

  /**
   * Added on top of the current process environment
   */
  readonly extraEnv?: Record<string, string>;
}

/**
 * Runs a command to completion and returns its combined output
 */
export interface ProcessRunner {
  run(argv: string[], options?: RunOptions): Promise<string>;
}

export class ProcessError extends SimpleError {
  /**
   * @param outcome what happened to the command, 'exited with code N' if not given
   */
  constructor(
    public readonly argv: string[],
    public readonly exitCode: number | undefined,
    public readonly output: string,
    outcome: string = `exited with code ${exitCode}`) {
    super(`Command ${outcome}: ${argv.join(' ')}`);
  }
}

/**
 * Collects process output line by line
 *
 * When verbose, every line goes to the log as it arrives. Otherwise lines
 * are only kept, and written to the log when the process fails.
 */
export class OutputCollector {
  private readonly lines = new Array<string>();

  constructor(private readonly log: Logger) {
  }

  public line(s: string) {
    this.lines.push(s);
    if (this.log.verbose) {
      this.log.output(s);
    }
  }

  public get text() {
    return this.lines.join('\n');
  }

  public failed() {
    if (!this.log.verbose && this.lines.length > 0) {
      this.log.output(this.text);
    }
  }
}

export class SubprocessRunner implements ProcessRunner {
  constructor(private readonly log: Logger) {
  }

  public run(argv: string[], options: RunOptions = {}): Promise<string> {
    const [command, ...args] = argv;
    if (command === undefined) {
      return Promise.reject(new Error('Cannot run an empty command'));
    }

    if (this.log.verbose) {
      this.log.command(argv);
    }
    this.log.debug(`[${options.cwd ?? process.cwd()}] ${argv.join(' ')}`);

    const collector = new OutputCollector(this.log);
    return new Promise((ok, ko) => {
      const child = child_process.spawn(command, args, {
        cwd: options.cwd,
        env: { ...process.env, ...options.extraEnv },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      for (const stream of [child.stdout, child.stderr]) {
        readline.createInterface({ input: stream, crlfDelay: Infinity }).on('line', (line) => collector.line(line));
      }

      child.once('error', (e) => {
        collector.failed();
        ko(new ProcessError(argv, undefined, collector.text, `could not be started (${errorMessage(e)})`));
      });
      child.once('close', (code, signal) => {
        if (code === 0) {
          ok(collector.text);
          return;
        }
        collector.failed();
        ko(new ProcessError(argv, code ?? undefined, collector.text, signal ? `was killed by ${signal}` : undefined));
      });
    });
  }
}
