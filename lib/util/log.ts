import chalk from 'chalk';

export type LogOrigin = 'log' | 'debug' | 'warning' | 'error' | 'command-input' | 'command-output';

export type LogSink = (message: string, origin: LogOrigin) => void;

/**
 * Logging context for one build invocation
 *
 * Carries the sink and the verbosity through the call chain, so that
 * independent callers in one process never share logging state.
 */
export class Logger {
  /**
   * Logger that writes to stderr, colored where the terminal supports it
   */
  public static console(verbosity: number = 0): Logger {
    const startTime = Date.now();
    return new Logger((message, origin) => {
      process.stderr.write(renderConsole(message, origin, startTime));
    }, verbosity);
  }

  public static silent(verbosity: number = 0): Logger {
    return new Logger(() => undefined, verbosity);
  }

  constructor(private readonly sink: LogSink, public readonly verbosity: number = 0) {
  }

  public get verbose() {
    return this.verbosity > 0;
  }

  public info(s: string) {
    this.sink(s, 'log');
  }

  public debug(s: string) {
    if (this.verbosity > 1) {
      this.sink(s, 'debug');
    }
  }

  public warning(s: string) {
    this.sink(s, 'warning');
  }

  public error(s: string) {
    this.sink(s, 'error');
  }

  public command(argv: string[]) {
    this.sink(argv.map(quoteArgument).join(' '), 'command-input');
  }

  public output(s: string) {
    this.sink(s, 'command-output');
  }
}

export function renderConsole(message: string, origin: LogOrigin, startTime: number): string {
  const lines = message.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') { lines.pop(); }

  switch (origin) {
    case 'log':
      return lines.map((line, i) => chalk.bold(`${i === 0 ? '* ' : '  '}${line}`) + '\n').join('');
    case 'command-input':
      return lines.map(line => chalk.dim(`> ${line}`) + '\n').join('');
    case 'command-output':
      return lines.map(line => chalk.dim(`< ${line}`) + '\n').join('');
    case 'debug':
      return chalk.gray(`[${pad(6, elapsedTime(startTime))}] ${lines.join('\n')}`) + '\n';
    case 'warning':
      return chalk.yellow(`WARNING ${lines.join('\n')}`) + '\n';
    case 'error':
      return chalk.red(lines.join('\n')) + '\n';
  }
}

function quoteArgument(arg: string) {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

function elapsedTime(startTime: number) {
  const elapsedS = (Date.now() - startTime) / 1000.0;
  return elapsedS.toFixed(1);
}

function pad(n: number, x: string, p: string = ' ') {
  return p.repeat(Math.max(n - x.length, 0)) + x;
}
