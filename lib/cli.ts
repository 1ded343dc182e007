import chalk from 'chalk';
import { promises as fs } from 'fs';
import * as path from 'path';
import yargs from 'yargs';
import { z } from 'zod';
import { ConfigSettings, Distribution } from './backend/hooks';
import { UnmetDependency } from './dependency-check';
import { EnvImpl, ENV_IMPLS, isEnvImpl } from './env/strategies';
import { BackendRaisedError, BackendUnavailableError, ConfigurationError, UnmetDependenciesError } from './errors';
import { build, naturalLanguageList } from './pipeline';
import { findFileUp } from './util/files';
import { SimpleError } from './util/flow';
import { Logger } from './util/log';

const DESCRIPTION = `A Python build frontend.

By default, a source distribution (sdist) is built from {srcdir} and a binary
distribution (wheel) is built from the sdist. This makes sure the sdist can be
used to build wheels.

Pass -s/--sdist and/or -w/--wheel to build a specific distribution. This
disables the default behavior: all artifacts are built from {srcdir}, even if
--wheel is combined with --sdist.`;

export interface CliArguments {
  readonly srcdir: string;
  readonly verbose: number;
  readonly distributions: Distribution[];
  readonly outdir?: string;
  readonly skipDependencyCheck: boolean;
  readonly noIsolation: boolean;
  readonly envImpl?: EnvImpl;
  readonly configSettings: string[];
}

export async function parseArguments(args: string[], version: string = 'unknown'): Promise<CliArguments> {
  const argv = await yargs(args)
    .scriptName('pybuild')
    .usage('$0 [srcdir]\n\n' + DESCRIPTION)
    .option('verbose', {
      alias: 'v',
      type: 'count',
      desc: 'Increase verbosity',
    })
    .option('sdist', {
      alias: 's',
      type: 'boolean',
      desc: 'Build a source distribution (disables the default behavior)',
      default: false,
    })
    .option('wheel', {
      alias: 'w',
      type: 'boolean',
      desc: 'Build a wheel (disables the default behavior)',
      default: false,
    })
    .option('outdir', {
      alias: 'o',
      type: 'string',
      desc: `Output directory (defaults to {srcdir}${path.sep}dist)`,
      requiresArg: true,
    })
    .option('skip-dependency-check', {
      alias: 'x',
      type: 'boolean',
      desc: 'Do not check that build dependencies are installed',
      default: false,
    })
    .option('no-isolation', {
      alias: 'n',
      type: 'boolean',
      desc: 'Build in the current environment. Build dependencies must be installed separately',
      default: false,
    })
    .option('env-impl', {
      type: 'string',
      choices: ENV_IMPLS,
      desc: 'Isolated environment implementation. Defaults to virtualenv if installed, otherwise venv',
    })
    .option('config-setting', {
      alias: 'C',
      type: 'string',
      array: true,
      desc: 'Setting to pass to the backend, KEY[=VALUE]. May be repeated',
      requiresArg: true,
    })
    // '--no-isolation' is its own flag, not the negation of '--isolation'
    .parserConfiguration({ 'boolean-negation': false })
    .version(version)
    .alias('version', 'V')
    .help()
    .strictOptions()
    .showHelpOnFail(false)
    .fail((msg, err) => {
      throw err ?? new ConfigurationError(msg);
    })
    .parseAsync();

  if (argv._.length > 1) {
    throw new ConfigurationError(`Expected at most one source directory, got: ${argv._.join(' ')}`);
  }

  const envImpl = argv['env-impl'];
  if (envImpl !== undefined && !isEnvImpl(envImpl)) {
    throw new ConfigurationError(`Unknown environment implementation: ${envImpl}`);
  }
  // Checked here because a defaulted '--no-isolation' would count as given
  if (argv['no-isolation'] && envImpl !== undefined) {
    throw new ConfigurationError('Arguments --no-isolation and --env-impl are mutually exclusive');
  }

  const distributions = new Array<Distribution>();
  if (argv.sdist) { distributions.push('sdist'); }
  if (argv.wheel) { distributions.push('wheel'); }

  return {
    srcdir: argv._.length > 0 ? String(argv._[0]) : process.cwd(),
    verbose: argv.verbose,
    distributions,
    outdir: argv.outdir,
    skipDependencyCheck: argv['skip-dependency-check'],
    noIsolation: argv['no-isolation'],
    envImpl,
    configSettings: argv['config-setting'] ?? [],
  };
}

/**
 * Turn 'KEY=VALUE' strings into config settings
 *
 * A key given more than once collects its values in a list, in order.
 * A setting without '=' has the empty string for value.
 */
export function mapConfigSettings(settings: readonly string[]): ConfigSettings {
  const ret = new Map<string, string | string[]>();
  for (const setting of settings) {
    const eq = setting.indexOf('=');
    const key = eq === -1 ? setting : setting.slice(0, eq);
    const value = eq === -1 ? '' : setting.slice(eq + 1);

    const existing = ret.get(key);
    if (existing === undefined) {
      ret.set(key, value);
    } else if (Array.isArray(existing)) {
      existing.push(value);
    } else {
      ret.set(key, [existing, value]);
    }
  }
  return Object.fromEntries(ret);
}

/**
 * One line per top-level requirement, followed by how it leads to what's missing
 */
export function formatUnmetDependencies(unmet: UnmetDependency[]): string {
  const lines = ['Missing dependencies:'];
  for (const { chain } of unmet) {
    const [topLevel, ...rest] = [...chain].reverse();
    lines.push(`\t${topLevel}`);
    if (rest.length > 0) {
      lines.push(`\t${rest.map(stripMarker).join(' -> ')}`);
    }
  }
  return lines.join('\n');
}

function stripMarker(requirement: string) {
  const semi = requirement.indexOf(';');
  return (semi === -1 ? requirement : requirement.slice(0, semi)).trim();
}

/**
 * Tell the user what went wrong
 */
export function reportError(e: unknown, log: Logger) {
  if (e instanceof UnmetDependenciesError) {
    log.error(`ERROR ${formatUnmetDependencies(e.unmet)}`);
    return;
  }

  if (e instanceof BackendRaisedError && e.traceback) {
    log.output(e.traceback.trim());
  } else if (e instanceof BackendUnavailableError && e.output) {
    log.output(e.output.trim());
  }

  if (e instanceof SimpleError) {
    log.error(`ERROR ${e.message}`);
  } else {
    log.error(e instanceof Error && e.stack ? e.stack : `ERROR ${e}`);
  }
}

/**
 * Run the command line, returning the exit code
 */
export async function main(args: string[], log?: Logger): Promise<number> {
  let argv: CliArguments;
  try {
    argv = await parseArguments(args, await packageVersion());
  } catch (e) {
    reportError(e, log ?? Logger.console());
    return 1;
  }

  const logger = log ?? Logger.console(argv.verbose);
  try {
    const artifacts = await build(argv.srcdir, argv.distributions, {
      // Relative to the source directory only if not given
      outputDir: argv.outdir ?? path.join(argv.srcdir, 'dist'),
      configSettings: mapConfigSettings(argv.configSettings),
      isolation: !argv.noIsolation,
      envImpl: argv.envImpl,
      skipDependencyCheck: argv.skipDependencyCheck,
      color: chalk.supportsColor !== false,
      log: logger,
    });

    logger.info(chalk.green(`Successfully built ${naturalLanguageList(artifacts.map(a => chalk.underline(a)))}`));
    return 0;
  } catch (e) {
    reportError(e, logger);
    return 1;
  }
}

const packageJsonSchema = z.object({ version: z.string() });

async function packageVersion(): Promise<string> {
  const packageJson = await findFileUp('package.json', __dirname);
  if (packageJson === undefined) { return 'unknown'; }

  const parsed = packageJsonSchema.safeParse(JSON.parse(await fs.readFile(packageJson, { encoding: 'utf-8' })));
  return parsed.success ? parsed.data.version : 'unknown';
}
