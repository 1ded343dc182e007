import * as path from 'path';
import * as tar from 'tar';
import { ConfigSettings, Distribution, HookTransport } from './backend/hooks';
import { ConfigurationError, UnmetDependenciesError } from './errors';
import { DefaultIsolatedEnv } from './env/isolated-env';
import { EnvImpl, StrategyResolver } from './env/strategies';
import { ProjectBuilder } from './project-builder';
import { Interpreter } from './python/interpreter';
import { withTemporaryDirectory } from './util/files';
import { Logger } from './util/log';
import { ProcessRunner } from './util/process';

/**
 * Builds one distribution of the project in a source directory, returning the artifact's path
 */
export type BuildOne = (sourceDir: string, kind: Distribution) => Promise<string>;

/**
 * Build the requested distributions straight from the source directory
 *
 * Returns the basenames of the artifacts, in the order requested.
 */
export async function buildPackage(sourceDir: string, kinds: Distribution[], buildOne: BuildOne): Promise<string[]> {
  const ret = new Array<string>();
  for (const kind of kinds) {
    ret.push(path.basename(await buildOne(sourceDir, kind)));
  }
  return ret;
}

/**
 * Build an sdist, then build the requested distributions from the unpacked sdist
 *
 * This way the wheels are guaranteed to be buildable from what's in the sdist.
 * Returns the basenames of the artifacts, the sdist first.
 */
export async function buildPackageViaSdist(sourceDir: string, kinds: Distribution[], buildOne: BuildOne, log: Logger = Logger.silent()): Promise<string[]> {
  if (kinds.includes('sdist')) {
    throw new ConfigurationError('Only binary distributions are allowed but sdist was specified');
  }

  const sdist = await buildOne(sourceDir, 'sdist');
  const sdistName = path.basename(sdist);
  const ret = [sdistName];

  if (kinds.length > 0) {
    await withTemporaryDirectory('pybuild-via-sdist-', async (extractDir) => {
      await tar.x({ file: sdist, cwd: extractDir });
      log.info(`Preparing to build ${naturalLanguageList(kinds)} from sdist`);

      const sdistSourceDir = path.join(extractDir, sdistName.replace(/\.tar\.gz$/, ''));
      for (const kind of kinds) {
        ret.push(path.basename(await buildOne(sdistSourceDir, kind)));
      }
    });
  }
  return ret;
}

export type BuildStrategy = 'direct' | 'via-sdist';

export interface BuildOptions {
  /**
   * @default '<sourceDir>/dist'
   */
  readonly outputDir?: string;
  readonly configSettings?: ConfigSettings;

  /**
   * Build in a fresh isolated environment
   *
   * @default true
   */
  readonly isolation?: boolean;

  /**
   * Force an isolated environment implementation
   */
  readonly envImpl?: EnvImpl;

  /**
   * Don't check the build dependencies when building without isolation
   *
   * @default false
   */
  readonly skipDependencyCheck?: boolean;

  /**
   * @default 'direct' if kinds were given, otherwise 'via-sdist' building a wheel
   */
  readonly strategy?: BuildStrategy;

  /**
   * Ask subprocesses for colored output
   *
   * @default false
   */
  readonly color?: boolean;

  /**
   * Added to the environment of every subprocess
   */
  readonly environment?: Record<string, string>;
  readonly log?: Logger;

  readonly host?: Interpreter;
  readonly runner?: ProcessRunner;
  readonly transport?: HookTransport;

  /**
   * Decides how isolated environments are provisioned
   */
  readonly strategies?: StrategyResolver;
}

/**
 * Build a project's distributions, returning the basenames of the artifacts
 */
export async function build(sourceDir: string, kinds: Distribution[], options: BuildOptions = {}): Promise<string[]> {
  const log = options.log ?? Logger.silent();
  // Relative to the project, also for builds from an unpacked sdist
  const outputDir = options.outputDir ?? path.join(sourceDir, 'dist');
  const buildOne = singleBuild(outputDir, options, log);

  const strategy = options.strategy ?? (kinds.length > 0 ? 'direct' : 'via-sdist');
  switch (strategy) {
    case 'direct':
      return buildPackage(sourceDir, kinds, buildOne);
    case 'via-sdist':
      return buildPackageViaSdist(sourceDir, options.strategy === undefined ? ['wheel'] : kinds, buildOne, log);
  }
}

function singleBuild(outputDir: string, options: BuildOptions, log: Logger): BuildOne {
  const environment: Record<string, string> = {};
  if (options.color) {
    environment.FORCE_COLOR = '1';
  }
  Object.assign(environment, options.environment);
  const settings = options.configSettings ?? {};

  return async (sourceDir, kind) => {
    if (options.isolation ?? true) {
      return DefaultIsolatedEnv.with({
        envImpl: options.envImpl,
        log,
        host: options.host,
        runner: options.runner,
        environment,
        strategies: options.strategies,
      }, async (env) => {
        const builder = await ProjectBuilder.fromIsolatedEnv(env, sourceDir, { transport: options.transport, environment, log });
        // The backend's own requirements can only be asked for once the build-system requirements are in
        await env.install(builder.buildSystemRequires);
        await env.install(await builder.getRequiresForBuild(kind, settings));
        return builder.build(kind, outputDir, settings);
      });
    }

    const builder = await ProjectBuilder.fromSourceDir(sourceDir, { host: options.host, transport: options.transport, environment, log });
    if (!options.skipDependencyCheck) {
      const unmet = await builder.checkDependencies(kind, settings);
      if (unmet.length > 0) {
        throw new UnmetDependenciesError(unmet);
      }
    }
    return builder.build(kind, outputDir, settings);
  };
}

/**
 * 'a', 'a and b', 'a, b and c'
 */
export function naturalLanguageList(elements: readonly string[]): string {
  if (elements.length <= 1) { return elements.join(''); }
  return `${elements.slice(0, -1).join(', ')} and ${elements[elements.length - 1]}`;
}
