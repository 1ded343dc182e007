import AdmZip from 'adm-zip';
import * as path from 'path';
import { BackendRaisedError, BackendUnavailableError } from '../errors';
import { withTemporaryDirectory } from '../util/files';
import { ConfigSettings, Distribution, HookName, HookOutcome, HookTransport, JsonValue } from './hooks';

/**
 * What a gateway needs to know to reach a project's backend
 */
export interface BackendBinding {
  readonly sourceDir: string;
  readonly pythonExecutable: string;
  readonly backend: string;
  readonly backendPath?: string[];

  /**
   * Evaluated for every call, so changes to the environment are picked up
   */
  extraEnvironment(): Record<string, string>;
}

const REQUIRES_HOOKS: Record<Distribution, HookName> = {
  sdist: 'get_requires_for_build_sdist',
  wheel: 'get_requires_for_build_wheel',
};

const BUILD_HOOKS: Record<Distribution, HookName> = {
  sdist: 'build_sdist',
  wheel: 'build_wheel',
};

type Answer = Extract<HookOutcome, { type: 'success' | 'not-implemented' }>;

/**
 * Typed calls into a build backend
 *
 * Backend failures become errors here; a hook the backend doesn't define is
 * given its default behavior.
 */
export class BackendGateway {
  constructor(private readonly transport: HookTransport, private readonly binding: BackendBinding) {
  }

  public async getRequiresForBuild(kind: Distribution, settings: ConfigSettings = {}): Promise<string[]> {
    const hook = REQUIRES_HOOKS[kind];
    const answer = await this.call(hook, { config_settings: settings });
    if (answer.type === 'not-implemented') { return []; }

    const value = answer.value;
    if (!Array.isArray(value) || !value.every(isString)) {
      throw new BackendRaisedError(hook, `expected a list of requirement strings, got ${JSON.stringify(value)}`);
    }
    return value;
  }

  /**
   * Build a distribution into 'outputDir', returning the basename of the file
   */
  public async build(kind: Distribution, outputDir: string, settings: ConfigSettings = {}, metadataDirectory?: string): Promise<string> {
    const hook = BUILD_HOOKS[kind];
    const kwargs: Record<string, JsonValue> = kind === 'sdist'
      ? { sdist_directory: outputDir, config_settings: settings }
      : { wheel_directory: outputDir, config_settings: settings, metadata_directory: metadataDirectory ?? null };

    const answer = await this.call(hook, kwargs);
    if (answer.type === 'not-implemented') {
      throw new BackendRaisedError(hook, 'the backend does not define this hook');
    }
    return this.basename(hook, answer.value);
  }

  /**
   * Write wheel metadata into 'outputDir', returning the basename of the .dist-info directory
   *
   * Undefined if the backend doesn't define the hook.
   */
  public async prepareMetadataForBuildWheel(outputDir: string, settings: ConfigSettings = {}): Promise<string | undefined> {
    const hook = 'prepare_metadata_for_build_wheel';
    const answer = await this.call(hook, { metadata_directory: outputDir, config_settings: settings });
    if (answer.type === 'not-implemented') { return undefined; }
    return this.basename(hook, answer.value);
  }

  /**
   * Produce the wheel's .dist-info directory in 'outputDir' and return its path
   *
   * Builds a whole wheel if that's the only way to get the metadata.
   */
  public async metadataPath(outputDir: string, settings: ConfigSettings = {}): Promise<string> {
    const distInfo = await this.prepareMetadataForBuildWheel(outputDir, settings);
    if (distInfo !== undefined) {
      return path.resolve(outputDir, distInfo);
    }

    return withTemporaryDirectory('pybuild-metadata-', async (scratch) => {
      const wheel = await this.build('wheel', scratch, settings);
      return extractDistInfo(path.join(scratch, wheel), outputDir);
    });
  }

  private async call(hook: HookName, kwargs: Record<string, JsonValue>): Promise<Answer> {
    const outcome = await this.transport.call({
      hook,
      kwargs,
      sourceDir: this.binding.sourceDir,
      pythonExecutable: this.binding.pythonExecutable,
      extraEnvironment: this.binding.extraEnvironment(),
      backend: this.binding.backend,
      backendPath: this.binding.backendPath,
    });

    switch (outcome.type) {
      case 'backend-raised':
        throw new BackendRaisedError(hook, outcome.message, outcome.traceback);
      case 'backend-unavailable':
        throw new BackendUnavailableError(hook, outcome.message, outcome.output);
      default:
        return outcome;
    }
  }

  private basename(hook: HookName, value: JsonValue): string {
    if (typeof value !== 'string' || value === '') {
      throw new BackendRaisedError(hook, `expected a file name, got ${JSON.stringify(value)}`);
    }
    return path.basename(value);
  }
}

/**
 * Extract the .dist-info directory of a wheel into 'outputDir' and return its path
 */
export function extractDistInfo(wheel: string, outputDir: string): string {
  const zip = new AdmZip(wheel);

  let distInfo: string | undefined;
  for (const entry of zip.getEntries()) {
    const m = /^([^/]+\.dist-info)\//.exec(entry.entryName);
    if (!m || entry.isDirectory) { continue; }

    distInfo = distInfo ?? m[1];
    if (m[1] === distInfo) {
      zip.extractEntryTo(entry, outputDir, true, true);
    }
  }

  if (distInfo === undefined) {
    throw new BackendRaisedError('build_wheel', `no .dist-info directory in ${path.basename(wheel)}`);
  }
  return path.resolve(outputDir, distInfo);
}

function isString(x: JsonValue): x is string {
  return typeof x === 'string';
}
