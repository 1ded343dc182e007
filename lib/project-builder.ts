import { promises as fs } from 'fs';
import * as path from 'path';
import { BackendGateway } from './backend/gateway';
import { ConfigSettings, Distribution, HookTransport } from './backend/hooks';
import { SubprocessHookTransport } from './backend/subprocess-transport';
import { BuildSystem, readBuildSystem } from './config/project-config';
import { checkDependencies, DependencyCheckContext, InstalledDistributions, UnmetDependency } from './dependency-check';
import { IsolatedEnvironment } from './env/environment';
import { Interpreter, PythonInterpreter } from './python/interpreter';
import { Logger } from './util/log';
import { SubprocessRunner } from './util/process';

export interface ProjectBuilderOptions {
  /**
   * Interpreter to run hooks with when not bound to an isolated environment
   *
   * Also the interpreter whose installed distributions the dependency check looks at.
   *
   * @default the host interpreter
   */
  readonly host?: Interpreter;

  /**
   * @default run the hook runner script in a subprocess
   */
  readonly transport?: HookTransport;

  /**
   * Extra environment variables for hooks, on top of those of the environment
   */
  readonly environment?: Record<string, string>;

  readonly log?: Logger;
}

/**
 * The operations of building one project
 */
export class ProjectBuilder {
  /**
   * Builder that runs hooks with the host interpreter
   */
  public static async fromSourceDir(sourceDir: string, options: ProjectBuilderOptions = {}): Promise<ProjectBuilder> {
    const host = options.host ?? PythonInterpreter.host();
    const buildSystem = await readBuildSystem(sourceDir);
    return new ProjectBuilder(sourceDir, buildSystem, host, host.executable, () => ({}), options);
  }

  /**
   * Builder that runs hooks inside an isolated environment
   */
  public static async fromIsolatedEnv(env: IsolatedEnvironment, sourceDir: string, options: ProjectBuilderOptions = {}): Promise<ProjectBuilder> {
    const buildSystem = await readBuildSystem(sourceDir);
    return new ProjectBuilder(
      sourceDir,
      buildSystem,
      options.host ?? new PythonInterpreter(env.pythonExecutable),
      env.pythonExecutable,
      () => env.extraEnvironment(),
      options);
  }

  public readonly sourceDir: string;
  private readonly gateway: BackendGateway;

  private constructor(
    sourceDir: string,
    private readonly buildSystem: BuildSystem,
    private readonly interpreter: Interpreter,
    public readonly pythonExecutable: string,
    envExtra: () => Record<string, string>,
    private readonly options: ProjectBuilderOptions) {
    this.sourceDir = path.resolve(sourceDir);

    const transport = options.transport ?? new SubprocessHookTransport(new SubprocessRunner(options.log ?? Logger.silent()));
    this.gateway = new BackendGateway(transport, {
      sourceDir: this.sourceDir,
      pythonExecutable,
      backend: buildSystem.buildBackend,
      backendPath: buildSystem.backendPath,
      extraEnvironment: () => ({ ...envExtra(), ...options.environment }),
    });
  }

  /**
   * The requirements from the [build-system] table
   */
  public get buildSystemRequires(): string[] {
    return [...this.buildSystem.requires];
  }

  public get buildBackend(): string {
    return this.buildSystem.buildBackend;
  }

  /**
   * Requirements the backend needs on top of the build-system requirements
   */
  public async getRequiresForBuild(kind: Distribution, settings: ConfigSettings = {}): Promise<string[]> {
    this.options.log?.info(`Getting build dependencies for ${kind}...`);
    return this.gateway.getRequiresForBuild(kind, settings);
  }

  /**
   * Requirements for building 'kind' that the interpreter doesn't satisfy
   *
   * An empty list means the build can go ahead.
   */
  public async checkDependencies(kind: Distribution, settings: ConfigSettings = {}, context?: DependencyCheckContext): Promise<UnmetDependency[]> {
    const requirements = [...this.buildSystem.requires, ...await this.getRequiresForBuild(kind, settings)];
    return checkDependencies(requirements, context ?? await this.dependencyCheckContext());
  }

  /**
   * Prepare metadata for a distribution, if the backend can do so without building
   *
   * Returns the path of the metadata directory, or undefined.
   */
  public async prepare(kind: Distribution, outputDir: string, settings: ConfigSettings = {}): Promise<string | undefined> {
    if (kind !== 'wheel') { return undefined; }

    await fs.mkdir(outputDir, { recursive: true });
    const distInfo = await this.gateway.prepareMetadataForBuildWheel(path.resolve(outputDir), settings);
    return distInfo !== undefined ? path.resolve(outputDir, distInfo) : undefined;
  }

  /**
   * Build a distribution, returning the absolute path of the artifact
   */
  public async build(kind: Distribution, outputDir: string, settings: ConfigSettings = {}, metadataDirectory?: string): Promise<string> {
    this.options.log?.info(`Building ${kind}...`);

    const absOutputDir = path.resolve(outputDir);
    await fs.mkdir(absOutputDir, { recursive: true });
    const basename = await this.gateway.build(kind, absOutputDir, settings, metadataDirectory);
    return path.join(absOutputDir, basename);
  }

  /**
   * Generate the wheel metadata in 'outputDir' and return the path of the .dist-info directory
   */
  public async metadataPath(outputDir: string, settings: ConfigSettings = {}): Promise<string> {
    const absOutputDir = path.resolve(outputDir);
    await fs.mkdir(absOutputDir, { recursive: true });
    return this.gateway.metadataPath(absOutputDir, settings);
  }

  private async dependencyCheckContext(): Promise<DependencyCheckContext> {
    const description = await this.interpreter.describe();
    return {
      markers: description.markers,
      installed: await InstalledDistributions.fromInterpreter(this.interpreter),
    };
  }
}
