import { promises as fs } from 'fs';
import * as path from 'path';
import { HookTransport } from './backend/hooks';
import { DefaultIsolatedEnv } from './env/isolated-env';
import { EnvImpl, StrategyResolver } from './env/strategies';
import { ProjectBuilder } from './project-builder';
import { Interpreter } from './python/interpreter';
import { withTemporaryDirectory } from './util/files';
import { Logger } from './util/log';
import { ProcessRunner } from './util/process';

/**
 * Core metadata of a distribution, as found in a METADATA file
 *
 * Header lookups ignore case. The message body, if any, is the description.
 */
export class CoreMetadata {
  public static parse(text: string): CoreMetadata {
    const headers = new Array<[string, string]>();
    const lines = text.split(/\r?\n/);

    let i = 0;
    for (; i < lines.length; i++) {
      const line = lines[i];
      if (line === '') { i++; break; }

      const last = headers[headers.length - 1];
      if (/^[ \t]/.test(line) && last !== undefined) {
        // Continuation of the previous header
        last[1] += '\n' + line.trim();
        continue;
      }

      const colon = line.indexOf(':');
      if (colon === -1) { continue; }
      headers.push([line.slice(0, colon).trim(), line.slice(colon + 1).trim()]);
    }

    return new CoreMetadata(headers, lines.slice(i).join('\n').replace(/\n+$/, ''));
  }

  constructor(private readonly headers: Array<[string, string]>, public readonly body: string) {
  }

  public get name(): string | undefined {
    return this.get('Name');
  }

  public get version(): string | undefined {
    return this.get('Version');
  }

  public get(key: string): string | undefined {
    return this.getAll(key)[0];
  }

  public getAll(key: string): string[] {
    const lower = key.toLowerCase();
    return this.headers.filter(([k]) => k.toLowerCase() === lower).map(([, v]) => v);
  }

  public get keys(): string[] {
    return Array.from(new Set(this.headers.map(([k]) => k)));
  }
}

export interface WheelMetadataOptions {
  /**
   * Ask the backend from inside a fresh isolated environment
   *
   * @default true
   */
  readonly isolated?: boolean;
  readonly envImpl?: EnvImpl;
  readonly log?: Logger;
  readonly host?: Interpreter;
  readonly runner?: ProcessRunner;
  readonly transport?: HookTransport;
  readonly strategies?: StrategyResolver;
}

/**
 * The metadata of the wheel the project in 'sourceDir' would build
 *
 * Uses the metadata hook where the backend has one, otherwise builds the wheel.
 */
export async function projectWheelMetadata(sourceDir: string, options: WheelMetadataOptions = {}): Promise<CoreMetadata> {
  const log = options.log ?? Logger.silent();

  return withTemporaryDirectory('pybuild-metadata-', async (outputDir) => {
    let distInfo: string;
    if (options.isolated ?? true) {
      distInfo = await DefaultIsolatedEnv.with({
        envImpl: options.envImpl,
        log,
        host: options.host,
        runner: options.runner,
        strategies: options.strategies,
      }, async (env) => {
        const builder = await ProjectBuilder.fromIsolatedEnv(env, sourceDir, { transport: options.transport, log });
        await env.install(builder.buildSystemRequires);
        await env.install(await builder.getRequiresForBuild('wheel'));
        return builder.metadataPath(outputDir);
      });
    } else {
      const builder = await ProjectBuilder.fromSourceDir(sourceDir, { host: options.host, transport: options.transport, log });
      distInfo = await builder.metadataPath(outputDir);
    }

    return CoreMetadata.parse(await fs.readFile(path.join(distInfo, 'METADATA'), { encoding: 'utf-8' }));
  });
}
