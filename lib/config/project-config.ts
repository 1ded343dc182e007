import * as path from 'path';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { readFileIfExists } from '../util/files';
import { errorMessage } from '../util/flow';

/**
 * The [build-system] table of a project
 */
export interface BuildSystem {
  readonly requires: string[];
  readonly buildBackend: string;

  /**
   * Directories (relative to the source tree) to load the backend from
   */
  readonly backendPath?: string[];
}

/**
 * What projects without a [build-system] table are built with
 */
export const DEFAULT_BUILD_SYSTEM: BuildSystem = {
  requires: ['setuptools >= 40.8.0'],
  buildBackend: 'setuptools.build_meta:__legacy__',
};

const pyprojectSchema = z.object({
  'build-system': z.record(z.unknown()).optional(),
});

const buildSystemSchema = z.object({
  'requires': z.array(z.string()),
  'build-backend': z.string().optional(),
  'backend-path': z.array(z.string()).optional(),
});

/**
 * Read the build system of the project in 'sourceDir'
 */
export async function readBuildSystem(sourceDir: string): Promise<BuildSystem> {
  const text = await readFileIfExists(path.join(sourceDir, 'pyproject.toml'));
  if (text === undefined) { return DEFAULT_BUILD_SYSTEM; }

  const buildSystem = parseBuildSystem(text);
  for (const entry of buildSystem.backendPath ?? []) {
    const relative = path.relative(path.resolve(sourceDir), path.resolve(sourceDir, entry));
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ConfigurationError(`'build-system.backend-path' entry must be inside the source tree: ${entry}`);
    }
  }
  return buildSystem;
}

export function parseBuildSystem(text: string): BuildSystem {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (e) {
    throw new ConfigurationError(`Failed to parse pyproject.toml: ${errorMessage(e)}`);
  }

  const pyproject = pyprojectSchema.safeParse(document);
  if (!pyproject.success) {
    throw new ConfigurationError(`Invalid pyproject.toml: ${formatIssues(pyproject.error)}`);
  }

  const table = pyproject.data['build-system'];
  if (table === undefined) { return DEFAULT_BUILD_SYSTEM; }

  if (!('requires' in table)) {
    throw new ConfigurationError("Failed to validate 'build-system' in pyproject.toml: missing 'requires'");
  }

  const parsed = buildSystemSchema.safeParse(table);
  if (!parsed.success) {
    throw new ConfigurationError(`Failed to validate 'build-system' in pyproject.toml: ${formatIssues(parsed.error)}`);
  }

  return {
    requires: Array.from(new Set(parsed.data.requires)),
    buildBackend: parsed.data['build-backend'] ?? DEFAULT_BUILD_SYSTEM.buildBackend,
    backendPath: parsed.data['backend-path'],
  };
}

function formatIssues(error: z.ZodError) {
  return error.issues.map(i => i.path.length > 0 ? `'${i.path.join('.')}' ${i.message.toLowerCase()}` : i.message).join(', ');
}
