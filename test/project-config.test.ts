import { promises as fs } from 'fs';
import * as path from 'path';
import { DEFAULT_BUILD_SYSTEM, parseBuildSystem, readBuildSystem } from '../lib/config/project-config';
import { ConfigurationError } from '../lib/errors';
import { rimraf } from '../lib/util/files';
import { makeTempDir } from './fakes';

test('build-system table is read', () => {
  // WHEN
  const buildSystem = parseBuildSystem([
    '[build-system]',
    'requires = ["flit_core >=3.2,<4", "flit_core >=3.2,<4", "tomli"]',
    'build-backend = "flit_core.buildapi"',
    'backend-path = ["_build"]',
  ].join('\n'));

  // THEN
  expect(buildSystem).toEqual({
    requires: ['flit_core >=3.2,<4', 'tomli'],
    buildBackend: 'flit_core.buildapi',
    backendPath: ['_build'],
  });
});

test('no build-system table means legacy setuptools', () => {
  expect(parseBuildSystem('[project]\nname = "pkg"\n')).toBe(DEFAULT_BUILD_SYSTEM);
  expect(DEFAULT_BUILD_SYSTEM).toEqual({
    requires: ['setuptools >= 40.8.0'],
    buildBackend: 'setuptools.build_meta:__legacy__',
  });
});

test('missing build-backend means the legacy setuptools backend', () => {
  const buildSystem = parseBuildSystem('[build-system]\nrequires = ["setuptools", "wheel"]\n');
  expect(buildSystem.buildBackend).toBe('setuptools.build_meta:__legacy__');
  expect(buildSystem.requires).toEqual(['setuptools', 'wheel']);
});

test('missing requires is an error', () => {
  expect(() => parseBuildSystem('[build-system]\nbuild-backend = "x"\n'))
    .toThrow("Failed to validate 'build-system' in pyproject.toml: missing 'requires'");
});

test('wrongly typed fields are errors', () => {
  expect(() => parseBuildSystem('[build-system]\nrequires = "setuptools"\n')).toThrow(ConfigurationError);
  expect(() => parseBuildSystem('[build-system]\nrequires = []\nbuild-backend = 3\n')).toThrow(ConfigurationError);
  expect(() => parseBuildSystem('[build-system]\nrequires = []\nbackend-path = "x"\n')).toThrow(ConfigurationError);
  expect(() => parseBuildSystem('build-system = 1\n')).toThrow(ConfigurationError);
});

test('invalid TOML is an error', () => {
  expect(() => parseBuildSystem('[build-system\nrequires = [')).toThrow(/^Failed to parse pyproject.toml/);
});

test('a project without pyproject.toml gets the defaults', async () => {
  // GIVEN
  const dir = await makeTempDir();
  try {
    // THEN
    expect(await readBuildSystem(dir)).toBe(DEFAULT_BUILD_SYSTEM);
  } finally {
    await rimraf(dir);
  }
});

test('backend-path must stay inside the source tree', async () => {
  // GIVEN
  const dir = await makeTempDir();
  try {
    await fs.writeFile(path.join(dir, 'pyproject.toml'), '[build-system]\nrequires = []\nbuild-backend = "b"\nbackend-path = ["../elsewhere"]\n');

    // THEN
    await expect(readBuildSystem(dir)).rejects.toThrow(ConfigurationError);
  } finally {
    await rimraf(dir);
  }
});
