import { promises as fs } from 'fs';
import * as path from 'path';
import { CoreMetadata, projectWheelMetadata } from '../lib/metadata';
import { rimraf } from '../lib/util/files';
import { FakeInterpreter, FakeTransport, makeTempDir } from './fakes';

const METADATA = [
  'Metadata-Version: 2.1',
  'Name: pkg',
  'Version: 1.0',
  'Classifier: Programming Language :: Python',
  'classifier: Typing :: Typed',
  'License: line one',
  '        line two',
  '',
  'A long description',
  'over two lines',
  '',
  '',
].join('\n');

test('headers are looked up without regard to case', () => {
  // WHEN
  const metadata = CoreMetadata.parse(METADATA);

  // THEN
  expect(metadata.name).toBe('pkg');
  expect(metadata.version).toBe('1.0');
  expect(metadata.getAll('CLASSIFIER')).toEqual(['Programming Language :: Python', 'Typing :: Typed']);
  expect(metadata.get('Requires-Python')).toBeUndefined();
});

test('continuation lines belong to the header before them', () => {
  expect(CoreMetadata.parse(METADATA).get('license')).toBe('line one\nline two');
});

test('the body is the description', () => {
  // WHEN
  const metadata = CoreMetadata.parse(METADATA);

  // THEN
  expect(metadata.body).toBe('A long description\nover two lines');
  expect(metadata.keys).toEqual(['Metadata-Version', 'Name', 'Version', 'Classifier', 'classifier', 'License']);
});

test('wheel metadata of a project comes from the metadata hook', async () => {
  // GIVEN
  const sourceDir = await makeTempDir();
  try {
    const transport = new FakeTransport(async (inv) => {
      if (inv.hook !== 'prepare_metadata_for_build_wheel') { return { type: 'not-implemented' }; }
      const distInfo = path.join(String(inv.kwargs.metadata_directory), 'pkg-1.0.dist-info');
      await fs.mkdir(distInfo);
      await fs.writeFile(path.join(distInfo, 'METADATA'), 'Metadata-Version: 2.1\nName: pkg\nVersion: 1.0\n');
      return { type: 'success', value: 'pkg-1.0.dist-info' };
    });

    // WHEN
    const metadata = await projectWheelMetadata(sourceDir, { isolated: false, host: new FakeInterpreter(), transport });

    // THEN
    expect(metadata.name).toBe('pkg');
    expect(metadata.version).toBe('1.0');
    expect(transport.invocations.map(i => i.hook)).toEqual(['prepare_metadata_for_build_wheel']);
    expect(transport.invocations[0].pythonExecutable).toBe('/usr/bin/python3');
  } finally {
    await rimraf(sourceDir);
  }
});
