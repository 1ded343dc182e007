import { Specifier, SpecifierSet, Version } from '../lib/requirements/version';

test('versions sort by release, then pre-, post- and dev-release', () => {
  // GIVEN
  const versions = ['1.0.post1', '1.0', '1.0a1', '1.0.dev0', '1.0rc1', '0.9', '1.0b2', '1!0.1'];

  // WHEN
  const sorted = versions.map(v => Version.parse(v)).sort((a, b) => a.compare(b)).map(v => v.toString());

  // THEN
  expect(sorted).toEqual(['0.9', '1.0.dev0', '1.0a1', '1.0b2', '1.0rc1', '1.0', '1.0.post1', '1!0.1']);
});

test('trailing zeros do not matter', () => {
  expect(Version.parse('1.0.0').equals(Version.parse('1'))).toBe(true);
  expect(Version.parse('1.0.1').compare(Version.parse('1.0'))).toBe(1);
});

test('alternative spellings are normalized', () => {
  expect(Version.parse('1.0-alpha.2').toString()).toBe('1.0a2');
  expect(Version.parse('2.0-1').toString()).toBe('2.0.post1');
  expect(Version.parse('v3.0.DEV4').toString()).toBe('3.0.dev4');
});

test('local versions sort after the public version', () => {
  expect(Version.parse('1.0+local.1').compare(Version.parse('1.0'))).toBe(1);
});

test('invalid versions are rejected', () => {
  expect(Version.tryParse('not a version')).toBeUndefined();
  expect(() => Version.parse('1.0-')).toThrow(/Invalid version/);
});

test('comparison operators', () => {
  expect(Specifier.parse('>=1.0').contains('1.0')).toBe(true);
  expect(Specifier.parse('>=1.0').contains('0.9')).toBe(false);
  expect(Specifier.parse('<2').contains('1.9.9')).toBe(true);
  expect(Specifier.parse('!=1.5').contains('1.5.0')).toBe(false);
  expect(Specifier.parse('<=1.5').contains('1.5')).toBe(true);
});

test('pre-releases are eligible', () => {
  expect(Specifier.parse('>=1.0').contains('2.0b1')).toBe(true);
  expect(Specifier.parse('>=1.0').contains('1.0rc1')).toBe(false);
});

test('less-than does not match pre-releases of the boundary itself', () => {
  expect(Specifier.parse('<3.1').contains('3.1a1')).toBe(false);
  expect(Specifier.parse('<3.1').contains('3.0.9')).toBe(true);
  expect(Specifier.parse('<3.1a2').contains('3.1a1')).toBe(true);
});

test('greater-than does not match post-releases or local versions of the boundary', () => {
  expect(Specifier.parse('>3.1').contains('3.1.post1')).toBe(false);
  expect(Specifier.parse('>3.1').contains('3.1+local')).toBe(false);
  expect(Specifier.parse('>3.1').contains('3.1.1')).toBe(true);
});

test('compatible release', () => {
  const spec = Specifier.parse('~=2.2.1');
  expect(spec.contains('2.2.5')).toBe(true);
  expect(spec.contains('2.3')).toBe(false);
  expect(spec.contains('2.2.0')).toBe(false);
});

test('wildcard equality', () => {
  expect(Specifier.parse('==3.1.*').contains('3.1.7')).toBe(true);
  expect(Specifier.parse('==3.1.*').contains('3.2')).toBe(false);
  expect(Specifier.parse('!=3.1.*').contains('3.2')).toBe(true);
});

test('equality ignores the local segment unless the specifier has one', () => {
  expect(Specifier.parse('==1.0').contains('1.0+deb1')).toBe(true);
  expect(Specifier.parse('==1.0+deb1').contains('1.0+deb2')).toBe(false);
});

test('arbitrary equality compares strings', () => {
  expect(Specifier.parse('===foobar').contains('FooBar')).toBe(true);
  expect(Specifier.parse('===1.0').contains('1.0.0')).toBe(false);
});

test('malformed specifiers', () => {
  expect(Specifier.tryParse('>=1.*')).toBeUndefined();
  expect(Specifier.tryParse('~=1')).toBeUndefined();
  expect(Specifier.tryParse('=>1.0')).toBeUndefined();
});

test('specifier sets need every clause to hold', () => {
  // GIVEN
  const set = SpecifierSet.parse('>=1.0, <2, !=1.3');

  // THEN
  expect(set.contains('1.2')).toBe(true);
  expect(set.contains('1.3')).toBe(false);
  expect(set.contains('2.0')).toBe(false);
  expect(set.toString()).toBe('>=1.0,<2,!=1.3');
  expect(SpecifierSet.parse('').isEmpty).toBe(true);
});
