/**
 * Normalize a project name so that different spellings compare equal
 *
 * 'Foo.Bar', 'foo_bar' and 'FOO-bar' all become 'foo-bar'.
 */
export function normalizeName(name: string) {
  return name.replace(/[-_.]+/g, '-').toLowerCase();
}
