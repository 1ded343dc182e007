import { SimpleError } from '../util/flow';

const VERSION_PATTERN = new RegExp(
  '^v?' +
  '(?:(\\d+)!)?' +                                                      // epoch
  '(\\d+(?:\\.\\d+)*)' +                                                // release
  '(?:[-_.]?(a|b|c|rc|alpha|beta|pre|preview)[-_.]?(\\d+)?)?' +         // pre
  '(?:-(\\d+)|[-_.]?(post|rev|r)[-_.]?(\\d+)?)?' +                      // post
  '(?:[-_.]?(dev)[-_.]?(\\d+)?)?' +                                     // dev
  '(?:\\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$',                           // local
  'i');

export type PreReleaseLabel = 'a' | 'b' | 'rc';

export class InvalidVersion extends SimpleError {
}

/**
 * A Python package version
 */
export class Version {
  public static parse(s: string): Version {
    const v = Version.tryParse(s);
    if (!v) {
      throw new InvalidVersion(`Invalid version: '${s}'`);
    }
    return v;
  }

  public static tryParse(s: string): Version | undefined {
    const m = VERSION_PATTERN.exec(s.trim());
    if (!m) { return undefined; }

    const [, epoch, release, preL, preN, postN1, postL, postN2, devL, devN, local] = m;
    return new Version(
      epoch !== undefined ? parseInt(epoch, 10) : 0,
      release.split('.').map(x => parseInt(x, 10)),
      preL !== undefined ? [normalizePreLabel(preL), parseInt(preN ?? '0', 10)] : undefined,
      postN1 !== undefined ? parseInt(postN1, 10) : postL !== undefined ? parseInt(postN2 ?? '0', 10) : undefined,
      devL !== undefined ? parseInt(devN ?? '0', 10) : undefined,
      local !== undefined ? local.toLowerCase().split(/[-_.]/).map(seg => /^\d+$/.test(seg) ? parseInt(seg, 10) : seg) : undefined,
    );
  }

  constructor(
    public readonly epoch: number,
    public readonly release: number[],
    public readonly pre?: readonly [PreReleaseLabel, number],
    public readonly post?: number,
    public readonly dev?: number,
    public readonly local?: Array<string | number>) {
  }

  public get isPrerelease() {
    return this.pre !== undefined || this.dev !== undefined;
  }

  public get isPostrelease() {
    return this.post !== undefined;
  }

  /**
   * The version without pre-, post-, dev- or local segments
   */
  public get base(): Version {
    return new Version(this.epoch, this.release);
  }

  /**
   * The version without its local segment
   */
  public get public(): Version {
    return new Version(this.epoch, this.release, this.pre, this.post, this.dev);
  }

  public compare(other: Version): number {
    return compareKeys(this.sortKey(), other.sortKey());
  }

  public equals(other: Version) {
    return this.compare(other) === 0;
  }

  public toString() {
    const parts = new Array<string>();
    if (this.epoch !== 0) { parts.push(`${this.epoch}!`); }
    parts.push(this.release.join('.'));
    if (this.pre) { parts.push(`${this.pre[0]}${this.pre[1]}`); }
    if (this.post !== undefined) { parts.push(`.post${this.post}`); }
    if (this.dev !== undefined) { parts.push(`.dev${this.dev}`); }
    if (this.local) { parts.push(`+${this.local.join('.')}`); }
    return parts.join('');
  }

  private sortKey(): SortKey {
    const release = [...this.release];
    while (release.length > 1 && release[release.length - 1] === 0) {
      release.pop();
    }

    let pre: number[];
    if (this.pre === undefined && this.post === undefined && this.dev !== undefined) {
      // 1.0.dev0 sorts before 1.0a0
      pre = [-Infinity];
    } else if (this.pre === undefined) {
      pre = [Infinity];
    } else {
      pre = [PRE_RANK[this.pre[0]], this.pre[1]];
    }

    return [
      [this.epoch],
      release,
      pre,
      [this.post ?? -Infinity],
      [this.dev ?? Infinity],
      // Numeric local segments sort above alphanumeric ones
      (this.local ?? []).map(seg => typeof seg === 'number' ? [seg, ''] : [-Infinity, seg]),
    ];
  }
}

const PRE_RANK: Record<PreReleaseLabel, number> = { a: 0, b: 1, rc: 2 };

function normalizePreLabel(label: string): PreReleaseLabel {
  switch (label.toLowerCase()) {
    case 'a':
    case 'alpha':
      return 'a';
    case 'b':
    case 'beta':
      return 'b';
    default:
      return 'rc';
  }
}

type KeyAtom = number | string | KeyAtom[];
type SortKey = KeyAtom[];

function compareKeys(a: KeyAtom[], b: KeyAtom[]): number {
  const n = Math.max(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i];
    const y = b[i];
    // A shorter release sorts as if padded with zeros, a shorter local as smaller
    if (x === undefined) { return y === undefined ? 0 : compareAtoms(0, y) || -1; }
    if (y === undefined) { return compareAtoms(x, 0) || 1; }
    const c = compareAtoms(x, y);
    if (c !== 0) { return c; }
  }
  return 0;
}

function compareAtoms(x: KeyAtom, y: KeyAtom): number {
  if (Array.isArray(x) && Array.isArray(y)) { return compareKeys(x, y); }
  if (typeof x === 'number' && typeof y === 'number') { return x === y ? 0 : x < y ? -1 : 1; }
  if (typeof x === 'string' && typeof y === 'string') { return x === y ? 0 : x < y ? -1 : 1; }
  return 0;
}

export type SpecifierOperator = '~=' | '==' | '!=' | '<=' | '>=' | '<' | '>' | '===';

const SPECIFIER_PATTERN = /^\s*(~=|===|==|!=|<=|>=|<|>)\s*([^\s,;]+)\s*$/;

/**
 * A single version clause, like '>= 1.0'
 */
export class Specifier {
  public static parse(s: string): Specifier {
    const ret = Specifier.tryParse(s);
    if (!ret) {
      throw new InvalidVersion(`Invalid version specifier: '${s}'`);
    }
    return ret;
  }

  public static tryParse(s: string): Specifier | undefined {
    const m = SPECIFIER_PATTERN.exec(s);
    if (!m || !isOperator(m[1])) { return undefined; }
    const operator = m[1];
    const version = m[2];

    if (operator === '===') {
      return new Specifier(operator, version);
    }

    const wildcard = version.endsWith('.*');
    if (wildcard && operator !== '==' && operator !== '!=') { return undefined; }

    const parsed = Version.tryParse(wildcard ? version.slice(0, -2) : version);
    if (!parsed) { return undefined; }
    if (operator === '~=' && parsed.release.length < 2) { return undefined; }

    return new Specifier(operator, version);
  }

  constructor(public readonly operator: SpecifierOperator, public readonly version: string) {
  }

  /**
   * Whether the given version satisfies this clause
   *
   * Pre-releases are always eligible.
   */
  public contains(candidate: string): boolean {
    const operator = this.operator;
    if (operator === '===') {
      return candidate.trim().toLowerCase() === this.version.toLowerCase();
    }

    const v = Version.tryParse(candidate);
    if (!v) { return false; }

    switch (operator) {
      case '==': return this.matchesEqual(v);
      case '!=': return !this.matchesEqual(v);
      case '~=': return this.matchesCompatible(v);
      case '<=': return v.public.compare(this.target) <= 0;
      case '>=': return v.public.compare(this.target) >= 0;
      case '<': return this.matchesLess(v);
      case '>': return this.matchesGreater(v);
    }
  }

  public toString() {
    return `${this.operator}${this.version}`;
  }

  private get target(): Version {
    return Version.parse(this.version);
  }

  private matchesEqual(v: Version) {
    if (this.version.endsWith('.*')) {
      return matchesPrefix(v, Version.parse(this.version.slice(0, -2)));
    }
    const target = this.target;
    // Local versions of the target match, unless the target names a local version itself
    return target.local !== undefined ? v.equals(target) : v.public.equals(target);
  }

  private matchesCompatible(v: Version) {
    const target = this.target;
    const prefix = new Version(target.epoch, target.release.slice(0, -1));
    return v.public.compare(target) >= 0 && matchesPrefix(v, prefix);
  }

  private matchesLess(v: Version) {
    const target = this.target;
    if (v.public.compare(target) >= 0) { return false; }
    // <3.1 should not match 3.1a1, unless asked for a pre-release
    return target.isPrerelease || !v.isPrerelease || !v.base.equals(target.base);
  }

  private matchesGreater(v: Version) {
    const target = this.target;
    if (v.public.compare(target) <= 0) { return false; }
    if (!target.isPostrelease && v.isPostrelease && v.base.equals(target.base)) { return false; }
    // 3.1+local is technically greater than 3.1, but not meant by >3.1
    return v.local === undefined || !v.base.equals(target.base);
  }
}

function matchesPrefix(v: Version, prefix: Version) {
  if (v.epoch !== prefix.epoch) { return false; }
  return prefix.release.every((seg, i) => (v.release[i] ?? 0) === seg);
}

function isOperator(x: string | undefined): x is SpecifierOperator {
  return x !== undefined && ['~=', '==', '!=', '<=', '>=', '<', '>', '==='].includes(x);
}

/**
 * A comma-separated list of clauses, all of which must hold
 */
export class SpecifierSet {
  public static parse(s: string): SpecifierSet {
    const trimmed = s.trim();
    if (trimmed === '') { return new SpecifierSet([]); }
    return new SpecifierSet(trimmed.split(',').map(Specifier.parse));
  }

  constructor(public readonly specifiers: Specifier[]) {
  }

  public get isEmpty() {
    return this.specifiers.length === 0;
  }

  public contains(version: string) {
    return this.specifiers.every(s => s.contains(version));
  }

  public toString() {
    return this.specifiers.map(s => s.toString()).join(',');
  }
}
