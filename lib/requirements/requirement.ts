import { errorMessage, SimpleError } from '../util/flow';
import { Marker, MarkerEnvironment } from './markers';
import { normalizeName } from './names';
import { SpecifierSet } from './version';

export class InvalidRequirement extends SimpleError {
}

const NAME_PATTERN = /^\s*([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*/;

/**
 * A parsed requirement specifier, like 'requests[socks] >= 2.0; python_version >= "3.8"'
 */
export class Requirement {
  public static parse(s: string): Requirement {
    const m = NAME_PATTERN.exec(s);
    if (!m) {
      throw new InvalidRequirement(`Invalid requirement: '${s}'`);
    }
    const name = m[1];
    let rest = s.slice(m[0].length);

    let extras = new Array<string>();
    if (rest.startsWith('[')) {
      const close = rest.indexOf(']');
      if (close === -1) {
        throw new InvalidRequirement(`Invalid requirement, unclosed extras: '${s}'`);
      }
      extras = rest.slice(1, close).split(',').map(e => e.trim()).filter(e => e !== '');
      rest = rest.slice(close + 1).trimStart();
    }

    let url: string | undefined;
    let specifierText = '';
    let markerText: string | undefined;
    if (rest.startsWith('@')) {
      // URL requirements need whitespace before the marker separator
      const sep = /\s+;/.exec(rest);
      url = (sep ? rest.slice(1, sep.index) : rest.slice(1)).trim();
      markerText = sep ? rest.slice(sep.index + sep[0].length) : undefined;
      if (url === '') {
        throw new InvalidRequirement(`Invalid requirement, empty URL: '${s}'`);
      }
    } else {
      const semi = rest.indexOf(';');
      specifierText = (semi === -1 ? rest : rest.slice(0, semi)).trim();
      markerText = semi === -1 ? undefined : rest.slice(semi + 1);
      if (specifierText.startsWith('(') && specifierText.endsWith(')')) {
        specifierText = specifierText.slice(1, -1);
      }
    }

    let specifier: SpecifierSet;
    try {
      specifier = SpecifierSet.parse(specifierText);
    } catch (e) {
      throw new InvalidRequirement(`Invalid requirement '${s}': ${errorMessage(e)}`);
    }

    const marker = markerText !== undefined && markerText.trim() !== '' ? Marker.parse(markerText) : undefined;
    if (markerText !== undefined && marker === undefined) {
      throw new InvalidRequirement(`Invalid requirement, empty marker: '${s}'`);
    }

    return new Requirement(name, extras, specifier, url, marker);
  }

  constructor(
    public readonly name: string,
    public readonly extras: string[],
    public readonly specifier: SpecifierSet,
    public readonly url?: string,
    public readonly marker?: Marker) {
  }

  public get normalizedName() {
    return normalizeName(this.name);
  }

  /**
   * Whether this requirement applies, given the extras requested by whatever pulled it in
   */
  public appliesTo(env: MarkerEnvironment, requestedExtras: readonly string[] = []): boolean {
    if (!this.marker) { return true; }
    const marker = this.marker;
    return ['', ...requestedExtras].some(extra => marker.evaluate(env, extra));
  }

  public toString() {
    const parts = [this.name];
    if (this.extras.length > 0) {
      parts.push(`[${[...this.extras].sort().join(',')}]`);
    }
    if (this.url !== undefined) {
      parts.push(` @ ${this.url}`);
      if (this.marker) { parts.push(' '); }
    } else {
      parts.push(this.specifier.toString());
    }
    if (this.marker) {
      parts.push(`; ${this.marker}`);
    }
    return parts.join('');
  }
}
