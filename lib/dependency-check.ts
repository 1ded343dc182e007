import { Interpreter, InstalledDistribution } from './python/interpreter';
import { MarkerEnvironment } from './requirements/markers';
import { normalizeName } from './requirements/names';
import { Requirement } from './requirements/requirement';

/**
 * A requirement that isn't satisfied, and how we got there
 */
export interface UnmetDependency {
  /**
   * The requirement that is missing or installed at the wrong version
   */
  readonly requirement: string;

  /**
   * From the missing requirement up to the top-level requirement that pulled it in
   */
  readonly chain: string[];
}

export interface DistributionIndex {
  find(name: string): InstalledDistribution | undefined;
}

/**
 * Installed distributions, looked up by normalized name
 *
 * Like the import system, the first distribution found for a name wins.
 */
export class InstalledDistributions implements DistributionIndex {
  public static async fromInterpreter(interpreter: Interpreter, paths?: string[]) {
    return new InstalledDistributions(await interpreter.distributions(paths));
  }

  private readonly byName = new Map<string, InstalledDistribution>();

  constructor(distributions: InstalledDistribution[]) {
    for (const d of distributions) {
      const key = normalizeName(d.name);
      if (!this.byName.has(key)) {
        this.byName.set(key, d);
      }
    }
  }

  public find(name: string) {
    return this.byName.get(normalizeName(name));
  }
}

export interface DependencyCheckContext {
  readonly markers: MarkerEnvironment;
  readonly installed: DistributionIndex;
}

/**
 * Find the requirements that aren't satisfied by the installed distributions
 *
 * Walks the requirements of installed distributions as well. A package that
 * already occurs on the path from the top-level requirement is not visited
 * again, so cyclic metadata terminates.
 */
export function checkDependencies(requirements: Iterable<string>, context: DependencyCheckContext): UnmetDependency[] {
  const ret = new Array<UnmetDependency>();
  const reported = new Set<string>();

  for (const r of requirements) {
    visit(r, [], new Set(), []);
  }
  return ret;

  function visit(reqString: string, ancestors: string[], ancestorNames: Set<string>, parentExtras: string[]) {
    const req = Requirement.parse(reqString);
    if (ancestorNames.has(req.normalizedName)) { return; }
    if (!req.appliesTo(context.markers, parentExtras)) { return; }

    const chain = [reqString, ...ancestors];
    const dist = context.installed.find(req.name);
    if (!dist || (req.url === undefined && !req.specifier.contains(dist.version))) {
      const key = chain.join('\0');
      if (!reported.has(key)) {
        reported.add(key);
        ret.push({ requirement: reqString, chain });
      }
      return;
    }

    const names = new Set(ancestorNames).add(req.normalizedName);
    for (const child of dist.requires) {
      visit(child, chain, names, req.extras);
    }
  }
}
