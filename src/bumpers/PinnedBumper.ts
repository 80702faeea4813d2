import type { RequirementSpec, VersionSpecifier, VersionTarget } from '../requirements/RequirementSpec.js';
import { AbstractBumper } from './Bumper.js';
import { VersionNotFoundError } from './BumpErrors.js';

/**
 * Bumper for `pinned.txt` files, where every line is an exact pin.
 *
 * Range requests (`alpha>=1.2,<2`, `alpha==1.4.*`) resolve to the newest
 * published production version that satisfies them.
 */
export class PinnedBumper extends AbstractBumper {
  public readonly dialect = 'pinned' as const;

  override async resolveVersion(target: VersionTarget): Promise<string> {
    if (target.desiredVersion === 'latest' || !this.isRange(target)) {
      return await super.resolveVersion(target);
    }

    const specifiers: VersionSpecifier[] = [
      { operator: target.operator ?? '==', version: target.desiredVersion },
      ...(target.extraSpecifiers ?? []),
    ];

    const versions = await this.lookup(target.packageName, () => this.provider.versions(target.packageName));
    const best = this.comparator.findLatest(
      versions.filter((version) => this.comparator.satisfies(version, specifiers)),
    );

    if (!best) {
      throw new VersionNotFoundError(
        target.packageName,
        `No published version could satisfy the requirement(s): ${this.parser.format(target.packageName, specifiers)}`,
      );
    }

    this.log.Debug?.(`Resolved ${this.parser.format(target.packageName, specifiers)} to ${best}`);

    return best;
  }

  specifiersFor(
    _existing: RequirementSpec | undefined,
    _target: VersionTarget,
    resolved: string,
  ): VersionSpecifier[] {
    return [{ operator: '==', version: resolved }];
  }

  private isRange(target: VersionTarget): boolean {
    if (target.extraSpecifiers?.length) return true;
    if (target.operator === undefined || target.operator === '===') return false;
    if (target.operator === '==') return target.desiredVersion.endsWith('.*');
    return true;
  }
}
