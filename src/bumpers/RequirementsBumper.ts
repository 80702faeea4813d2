import type { RequirementOperator, RequirementSpec, VersionSpecifier, VersionTarget } from '../requirements/RequirementSpec.js';
import { AbstractBumper } from './Bumper.js';

const KEPT_OPERATORS: ReadonlySet<RequirementOperator> = new Set<RequirementOperator>(['==', '>=', '~=', '===']);

/**
 * Bumper for `requirements.txt` style files.
 *
 * A requested operator wins (`alpha>=2.0`). Otherwise a single `==`, `>=`,
 * `~=` or `===` constraint keeps its operator and anything else becomes `==`.
 */
export class RequirementsBumper extends AbstractBumper {
  public readonly dialect = 'requirements' as const;

  specifiersFor(
    existing: RequirementSpec | undefined,
    target: VersionTarget,
    resolved: string,
  ): VersionSpecifier[] {
    if (target.operator) {
      return [{ operator: target.operator, version: resolved }, ...(target.extraSpecifiers ?? [])];
    }

    const current = existing?.specifiers.length === 1 ? existing.specifiers[0].operator : undefined;
    const operator = current && KEPT_OPERATORS.has(current) ? current : '==';

    return [{ operator, version: resolved }];
  }
}
