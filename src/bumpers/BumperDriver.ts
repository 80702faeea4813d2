/**
 * Orchestrates one bump run over a requirements document.
 *
 * A run has two phases:
 *
 * 1. **Apply** - each requested package (deduplicated, in request order) is
 *    resolved and bumped exactly once, rewriting every line that declares it.
 * 2. **Verify** - every declaration that was not bumped, plus every
 *    `requires=` requirement announced in the bumped packages' changelogs, is
 *    checked against the versions now in effect. Unmet requirements are
 *    reported, never bumped.
 *
 * @module
 */

import type { VersionProvider } from '../deps/VersionProvider.js';
import { VersionComparator } from '../deps/VersionComparator.js';
import { RequirementParser } from '../requirements/RequirementParser.js';
import type { LocatedRequirement, RequirementsDocument } from '../requirements/RequirementsDocument.js';
import type { RequirementSpec, RequirementsDialect, VersionTarget } from '../requirements/RequirementSpec.js';
import { type BumpLog, silentLog } from '../services/BumpLog.js';
import type { Bumper } from './Bumper.js';
import { bumperFor } from './BumperRegistry.js';
import { errorMessage, PackageNotFoundError, VersionNotFoundError } from './BumpErrors.js';
import type {
  BumpDecision,
  BumperOptions,
  BumpOutcome,
  BumpResult,
  Change,
  ChangeLocation,
  SkipReason,
  UnresolvedRequirement,
} from './BumpTypes.js';

export interface BumperDriverOptions extends BumperOptions {
  /** Dialect used when bumping without a document (default: 'requirements') */
  dialect?: RequirementsDialect;
}

interface RequirementCheck {
  spec: RequirementSpec;
  requiredBy?: string;
}

/**
 * Runs bumps for a document, or ad hoc when there is none.
 *
 * @example Bump two packages in a loaded document
 * ```typescript
 * const driver = new BumperDriver(new PyPIVersionResolver(), { includeChangelog: true });
 * const result = await driver.bump(document, [
 *   { packageName: 'alpha', desiredVersion: 'latest' },
 *   { packageName: 'beta', desiredVersion: '1.4.0' },
 * ]);
 *
 * console.log(new BumpSummary().render(result, document.dialect));
 * ```
 */
export class BumperDriver {
  protected comparator = new VersionComparator();
  protected parser = new RequirementParser();
  protected log: BumpLog;
  private bumpers = new Map<RequirementsDialect, Bumper>();

  public constructor(
    protected provider: VersionProvider,
    protected options: BumperDriverOptions = {},
  ) {
    this.log = options.log ?? silentLog;
  }

  /**
   * Targets used when a document is bumped without explicit requests: every
   * `==` pin moves to latest.
   */
  defaultTargets(document: RequirementsDocument): VersionTarget[] {
    const seen = new Set<string>();
    const targets: VersionTarget[] = [];

    for (const { spec } of document.flatten()) {
      if (spec.operator !== 'exact' || spec.specifiers.length !== 1 || seen.has(spec.packageName)) continue;

      seen.add(spec.packageName);
      targets.push({ packageName: spec.name, desiredVersion: 'latest' });
    }

    return targets;
  }

  /**
   * Bump the requested packages. Per-package failures are recorded on the
   * result; only errors from the document itself propagate.
   *
   * @param document - Document to edit in place, or undefined for an ad-hoc run
   * @param targets - Requested bumps; empty means {@link defaultTargets}
   */
  async bump(document: RequirementsDocument | undefined, targets: VersionTarget[]): Promise<BumpResult> {
    const result: BumpResult = { changes: [], skipped: [], unresolved: [], warnings: [], outcomes: [] };

    const requested = document && targets.length === 0
      ? this.defaultTargets(document)
      : this.dedupe(targets, result);

    const bumper = this.bumperOf(document?.dialect ?? this.options.dialect ?? 'requirements');

    for (const target of requested) {
      const outcome: BumpOutcome = { packageName: this.parser.normalizeName(target.packageName), state: 'pending' };
      result.outcomes.push(outcome);

      await this.apply(bumper, document, target, outcome, result);
    }

    this.verify(document, result);

    for (const outcome of result.outcomes) {
      if (outcome.state === 'bumped') outcome.state = 'verified';
    }

    return result;
  }

  private bumperOf(dialect: RequirementsDialect): Bumper {
    let bumper = this.bumpers.get(dialect);
    if (!bumper) {
      bumper = bumperFor(dialect, this.provider, this.options);
      this.bumpers.set(dialect, bumper);
    }

    return bumper;
  }

  private dedupe(targets: VersionTarget[], result: BumpResult): VersionTarget[] {
    const unique = new Map<string, VersionTarget>();

    for (const target of targets) {
      const key = this.parser.normalizeName(target.packageName);

      if (unique.has(key)) {
        this.warn(result, `${target.packageName} was requested more than once; using the first request`);
        continue;
      }

      unique.set(key, target);
    }

    return [...unique.values()];
  }

  private async apply(
    bumper: Bumper,
    document: RequirementsDocument | undefined,
    target: VersionTarget,
    outcome: BumpOutcome,
    result: BumpResult,
  ): Promise<void> {
    const declarations = document?.find(target.packageName) ?? [];
    let resolved: string;
    let decision: BumpDecision;

    try {
      resolved = await bumper.resolveVersion(target);

      // Each file keeps its own dialect, also when reached through an include
      const existing = this.pickExisting(declarations, resolved);
      decision = await (existing ? this.bumperOf(existing.document.dialect) : bumper)
        .buildChange(existing?.spec, target, resolved);
    } catch (error) {
      const [reason, message] = this.classify(error);
      this.skip(outcome, result, reason, message);
      return;
    }

    if (decision.status === 'skip') {
      this.skip(outcome, result, decision.reason, decision.message);
      return;
    }

    const change = decision.change;
    change.locations = declarations.length > 0
      ? this.rewrite(declarations, change, target, resolved)
      : this.appendUndeclared(document, change, result);

    outcome.state = 'bumped';
    result.changes.push(change);

    this.log.Debug?.(`Bumped ${change.name} to ${change.newVersion}`);
  }

  /**
   * Declaration the change is judged against: the highest version above the
   * resolved one (so any lowered line counts as a downgrade), else one not
   * yet at the resolved version, else a bare name.
   */
  private pickExisting(declarations: LocatedRequirement[], resolved: string): LocatedRequirement | undefined {
    let highest: LocatedRequirement | undefined;
    for (const located of declarations) {
      const { version } = located.spec;
      if (version === undefined) continue;

      if (highest?.spec.version === undefined || this.comparator.compare(version, highest.spec.version) > 0) {
        highest = located;
      }
    }

    if (highest?.spec.version !== undefined && this.comparator.compare(highest.spec.version, resolved) > 0) {
      return highest;
    }

    return declarations.find(({ spec }) =>
      spec.version !== undefined && this.comparator.compare(spec.version, resolved) !== 0
    ) ??
      declarations.find(({ spec }) => spec.version === undefined) ??
      declarations[0];
  }

  private rewrite(
    declarations: LocatedRequirement[],
    change: Change,
    target: VersionTarget,
    resolved: string,
  ): ChangeLocation[] {
    const locations: ChangeLocation[] = [];

    for (const { spec, document } of declarations) {
      const newLine = this.parser.rewrite(
        spec,
        this.bumperOf(document.dialect).specifiersFor(spec, target, resolved),
      );
      if (newLine === spec.rawText) continue;

      document.replaceLine(spec.sourceLineIndex, newLine);
      locations.push({ path: document.path, lineIndex: spec.sourceLineIndex, previousLine: spec.rawText, newLine });
    }

    return locations;
  }

  private appendUndeclared(
    document: RequirementsDocument | undefined,
    change: Change,
    result: BumpResult,
  ): ChangeLocation[] {
    if (!document) {
      this.warn(result, `${change.name} is not declared in any requirements file`);
      return [];
    }

    this.warn(result, `${change.name} is not declared in ${document.path ?? 'the document'}; adding it`);

    const line = document.append(change.rewrittenLine);
    return [{ path: document.path, lineIndex: line.sourceLineIndex, newLine: change.rewrittenLine }];
  }

  private verify(document: RequirementsDocument | undefined, result: BumpResult): void {
    const bumped = new Map(result.changes.map((change) => [change.packageName, change]));
    const downgraded = new Set(result.changes.filter((c) => c.isDowngrade).map((c) => c.packageName));
    const declared = document?.flatten() ?? [];

    const checks: RequirementCheck[] = declared
      .filter(({ spec }) => !bumped.has(spec.packageName))
      .map(({ spec }) => ({ spec }));

    for (const change of result.changes) {
      if (change.isDowngrade) continue;

      const announced = this.parser.requirementsFromChangelog(change.changelogEntries.map((entry) => entry.text));
      checks.push(...announced.map((spec) => ({ spec, requiredBy: change.name })));
    }

    for (const { spec, requiredBy } of checks) {
      if (downgraded.has(spec.packageName)) continue;

      const change = bumped.get(spec.packageName);
      const currentVersion = change?.newVersion ?? this.declaredVersion(declared, spec.packageName);

      if (currentVersion === undefined) {
        // A package declared without a version is taken as satisfied
        const isDeclared = declared.some((located) => located.spec.packageName === spec.packageName);
        if (isDeclared || spec.specifiers.length === 0) continue;
      } else if (this.comparator.satisfies(currentVersion, spec.specifiers)) {
        continue;
      }

      const unresolved: UnresolvedRequirement = {
        packageName: spec.packageName,
        requirement: spec,
        requiredBy,
        currentVersion,
        suggestedVersion: this.suggestedVersion(spec),
      };
      result.unresolved.push(unresolved);

      const requirement = this.parser.format(spec.name, spec.specifiers);
      const by = requiredBy ? ` (required by ${requiredBy})` : '';

      if (change) {
        this.warn(result, `${change.name} ${change.newVersion} conflicts with ${requirement}${by}`);

        const outcome = result.outcomes.find((o) => o.packageName === spec.packageName);
        if (outcome) outcome.state = 'unresolved';
      } else {
        this.log.Warn(`Requirement ${requirement}${by} is not met by ${currentVersion ?? 'any declared version'}`);
      }
    }
  }

  /**
   * Version a package is declared at: an exact pin first, then a floor.
   */
  private declaredVersion(declared: LocatedRequirement[], packageName: string): string | undefined {
    const specs = declared.filter(({ spec }) => spec.packageName === packageName).map(({ spec }) => spec);

    const pinned = specs.flatMap((spec) => spec.specifiers)
      .find((s) => s.operator === '===' || (s.operator === '==' && !s.version.endsWith('.*')));
    if (pinned) return pinned.version;

    return specs.flatMap((spec) => spec.specifiers).find((s) => s.operator === '~=' || s.operator === '>=')?.version;
  }

  private suggestedVersion(spec: RequirementSpec): string | undefined {
    const [primary] = spec.specifiers;

    if (primary && ['==', '===', '>=', '~='].includes(primary.operator) && !primary.version.endsWith('.*')) {
      return primary.version;
    }

    return undefined;
  }

  private classify(error: unknown): [SkipReason, string] {
    if (error instanceof VersionNotFoundError) {
      return [error.cause instanceof PackageNotFoundError ? 'not-found' : 'no-matching-version', error.message];
    }

    return ['lookup-failed', errorMessage(error)];
  }

  private skip(outcome: BumpOutcome, result: BumpResult, reason: SkipReason, message: string): void {
    outcome.state = 'skipped';
    outcome.reason = reason;
    result.skipped.push({ packageName: outcome.packageName, reason, message });

    if (reason === 'up-to-date') {
      this.log.Debug?.(`${outcome.packageName}: ${message}`);
    } else {
      this.log.Warn(`Skipped ${outcome.packageName}: ${message}`);
    }
  }

  private warn(result: BumpResult, message: string): void {
    result.warnings.push(message);
    this.log.Warn(message);
  }
}
