/**
 * Bumpers decide the version and constraint written for one package.
 *
 * A bumper is picked per document dialect (see `bumperFor`); the driver never
 * inspects which implementation it holds.
 *
 * @module
 */

import type { ChangelogEntry, VersionProvider } from '../deps/VersionProvider.js';
import { VersionComparator } from '../deps/VersionComparator.js';
import { RequirementParser } from '../requirements/RequirementParser.js';
import type {
  RequirementSpec,
  RequirementsDialect,
  VersionSpecifier,
  VersionTarget,
} from '../requirements/RequirementSpec.js';
import { type BumpLog, silentLog } from '../services/BumpLog.js';
import { errorMessage, PackageNotFoundError, VersionNotFoundError } from './BumpErrors.js';
import type { BumpDecision, BumperOptions } from './BumpTypes.js';

export interface Bumper {
  readonly dialect: RequirementsDialect;

  /**
   * Version a target should move to.
   *
   * @throws VersionNotFoundError when no version can be resolved
   */
  resolveVersion(target: VersionTarget): Promise<string>;

  /**
   * Decide whether and how the declaration changes. Never throws for
   * changelog failures.
   */
  buildChange(
    existing: RequirementSpec | undefined,
    target: VersionTarget,
    resolved: string,
  ): Promise<BumpDecision>;

  /**
   * Specifiers written for a resolved version.
   */
  specifiersFor(
    existing: RequirementSpec | undefined,
    target: VersionTarget,
    resolved: string,
  ): VersionSpecifier[];
}

/**
 * Shared resolution, downgrade policy and changelog collection. Subclasses
 * only choose the specifiers written for a resolved version.
 */
export abstract class AbstractBumper implements Bumper {
  public abstract readonly dialect: RequirementsDialect;

  protected comparator = new VersionComparator();
  protected parser = new RequirementParser();
  protected log: BumpLog;

  public constructor(protected provider: VersionProvider, protected options: BumperOptions = {}) {
    this.log = options.log ?? silentLog;
  }

  async resolveVersion(target: VersionTarget): Promise<string> {
    if (target.desiredVersion === 'latest') {
      return await this.lookup(target.packageName, () => this.provider.latestVersion(target.packageName));
    }

    return target.desiredVersion;
  }

  async buildChange(
    existing: RequirementSpec | undefined,
    target: VersionTarget,
    resolved: string,
  ): Promise<BumpDecision> {
    const name = existing?.name ?? target.packageName;
    const previousVersion = existing?.version;
    const isDowngrade = previousVersion !== undefined &&
      this.comparator.compare(resolved, previousVersion) < 0;

    if (isDowngrade && target.desiredVersion === 'latest' && !this.options.allowDowngrade) {
      return {
        status: 'skip',
        reason: 'downgrade-refused',
        message: `Latest version ${resolved} is older than the declared ${previousVersion}`,
      };
    }

    const specifiers = this.specifiersFor(existing, target, resolved);
    const rewrittenLine = existing
      ? this.parser.rewrite(existing, specifiers)
      : this.parser.format(name, specifiers);

    if (existing && rewrittenLine === existing.rawText) {
      return {
        status: 'skip',
        reason: 'up-to-date',
        message: `Already at ${this.parser.formatConstraint(specifiers) || resolved}`,
      };
    }

    const includeChangelog = target.includeChangelog ?? this.options.includeChangelog ?? false;

    return {
      status: 'change',
      change: {
        packageName: this.parser.normalizeName(name),
        name,
        previousVersion,
        newVersion: resolved,
        isDowngrade,
        changelogEntries: includeChangelog
          ? await this.changelogFor(name, previousVersion, resolved, isDowngrade)
          : [],
        rewrittenLine,
        specifiers,
        locations: [],
      },
    };
  }

  abstract specifiersFor(
    existing: RequirementSpec | undefined,
    target: VersionTarget,
    resolved: string,
  ): VersionSpecifier[];

  /**
   * Run a provider call, turning an unknown package into a
   * {@link VersionNotFoundError}.
   */
  protected async lookup<T>(packageName: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof PackageNotFoundError) {
        throw new VersionNotFoundError(packageName, error.message, { cause: error });
      }
      throw error;
    }
  }

  protected async changelogFor(
    name: string,
    previousVersion: string | undefined,
    resolved: string,
    isDowngrade: boolean,
  ): Promise<ChangelogEntry[]> {
    if (previousVersion === undefined) return [];

    try {
      if (isDowngrade) {
        // Entries being rolled back, newest first
        const entries = await this.provider.changelog(name, resolved, previousVersion);

        return entries.reverse().map((entry) => ({
          version: entry.version,
          text: entry.text
            .split('\n')
            .map((line) => (line.trim() ? `- ${line}` : line))
            .join('\n'),
        }));
      }

      return await this.provider.changelog(name, previousVersion, resolved);
    } catch (error) {
      this.log.Warn(`Could not fetch changelog for ${name}: ${errorMessage(error)}`);
      return [];
    }
  }
}
