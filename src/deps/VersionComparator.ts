/**
 * Version comparison utilities with channel awareness.
 *
 * This module compares package versions as they appear on PyPI, which are
 * close to semver but not quite:
 *
 * - `1.2.3` - Production version
 * - `1.2` / `1.2.3.4` - Fewer or more release segments
 * - `2.0.0rc1` / `2.0.0b2` / `1.0.dev3` - Pre-releases (a channel)
 * - `1.0.post1` - Post releases
 * - `1.2.3-beta.1` - Plain semver pre-release
 *
 * ## Comparison Logic
 *
 * 1. Compare epochs, then release segments numerically (missing segments
 *    count as 0, segments of any length)
 * 2. `X.devN` < `XaN` < `XbN` < `XrcN` < `X` < `X.postN`; a `.devN` suffix
 *    sorts just before the same version without it
 * 3. Semver pre-releases outside that grammar (`1.0.0-alpha.beta`) sort
 *    before alpha releases, and among themselves by semver precedence
 *
 * @module
 */

import semver, { type SemVer } from 'semver';
import type { VersionSpecifier } from '../requirements/RequirementSpec.js';

export interface PreRelease {
  /** `other` marks a semver pre-release or an unparseable version */
  label: 'other' | 'a' | 'b' | 'rc';
  number: number;
}

/**
 * Represents a parsed version with channel information.
 */
export interface ParsedVersion {
  /** Original version string */
  original: string;

  /** First three release segments (e.g., '1.2.3') */
  base: string;

  epoch: bigint;

  /** All release segments (e.g., [1n, 2n, 3n, 4n] for '1.2.3.4') */
  release: bigint[];

  pre?: PreRelease;

  /** Post release number, if any */
  post?: number;

  dev?: number;

  /** Set for semver versions whose pre-release falls outside the a/b/rc grammar */
  semver?: SemVer;

  /** Channel name if present (e.g., 'rc1', 'alpha.beta'), undefined for production */
  channel?: string;

  /** Whether this is a production (non-pre-release) version */
  isProduction: boolean;
}

const PEP440_REGEX =
  /^v?(?:(\d+)!)?(\d+(?:\.\d+)*)(?:[-_.]?(a|b|c|rc|alpha|beta|pre|preview)[-_.]?(\d*))?(?:[-_.]?(?:post|rev|r)[-_.]?(\d*)|-(\d+))?(?:[-_.]?(dev)[-_.]?(\d*))?(?:\+[a-z0-9.]+)?$/i;

const PRE_LABELS: Record<string, PreRelease['label']> = {
  a: 'a',
  alpha: 'a',
  b: 'b',
  beta: 'b',
  c: 'rc',
  rc: 'rc',
  pre: 'rc',
  preview: 'rc',
};

const PRE_RANK: Record<PreRelease['label'], number> = { other: -1, a: 0, b: 1, rc: 2 };

/**
 * Version comparison utility with channel awareness.
 *
 * @example Basic comparison
 * ```typescript
 * const comparator = new VersionComparator();
 *
 * comparator.compare('1.9', '1.10.0'); // -1 (a < b)
 * comparator.compare('2.0.0', '2.0.0rc1'); // 1 (a > b)
 * comparator.compare('1.0', '1.0.0'); // 0 (equal)
 * ```
 *
 * @example Check a version against specifiers
 * ```typescript
 * comparator.satisfies('1.4.5', [{ operator: '~=', version: '1.4.2' }]); // true
 * ```
 */
export class VersionComparator {
  /**
   * Parse a version string into its components. Never throws.
   *
   * Strings that are not versions at all parse as a 0 release whose channel
   * is the whole string, so they sort below any real version.
   */
  parse(version: string): ParsedVersion {
    const trimmed = version.trim();
    const match = PEP440_REGEX.exec(trimmed);

    if (match) {
      return this.parsePep440(version, match);
    }

    const strict = semver.parse(trimmed);

    if (strict) {
      const channel = strict.prerelease.length > 0 ? strict.prerelease.map(String).join('.') : undefined;
      const release = [BigInt(strict.major), BigInt(strict.minor), BigInt(strict.patch)];

      return {
        original: version,
        base: release.join('.'),
        epoch: 0n,
        release,
        pre: channel ? { label: 'other', number: 0 } : undefined,
        semver: strict,
        channel,
        isProduction: !channel,
      };
    }

    return {
      original: version,
      base: '0.0.0',
      epoch: 0n,
      release: [0n],
      pre: { label: 'other', number: 0 },
      channel: version,
      isProduction: false,
    };
  }

  private parsePep440(version: string, match: RegExpExecArray): ParsedVersion {
    const [, epochText, releaseText, preLabel, preNumber, postNumber, postImplicit, devLabel, devNumber] = match;
    const release = releaseText.split('.').map((segment) => BigInt(segment));

    let pre: PreRelease | undefined;
    let channel: string | undefined;

    if (preLabel) {
      const label = PRE_LABELS[preLabel.toLowerCase()] ?? 'other';
      pre = { label, number: Number(preNumber || 0) };
      channel = `${label}${preNumber || ''}`;
    }

    const dev = devLabel ? Number(devNumber || 0) : undefined;
    if (dev !== undefined) {
      channel = `${channel ?? ''}dev${devNumber || ''}`;
    }

    const postText = postNumber ?? postImplicit;

    return {
      original: version,
      base: release.slice(0, 3).concat([0n, 0n, 0n]).slice(0, 3).join('.'),
      epoch: epochText ? BigInt(epochText) : 0n,
      release,
      pre,
      post: postText !== undefined ? Number(postText || 0) : undefined,
      dev,
      channel,
      isProduction: !channel,
    };
  }

  /**
   * Compare two versions.
   *
   * @returns -1 if a < b, 0 if equal, 1 if a > b
   */
  compare(a: string, b: string): number {
    const parsedA = this.parse(a);
    const parsedB = this.parse(b);

    return order(parsedA.epoch, parsedB.epoch) ||
      this.compareRelease(parsedA.release, parsedB.release) ||
      this.comparePre(parsedA, parsedB) ||
      order(parsedA.post ?? -Infinity, parsedB.post ?? -Infinity) ||
      order(parsedA.dev ?? Infinity, parsedB.dev ?? Infinity);
  }

  /**
   * Check if candidate version is newer than current version.
   *
   * @returns true if candidate is strictly newer than current
   */
  isNewer(current: string, candidate: string): boolean {
    return this.compare(current, candidate) < 0;
  }

  /**
   * Sort versions newest first.
   */
  sortDescending(versions: string[]): string[] {
    return [...versions].sort((a, b) => -this.compare(a, b));
  }

  /**
   * Find the latest version from a list, optionally filtering by channel.
   *
   * @param versions - List of version strings
   * @param channel - Optional channel to filter by (undefined = production only)
   * @returns Latest version matching criteria, or undefined if none match
   */
  findLatest(versions: string[], channel?: string): string | undefined {
    const candidates = versions.filter((v) => {
      const parsed = this.parse(v);
      return channel === undefined ? parsed.isProduction : parsed.channel === channel;
    });

    return this.sortDescending(candidates)[0];
  }

  /**
   * Check whether a version satisfies every specifier (comparators are ANDed).
   */
  satisfies(version: string, specifiers: VersionSpecifier[]): boolean {
    return specifiers.every((spec) => this.satisfiesOne(version, spec));
  }

  private satisfiesOne(version: string, spec: VersionSpecifier): boolean {
    switch (spec.operator) {
      case '===':
        return version.trim().toLowerCase() === spec.version.trim().toLowerCase();
      case '==':
        return this.matchesExactly(version, spec.version);
      case '!=':
        return !this.matchesExactly(version, spec.version);
      case '>=':
        return this.compare(version, spec.version) >= 0;
      case '>':
        return this.compare(version, spec.version) > 0;
      case '<=':
        return this.compare(version, spec.version) <= 0;
      case '<':
        return this.compare(version, spec.version) < 0;
      case '~=': {
        // ~=1.4.2 means >=1.4.2 and ==1.4.*
        const required = this.parse(spec.version).release;
        const prefix = required.length > 1 ? required.slice(0, -1) : required;
        return this.compare(version, spec.version) >= 0 &&
          this.hasReleasePrefix(this.parse(version).release, prefix);
      }
    }
  }

  private matchesExactly(version: string, expected: string): boolean {
    if (expected.endsWith('.*')) {
      const prefix = this.parse(expected.slice(0, -2)).release;
      return this.hasReleasePrefix(this.parse(version).release, prefix);
    }

    return this.compare(version, expected) === 0;
  }

  private hasReleasePrefix(release: bigint[], prefix: bigint[]): boolean {
    return prefix.every((segment, i) => (release[i] ?? 0n) === segment);
  }

  private compareRelease(a: bigint[], b: bigint[]): number {
    const length = Math.max(a.length, b.length);

    for (let i = 0; i < length; i++) {
      const segment = order(a[i] ?? 0n, b[i] ?? 0n);
      if (segment !== 0) return segment;
    }

    return 0;
  }

  private comparePre(a: ParsedVersion, b: ParsedVersion): number {
    const rank = order(this.preRank(a), this.preRank(b));
    if (rank !== 0) return rank;

    if (a.pre?.label === 'other' && b.pre?.label === 'other') {
      return a.semver && b.semver
        ? semver.compare(a.semver, b.semver)
        : order(a.channel ?? '', b.channel ?? '');
    }

    return order(a.pre?.number ?? 0, b.pre?.number ?? 0);
  }

  private preRank(version: ParsedVersion): number {
    if (version.pre) return PRE_RANK[version.pre.label];

    // A bare dev release sorts before every pre-release of its version
    return version.dev !== undefined && version.post === undefined ? -Infinity : Infinity;
  }
}

function order<T extends number | bigint | string>(a: T, b: T): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
