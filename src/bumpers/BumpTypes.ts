/**
 * Result types of a bump run.
 *
 * @module
 */

import type { ChangelogEntry } from '../deps/VersionProvider.js';
import type { BumpLog } from '../services/BumpLog.js';
import type { RequirementSpec, VersionSpecifier } from '../requirements/RequirementSpec.js';

/**
 * One line rewritten (or appended) by a change.
 */
export interface ChangeLocation {
  /** Path of the owning document, undefined for an unsaved document */
  path?: string;

  lineIndex: number;

  /** Line before the rewrite, undefined when the line was appended */
  previousLine?: string;

  newLine: string;
}

/**
 * A version change applied to one package.
 */
export interface Change {
  /** Normalized package name */
  packageName: string;

  /** Name as written in the document (or as requested) */
  name: string;

  /** Version declared before the bump, if any */
  previousVersion?: string;

  newVersion: string;

  /** True when the new version orders lower than the previous one */
  isDowngrade: boolean;

  /** Changelog entries, oldest first. Downgrade entries are prefixed '- ' */
  changelogEntries: ChangelogEntry[];

  /** The requirement line as rewritten for the first declaration */
  rewrittenLine: string;

  /** Constraint written for the package */
  specifiers: VersionSpecifier[];

  /** Every line the change touched, filled in by the driver */
  locations: ChangeLocation[];
}

export type SkipReason =
  | 'not-found'
  | 'lookup-failed'
  | 'up-to-date'
  | 'downgrade-refused'
  | 'no-matching-version';

/** Skip reasons that mean a requested package could not be resolved. */
export const FAILED_SKIP_REASONS: ReadonlySet<SkipReason> = new Set<SkipReason>([
  'not-found',
  'lookup-failed',
  'no-matching-version',
]);

export type BumpDecision =
  | { status: 'change'; change: Change }
  | { status: 'skip'; reason: SkipReason; message: string };

export interface SkippedBump {
  packageName: string;
  reason: SkipReason;
  message: string;
}

/**
 * A requirement the final set of versions does not meet.
 */
export interface UnresolvedRequirement {
  /** Normalized name of the required package */
  packageName: string;

  requirement: RequirementSpec;

  /** Package whose changelog announced the requirement */
  requiredBy?: string;

  /** Version in effect after the bump, if one is known */
  currentVersion?: string;

  /** Version that would satisfy the requirement, when it names one */
  suggestedVersion?: string;
}

export type BumpState = 'pending' | 'bumped' | 'verified' | 'skipped' | 'unresolved';

export interface BumpOutcome {
  packageName: string;
  state: BumpState;
  reason?: SkipReason;
}

export interface BumpResult {
  changes: Change[];
  skipped: SkippedBump[];
  unresolved: UnresolvedRequirement[];
  warnings: string[];

  /** Terminal state of every requested package, in request order */
  outcomes: BumpOutcome[];
}

export interface BumperOptions {
  /** Fetch changelog entries for every bump */
  includeChangelog?: boolean;

  /** Let a 'latest' request move a package to a lower version */
  allowDowngrade?: boolean;

  log?: BumpLog;
}
