/**
 * Renders a bump result as text suitable for a terminal or a commit message.
 *
 * ```text
 * Require alpha==2.0.0, gamma==3.1.4
 *
 * alpha 1.0.0 → 2.0.0
 * gamma 3.0.0 → 3.1.4
 *   3.1.4
 *     Fixed the frobnicator
 *
 * Skipped delta: Package not found: delta
 * Unresolved pkga>=1.2 (required by pkgb; current 1.0; suggested 1.2)
 * ```
 *
 * @module
 */

import { RequirementParser } from '../requirements/RequirementParser.js';
import type { RequirementsDialect } from '../requirements/RequirementSpec.js';
import type { BumpResult, Change, UnresolvedRequirement } from './BumpTypes.js';

export const UP_TO_DATE_MESSAGE = 'No need to bump. Everything is up to date!';

export interface SummaryOptions {
  /** Include changelog excerpts under each change */
  includeChangelog?: boolean;
}

export class BumpSummary {
  public constructor(protected parser = new RequirementParser()) {}

  /**
   * Commit-style headline: `Pin …` for pinned files, `Require …` otherwise.
   *
   * @returns undefined when nothing changed
   */
  headline(result: BumpResult, dialect: RequirementsDialect): string | undefined {
    if (result.changes.length === 0) return undefined;

    const word = dialect === 'pinned' ? 'Pin' : 'Require';
    const items = result.changes.map((change) => this.parser.format(change.name, change.specifiers));

    return `${word} ${items.join(', ')}`;
  }

  render(result: BumpResult, dialect: RequirementsDialect, options: SummaryOptions = {}): string {
    const sections: string[][] = [];

    const headline = this.headline(result, dialect);
    if (headline) {
      sections.push([headline]);
      sections.push(result.changes.flatMap((change) => this.changeLines(change, options)));
    } else {
      sections.push([UP_TO_DATE_MESSAGE]);
    }

    const skipped = result.skipped
      .filter((skip) => skip.reason !== 'up-to-date')
      .map((skip) => `Skipped ${skip.packageName}: ${skip.message}`);

    sections.push([
      ...skipped,
      ...result.unresolved.map((unresolved) => this.unresolvedLine(unresolved)),
      ...result.warnings.map((warning) => `Warning: ${warning}`),
    ]);

    return sections
      .filter((lines) => lines.length > 0)
      .map((lines) => lines.join('\n'))
      .join('\n\n');
  }

  private changeLines(change: Change, options: SummaryOptions): string[] {
    const from = change.previousVersion ? `${change.previousVersion} ` : '';
    const lines = [`${change.name} ${from}→ ${change.newVersion}${change.isDowngrade ? ' (downgrade)' : ''}`];

    if (options.includeChangelog) {
      for (const entry of change.changelogEntries) {
        lines.push(`  ${entry.version}`);
        lines.push(...entry.text.split('\n').filter((line) => line.trim()).map((line) => `    ${line.trim()}`));
      }
    }

    return lines;
  }

  private unresolvedLine(unresolved: UnresolvedRequirement): string {
    const { requirement } = unresolved;
    const details = [
      unresolved.requiredBy ? `required by ${unresolved.requiredBy}` : undefined,
      unresolved.currentVersion ? `current ${unresolved.currentVersion}` : 'not declared',
      unresolved.suggestedVersion ? `suggested ${unresolved.suggestedVersion}` : undefined,
    ].filter((detail): detail is string => detail !== undefined);

    return `Unresolved ${this.parser.format(requirement.name, requirement.specifiers)} (${details.join('; ')})`;
  }
}
