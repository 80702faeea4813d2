/**
 * Extracts the entries between two versions from a changelog file.
 *
 * Recognized version headers, newest first as changelogs are usually kept:
 *
 * - `1.2.0` / `1.2.0 (2024-03-01)` (reStructuredText, underlined)
 * - `Version 1.2.0`
 * - `## 1.2.0` / `## [1.2.0] - 2024-03-01` / `## v1.2.0` (Markdown)
 *
 * @module
 */

import type { ChangelogEntry } from './VersionProvider.js';
import { VersionComparator } from './VersionComparator.js';

export class ChangelogParser {
  private static readonly VERSION_REGEX =
    /^(?:#+\s*)?\[?(?:version\s+)?v?(\d+(?:\.\d+)+(?:[-.]?[A-Za-z]+\d*)?)\b/i;

  private static readonly RULE_REGEX = /^\s*[-=~+*^#]+\s*$/;

  public constructor(protected comparator = new VersionComparator()) {}

  /**
   * Entries newer than `fromVersion` and not newer than `toVersion`, oldest
   * first. Reading stops at the first header at or below `fromVersion`.
   */
  entriesBetween(changelog: string, fromVersion: string | undefined, toVersion: string): ChangelogEntry[] {
    const collected: Array<{ version: string; lines: string[] }> = [];
    let current: { version: string; lines: string[] } | undefined;

    for (const rawLine of changelog.split(/\r?\n/)) {
      const line = rawLine.trimEnd();

      if (!line || ChangelogParser.RULE_REGEX.test(line)) continue;

      const header = ChangelogParser.VERSION_REGEX.exec(line);
      if (header) {
        const version = header[1];

        if (fromVersion !== undefined && this.comparator.compare(version, fromVersion) <= 0) {
          break;
        }

        current = this.comparator.compare(version, toVersion) <= 0 ? { version, lines: [] } : undefined;
        if (current) collected.push(current);
        continue;
      }

      current?.lines.push(line);
    }

    return collected
      .reverse()
      .map(({ version, lines }) => ({ version, text: lines.join('\n') }));
  }
}
