/**
 * Parser for requirements.txt style constraint lines.
 *
 * ## Supported Line Formats
 *
 * - `name` (bare, no constraint)
 * - `name==1.2.3`, `name>=1.2`, `name~=1.4.2`, `name===1.0-custom`
 * - `name>0.2,<0.2.5` (comparators are ANDed)
 * - `name[extra]==1.0 ; python_version < "3.12"  # comment`
 * - `-r other.txt` / `--requirement=other.txt` / `-c constraints.txt`
 *
 * Anything else (URLs, VCS links, pip options, free text) is kept as an
 * opaque line so one odd declaration never blocks bumping the others.
 *
 * @module
 */

import { ParseError } from '../bumpers/BumpErrors.js';
import {
  OPERATOR_KINDS,
  type OpaqueLine,
  type RequirementLine,
  type RequirementOperator,
  type RequirementSpec,
  type VersionSpecifier,
  type VersionTarget,
} from './RequirementSpec.js';

/**
 * Parser for requirement lines, request strings and changelog requirements.
 *
 * @example Parse a line and rewrite its constraint
 * ```typescript
 * const parser = new RequirementParser();
 * const spec = parser.parse('alpha==1.0.0  # core');
 *
 * parser.rewrite(spec, [{ operator: '==', version: '2.0.0' }]);
 * // 'alpha==2.0.0  # core'
 * ```
 */
export class RequirementParser {
  private static readonly NAME_REGEX =
    /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(\[[^\]]*\])?\s*(.*)$/;

  private static readonly SPECIFIER_REGEX =
    /^(===|==|~=|!=|>=|<=|>|<)\s*([A-Za-z0-9][A-Za-z0-9.*+!_-]*)$/;

  private static readonly INCLUDE_REGEX =
    /^\s*(?:-r|--requirement|-c|--constraint)(?:\s*=\s*|\s+)(\S+)/;

  private static readonly CHANGELOG_REQUIRES_REGEX = /requires?=(\S.*)$/i;

  /**
   * Normalize a package name for comparison: case-insensitive, with runs of
   * `-`, `_` and `.` folded into a single `-`.
   */
  normalizeName(name: string): string {
    return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
  }

  /**
   * Parse one document line. Never throws: lines that do not match the
   * grammar come back as opaque lines carrying the parse error.
   *
   * @param text - The raw line, without its line ending
   * @param index - Position of the line in its document
   */
  parseLine(text: string, index: number): RequirementLine {
    const trimmed = text.trim();

    if (trimmed === '') {
      return this.opaque(text, index, 'blank');
    }

    if (trimmed.startsWith('#')) {
      return this.opaque(text, index, 'comment');
    }

    const include = RequirementParser.INCLUDE_REGEX.exec(text);
    if (include) {
      return { ...this.opaque(text, index, 'include'), include: include[1] };
    }

    if (trimmed.startsWith('-')) {
      return this.opaque(text, index, 'option');
    }

    try {
      return this.parse(text, index);
    } catch (error) {
      if (error instanceof ParseError) {
        return { ...this.opaque(text, index, 'unparsed'), error: error.message };
      }
      throw error;
    }
  }

  /**
   * Parse a requirement strictly.
   *
   * @throws ParseError if the text is not a `<name>[<operator><version>,...]` requirement
   */
  parse(text: string, index = 0): RequirementSpec {
    const indent = /^\s*/.exec(text)?.[0] ?? '';
    const body = text.slice(indent.length);

    // A comment starts at a '#' preceded by whitespace; a marker at ';'
    const comment = /\s+#|^#/.exec(body);
    const beforeComment = comment ? body.slice(0, comment.index) : body;
    const marker = /\s*;/.exec(beforeComment);
    const suffixStart = marker ? marker.index : beforeComment.length;

    const coreRaw = body.slice(0, suffixStart);
    const core = coreRaw.trimEnd();
    const suffix = coreRaw.slice(core.length) + body.slice(suffixStart);

    if (core === '') {
      throw new ParseError(text, 'missing package name');
    }

    const match = RequirementParser.NAME_REGEX.exec(core);
    if (!match) {
      throw new ParseError(text, 'invalid package name');
    }

    const [, name, extras, constraint] = match;
    const specifiers = this.parseSpecifiers(text, constraint);
    const primary = specifiers[0];

    return {
      kind: 'requirement',
      name,
      packageName: this.normalizeName(name),
      operator: primary ? OPERATOR_KINDS[primary.operator] : 'none',
      version: primary?.version,
      specifiers,
      extras: extras || undefined,
      indent,
      suffix,
      rawText: text,
      sourceLineIndex: index,
    };
  }

  /**
   * Parse a bump request as given on the command line.
   *
   * - `alpha` or `alpha@latest` bumps to latest
   * - `alpha==2.0.0` bumps to exactly 2.0.0
   * - `alpha>=1.2` requires at least 1.2
   * - `alpha>0.2,<0.2.5` requests a range (pinned files resolve it)
   *
   * @throws ParseError if the request is malformed
   */
  parseRequest(text: string, includeChangelog?: boolean): VersionTarget {
    const spec = this.parse(text.trim().replace(/@latest$/i, ''));
    const [primary, ...extra] = spec.specifiers;

    if (!primary) {
      return { packageName: spec.name, desiredVersion: 'latest', includeChangelog };
    }

    return {
      packageName: spec.name,
      desiredVersion: primary.version,
      operator: primary.operator,
      extraSpecifiers: extra.length > 0 ? extra : undefined,
      includeChangelog,
    };
  }

  /**
   * Render specifiers as constraint text (e.g. `>0.2,<0.2.5`).
   */
  formatConstraint(specifiers: VersionSpecifier[]): string {
    return specifiers.map((s) => `${s.operator}${s.version}`).join(',');
  }

  /**
   * Rewrite a requirement with a new constraint. The old constraint is
   * replaced wholesale; indent, name, extras, marker and comment are kept.
   */
  rewrite(spec: RequirementSpec, specifiers: VersionSpecifier[]): string {
    return `${spec.indent}${spec.name}${spec.extras ?? ''}${this.formatConstraint(specifiers)}${spec.suffix}`;
  }

  /**
   * Render a brand new requirement line.
   */
  format(name: string, specifiers: VersionSpecifier[]): string {
    return `${name}${this.formatConstraint(specifiers)}`;
  }

  /**
   * Collect requirements announced in changelog text, one `requires=` (or
   * `require=`) list per line.
   *
   * @example
   * ```typescript
   * parser.requirementsFromChangelog(['* requires=localconfig,remote-config==2.3']);
   * // [localconfig, remote-config==2.3]
   * ```
   */
  requirementsFromChangelog(texts: string[]): RequirementSpec[] {
    const requirements: RequirementSpec[] = [];
    const seen = new Set<string>();

    for (const text of texts) {
      for (const rawLine of text.split('\n')) {
        const line = rawLine.trim().replace(/^[-+* ]+/, '');
        const match = RequirementParser.CHANGELOG_REQUIRES_REGEX.exec(line);
        if (!match) continue;

        for (const item of this.splitRequirementList(match[1])) {
          if (seen.has(item)) continue;
          seen.add(item);

          const parsed = this.parseLine(item, 0);
          if (parsed.kind === 'requirement') {
            requirements.push(parsed);
          }
        }
      }
    }

    return requirements;
  }

  /**
   * Split `a, b>=1.2,<2, c` into `['a', 'b>=1.2,<2', 'c']`: items starting
   * with an operator belong to the previous requirement.
   */
  private splitRequirementList(list: string): string[] {
    const items: string[] = [];

    for (const part of list.split(',')) {
      const item = part.trim();
      if (!item) continue;

      if (/^[<>=!~]/.test(item) && items.length > 0) {
        items[items.length - 1] += `,${item}`;
      } else {
        items.push(item);
      }
    }

    return items;
  }

  private parseSpecifiers(text: string, constraint: string): VersionSpecifier[] {
    if (constraint.trim() === '') return [];

    return constraint.split(',').map((part) => {
      const match = RequirementParser.SPECIFIER_REGEX.exec(part.trim());
      const operator = match?.[1];
      if (!match || !isOperator(operator)) {
        throw new ParseError(text, `invalid version specifier '${part.trim()}'`);
      }

      return { operator, version: match[2] };
    });
  }

  private opaque(text: string, index: number, reason: OpaqueLine['reason']): OpaqueLine {
    return { kind: 'opaque', reason, rawText: text, sourceLineIndex: index };
  }
}

function isOperator(value: string | undefined): value is RequirementOperator {
  return value !== undefined && value in OPERATOR_KINDS;
}
