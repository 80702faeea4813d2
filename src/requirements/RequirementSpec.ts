/**
 * Data model for lines of a requirements document.
 *
 * A document line is either a {@link RequirementSpec} (a parsed constraint
 * such as `requests>=2.31  # http`) or an {@link OpaqueLine} that is carried
 * through verbatim: blanks, comments, include directives, pip options and
 * anything the parser could not make sense of.
 *
 * @module
 */

/** Comparison operators recognized in a version specifier. */
export type RequirementOperator = '===' | '==' | '~=' | '!=' | '>=' | '<=' | '>' | '<';

/**
 * Kind of constraint a requirement declares, derived from its primary
 * operator. `none` is a bare package name.
 */
export type ConstraintKind =
  | 'exact'
  | 'min'
  | 'max'
  | 'compatible'
  | 'arbitrary'
  | 'exclude'
  | 'none';

/** Requirements file flavour, which decides how a bump is written. */
export type RequirementsDialect = 'requirements' | 'pinned';

export interface VersionSpecifier {
  operator: RequirementOperator;
  version: string;
}

/**
 * One parsed constraint line.
 */
export interface RequirementSpec {
  kind: 'requirement';

  /** Package name as written (e.g. 'Flask_Login') */
  name: string;

  /** Normalized name used for matching (e.g. 'flask-login') */
  packageName: string;

  /** Kind of the primary specifier, 'none' for a bare name */
  operator: ConstraintKind;

  /** Version of the primary specifier, undefined for a bare name */
  version?: string;

  /** All comma-separated specifiers, primary first */
  specifiers: VersionSpecifier[];

  /** Extras including brackets (e.g. '[security]') */
  extras?: string;

  /** Leading whitespace of the line */
  indent: string;

  /** Environment marker and/or trailing comment, with its leading whitespace */
  suffix: string;

  /** The original line */
  rawText: string;

  /** Index of the line in its owning document */
  sourceLineIndex: number;
}

/** Why a line is carried through untouched. */
export type OpaqueReason = 'blank' | 'comment' | 'include' | 'option' | 'unparsed';

export interface OpaqueLine {
  kind: 'opaque';
  reason: OpaqueReason;
  rawText: string;
  sourceLineIndex: number;

  /** Path named by a -r / -c directive */
  include?: string;

  /** Parse failure that degraded the line, for unparsed lines */
  error?: string;
}

export type RequirementLine = RequirementSpec | OpaqueLine;

/**
 * A requested bump.
 */
export interface VersionTarget {
  /** Package name as requested */
  packageName: string;

  /** Version to bump to, or 'latest' to ask the version provider */
  desiredVersion: string | 'latest';

  /**
   * Operator requested alongside the version (`name>=1.2`). When absent the
   * bumper picks one for the document dialect.
   */
  operator?: RequirementOperator;

  /** Extra specifiers of a range request (`name>1.0,<2`), after the first */
  extraSpecifiers?: VersionSpecifier[];

  /** Fetch changelog entries for this bump */
  includeChangelog?: boolean;
}

export const OPERATOR_KINDS: Record<RequirementOperator, ConstraintKind> = {
  '===': 'arbitrary',
  '==': 'exact',
  '~=': 'compatible',
  '!=': 'exclude',
  '>=': 'min',
  '>': 'min',
  '<=': 'max',
  '<': 'max',
};

/**
 * Dialect of a requirements file, from its name: `pinned.txt` files are
 * pinned, everything else is a plain requirements file.
 */
export function dialectFor(path: string | undefined): RequirementsDialect {
  return path !== undefined && /(?:^|[\\/])pinned\.txt$/i.test(path) ? 'pinned' : 'requirements';
}

export function isRequirement(line: RequirementLine): line is RequirementSpec {
  return line.kind === 'requirement';
}
