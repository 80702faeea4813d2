/**
 * In-memory model of a requirements file and the files it includes.
 *
 * Lines are kept as parsed; untouched lines render back exactly as read,
 * including the file's line ending style and trailing newline.
 *
 * @module
 */

import { RequirementParser } from './RequirementParser.js';
import {
  isRequirement,
  type RequirementLine,
  type RequirementSpec,
  type RequirementsDialect,
} from './RequirementSpec.js';

/**
 * A requirement together with the document that declares it.
 */
export interface LocatedRequirement {
  spec: RequirementSpec;
  document: RequirementsDocument;
}

type LineEnding = '\n' | '\r\n' | '';

export interface RequirementsDocumentOptions {
  path?: string;
  dialect?: RequirementsDialect;
}

export class RequirementsDocument {
  private children = new Map<number, RequirementsDocument>();
  private isDirty = false;

  protected constructor(
    public readonly path: string | undefined,
    public readonly dialect: RequirementsDialect,
    protected lines: RequirementLine[],
    protected endings: LineEnding[],
    public readonly eol: '\n' | '\r\n',
    public readonly trailingNewline: boolean,
    protected parser: RequirementParser,
  ) {}

  /**
   * Parse document text. Includes are recorded on their lines but not
   * loaded; see {@link RequirementsDocument.attach}.
   */
  static parse(
    text: string,
    options: RequirementsDocumentOptions = {},
    parser = new RequirementParser(),
  ): RequirementsDocument {
    // Each line keeps its own ending; the last one has none without a trailing newline
    const segments = text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
    const endings = segments.map((segment): LineEnding =>
      segment.endsWith('\r\n') ? '\r\n' : segment.endsWith('\n') ? '\n' : ''
    );
    const lines = segments.map((segment, i) =>
      parser.parseLine(segment.slice(0, segment.length - endings[i].length), i)
    );

    // Appended lines use the first ending found
    const eol = endings.find((ending) => ending !== '') || '\n';
    // An empty document gets a trailing newline once lines are appended
    const trailingNewline = text === '' || text.endsWith('\n');

    return new RequirementsDocument(
      options.path,
      options.dialect ?? 'requirements',
      lines,
      endings,
      eol,
      trailingNewline,
      parser,
    );
  }

  get dirty(): boolean {
    return this.isDirty;
  }

  /**
   * Requirements declared directly in this document.
   */
  requirements(): RequirementSpec[] {
    return this.lines.filter(isRequirement);
  }

  /**
   * Include directives of this document.
   */
  includes(): Array<{ lineIndex: number; path: string }> {
    return this.lines.flatMap((line) =>
      line.kind === 'opaque' && line.include !== undefined
        ? [{ lineIndex: line.sourceLineIndex, path: line.include }]
        : []
    );
  }

  /**
   * Attach a loaded child document to the include directive on `lineIndex`.
   */
  attach(lineIndex: number, child: RequirementsDocument): void {
    this.children.set(lineIndex, child);
  }

  /**
   * This document followed by every included document, depth first.
   */
  documents(): RequirementsDocument[] {
    const found: RequirementsDocument[] = [];
    this.walk(new Set(), (document) => found.push(document));
    return found;
  }

  /**
   * Every requirement reachable from this document, in reading order: an
   * included file's requirements appear at its directive's position.
   */
  flatten(): LocatedRequirement[] {
    const located: LocatedRequirement[] = [];
    this.collect(new Set(), located);
    return located;
  }

  /**
   * All declarations of a package across the include tree.
   */
  find(packageName: string): LocatedRequirement[] {
    const normalized = this.parser.normalizeName(packageName);
    return this.flatten().filter(({ spec }) => spec.packageName === normalized);
  }

  /**
   * Replace one line and re-parse it.
   *
   * @throws RangeError if the index is out of bounds
   */
  replaceLine(index: number, text: string): RequirementLine {
    if (!Number.isInteger(index) || index < 0 || index >= this.lines.length) {
      throw new RangeError(`Line ${index} is out of range for ${this.path ?? 'document'}`);
    }

    const line = this.parser.parseLine(text, index);
    if (this.lines[index].rawText !== text) {
      this.isDirty = true;
    }
    this.lines[index] = line;

    return line;
  }

  /**
   * Append a line at the end of the document.
   */
  append(text: string): RequirementLine {
    const last = this.endings.length - 1;
    if (last >= 0 && this.endings[last] === '') this.endings[last] = this.eol;

    const line = this.parser.parseLine(text, this.lines.length);
    this.lines.push(line);
    this.endings.push(this.trailingNewline ? this.eol : '');
    this.isDirty = true;

    return line;
  }

  render(): string {
    return this.lines.map((line, i) => `${line.rawText}${this.endings[i]}`).join('');
  }

  markClean(): void {
    this.isDirty = false;
  }

  private walk(visited: Set<RequirementsDocument>, visit: (document: RequirementsDocument) => void): void {
    if (visited.has(this)) return;
    visited.add(this);
    visit(this);

    for (const [, child] of [...this.children].sort(([a], [b]) => a - b)) {
      child.walk(visited, visit);
    }
  }

  private collect(visited: Set<RequirementsDocument>, located: LocatedRequirement[]): void {
    if (visited.has(this)) return;
    visited.add(this);

    for (const line of this.lines) {
      if (isRequirement(line)) {
        located.push({ spec: line, document: this });
        continue;
      }

      this.children.get(line.sourceLineIndex)?.collect(visited, located);
    }
  }
}
