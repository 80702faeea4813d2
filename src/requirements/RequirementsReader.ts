/**
 * Loads requirements documents (with their includes) from disk and writes
 * edited documents back.
 *
 * @module
 */

import { access, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { DocumentIOError } from '../bumpers/BumpErrors.js';
import { type BumpLog, silentLog } from '../services/BumpLog.js';
import { RequirementParser } from './RequirementParser.js';
import { RequirementsDocument } from './RequirementsDocument.js';
import { dialectFor } from './RequirementSpec.js';

export class RequirementsReader {
  private loaded = new Map<string, RequirementsDocument>();

  public constructor(
    protected log: BumpLog = silentLog,
    protected parser = new RequirementParser(),
  ) {}

  /**
   * Read a document and every document it includes with `-r`/`-c`.
   * Include paths resolve relative to the including file; a file already
   * loaded in this tree is not loaded again. Each file is loaded once per
   * reader: later reads and includes share the same document, so edits made
   * through one tree are seen by every other.
   *
   * @throws DocumentIOError if any file cannot be read
   */
  async read(path: string): Promise<RequirementsDocument> {
    return await this.load(resolve(path), new Set());
  }

  /**
   * Write every dirty document of the tree. Each file is written to a
   * temporary sibling first; the renames only start once all of them are
   * on disk.
   *
   * @returns Paths of the files written
   * @throws DocumentIOError if a document has no path or a write fails
   */
  async write(document: RequirementsDocument): Promise<string[]> {
    const dirty = document.documents().filter((doc) => doc.dirty);
    const targets = dirty.map((doc) => {
      if (doc.path === undefined) {
        throw new DocumentIOError('<unsaved>', 'Cannot write a document without a path');
      }
      return { doc, path: doc.path, tmp: `${doc.path}.tmp` };
    });

    const written: string[] = [];
    let current = '';

    try {
      for (const target of targets) {
        current = target.path;
        await writeFile(target.tmp, target.doc.render(), 'utf-8');
        written.push(target.tmp);
      }

      for (const target of targets) {
        current = target.path;
        await rename(target.tmp, target.path);
      }
    } catch (error) {
      await Promise.all(written.map((tmp) => rm(tmp, { force: true })));
      throw new DocumentIOError(current, 'Could not write requirements file', { cause: error });
    }

    for (const target of targets) {
      target.doc.markClean();
      this.log.Debug?.(`Wrote ${target.path}`);
    }

    return targets.map((target) => target.path);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  private async load(path: string, visited: Set<string>): Promise<RequirementsDocument> {
    visited.add(path);

    const cached = this.loaded.get(path);
    if (cached) return cached;

    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      throw new DocumentIOError(path, 'Could not read requirements file', { cause: error });
    }

    const document = RequirementsDocument.parse(text, { path, dialect: dialectFor(path) }, this.parser);
    this.loaded.set(path, document);
    this.log.Debug?.(`Read ${path} (${document.requirements().length} requirements)`);

    for (const include of document.includes()) {
      const childPath = resolve(dirname(path), include.path);

      if (visited.has(childPath)) {
        this.log.Warn(`Skipping repeated include of ${include.path} in ${path}`);
        continue;
      }

      document.attach(include.lineIndex, await this.load(childPath, visited));
    }

    return document;
  }
}
