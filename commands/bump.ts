/**
 * Bump command - update version constraints in requirements.txt and pinned.txt.
 *
 * ## Usage
 *
 * ```bash
 * # Pin every == requirement to its latest version
 * reqbump
 *
 * # Bump specific packages (latest, exact version or range)
 * reqbump requests 'urllib3==2.2.1' 'idna>=3.6'
 *
 * # Bump one file and show what changed upstream
 * reqbump --file requirements/base.txt --changelog requests
 *
 * # Preview without writing
 * reqbump -n
 * ```
 *
 * @module
 */

import { relative, resolve } from 'node:path';
import { z } from 'zod';
import { BumperDriver } from '../src/bumpers/BumperDriver.js';
import { errorMessage, UnsatisfiedRequirementError } from '../src/bumpers/BumpErrors.js';
import { BumpSummary } from '../src/bumpers/BumpSummary.js';
import { FAILED_SKIP_REASONS, type BumpResult } from '../src/bumpers/BumpTypes.js';
import type { BumpConfig } from '../src/config/BumpConfig.js';
import { PyPIVersionResolver } from '../src/deps/PyPIVersionResolver.js';
import type { VersionProvider } from '../src/deps/VersionProvider.js';
import { RequirementParser } from '../src/requirements/RequirementParser.js';
import type { RequirementsDocument } from '../src/requirements/RequirementsDocument.js';
import { RequirementsReader } from '../src/requirements/RequirementsReader.js';
import type { VersionTarget } from '../src/requirements/RequirementSpec.js';
import type { BumpLog } from '../src/services/BumpLog.js';

/**
 * Zod schema for bump command flags, keyed as commander names them.
 */
export const BumpFlagsSchema = z.object({
  file: z.array(z.string()).optional().describe(
    'Requirements file to bump (repeatable). Defaults to requirements.txt and pinned.txt',
  ),
  add: z.boolean().optional().describe(
    'Add requested packages to the requirements file if they are not declared',
  ),
  changelog: z.boolean().optional().describe('Show changelog entries for each bump'),
  allowDowngrade: z.boolean().optional().describe(
    'Allow latest to resolve to a version older than the declared one',
  ),
  dryRun: z.boolean().optional().describe('Show what would change without writing'),
  strict: z.boolean().optional().describe('Exit with 2 when requirements stay unresolved'),
  debug: z.boolean().optional().describe('Turn on debug output'),
});

export type BumpFlags = z.infer<typeof BumpFlagsSchema>;

/**
 * Zod schema for bump command positional arguments (package requests).
 */
export const BumpArgsSchema = z.array(z.string());

export type BumpArgs = z.infer<typeof BumpArgsSchema>;

/**
 * Typed parameter accessor for the bump command. Flags win over config.
 */
export class BumpParams {
  public constructor(
    protected readonly args: BumpArgs,
    protected readonly flags: BumpFlags,
    protected readonly config: BumpConfig,
  ) {}

  get Names(): string[] {
    return this.args;
  }

  get Files(): string[] {
    return this.flags.file ?? [];
  }

  get Targets(): string[] {
    return this.Files.length > 0 ? this.Files : this.config.targets;
  }

  get Add(): boolean {
    return this.flags.add ?? false;
  }

  get Changelog(): boolean {
    return this.flags.changelog ?? this.config.changelog;
  }

  get AllowDowngrade(): boolean {
    return this.flags.allowDowngrade ?? this.config.allowDowngrade;
  }

  get DryRun(): boolean {
    return this.flags.dryRun ?? false;
  }

  get Strict(): boolean {
    return this.flags.strict ?? false;
  }

  get Debug(): boolean {
    return this.flags.debug ?? false;
  }
}

export interface BumpServices {
  Cwd: string;
  Log: BumpLog;
  Provider: VersionProvider;
  Reader: RequirementsReader;
}

export function createBumpServices(config: BumpConfig, log: BumpLog, cwd = process.cwd()): BumpServices {
  return {
    Cwd: cwd,
    Log: log,
    Provider: new PyPIVersionResolver({ indexUrl: config.indexUrl, timeout: config.timeout, log }),
    Reader: new RequirementsReader(log),
  };
}

/**
 * Run the bump command.
 *
 * @returns Exit code: 0 on success (even with nothing to bump), 1 when a
 * request or file fails, 2 under `--strict` when requirements stay unmet
 */
export async function runBump(params: BumpParams, services: BumpServices): Promise<number> {
  const { Cwd, Log, Provider, Reader } = services;
  const parser = new RequirementParser();

  let targets: VersionTarget[];
  try {
    targets = params.Names.map((name) => parser.parseRequest(name));
  } catch (error) {
    Log.Error(errorMessage(error));
    return 1;
  }

  // Read every document before bumping so a bad file aborts before any write
  const loaded: RequirementsDocument[] = [];
  try {
    for (const target of params.Targets) {
      const path = resolve(Cwd, target);

      if (!(await Reader.exists(path))) {
        if (params.Files.length > 0) {
          Log.Error(`Requirements file not found: ${target}`);
          return 1;
        }
        continue;
      }

      loaded.push(await Reader.read(path));
    }
  } catch (error) {
    Log.Error(errorMessage(error));
    return 1;
  }

  const documents = rootDocuments(loaded);
  for (const document of loaded.filter((doc) => !documents.includes(doc))) {
    Log.Debug?.(`${label(Cwd, document)} is included by another target; bumping it there`);
  }

  const driver = new BumperDriver(Provider, {
    includeChangelog: params.Changelog,
    allowDowngrade: params.AllowDowngrade,
    log: Log,
  });
  const summary = new BumpSummary(parser);
  const results: BumpResult[] = [];

  if (documents.length === 0) {
    if (targets.length === 0) {
      Log.Error(`None of the requirement file(s) were found: ${params.Targets.join(', ')}`);
      return 1;
    }

    Log.Warn('No requirements file found; nothing will be written');

    const result = await driver.bump(undefined, targets);
    Log.Info(summary.render(result, 'requirements', { includeChangelog: params.Changelog }));
    results.push(result);
  } else {
    const plan = planTargets(documents, targets, params.Add, parser);

    if (plan.undeclared.length > 0 && !params.Add) {
      const names = plan.undeclared.map((target) => target.packageName).join(', ');
      const message = `Not declared in ${documents.map((doc) => label(Cwd, doc)).join(', ')}: ${names}`;

      if (plan.undeclared.length === targets.length) {
        Log.Error(`${message}. Use --add to add them.`);
        return 1;
      }
      Log.Warn(message);
    }

    for (const [index, document] of documents.entries()) {
      const documentTargets = plan.perDocument[index];

      // Named packages that this file does not declare leave it alone
      if (targets.length > 0 && documentTargets.length === 0) continue;

      const result = await driver.bump(document, documentTargets);
      Log.Info(`${label(Cwd, document)}:`);
      Log.Info(summary.render(result, document.dialect, { includeChangelog: params.Changelog }));
      results.push(result);
    }

    if (params.DryRun) {
      Log.Info('[DRY RUN] No files were changed');
    } else {
      try {
        for (const document of documents) {
          for (const path of await Reader.write(document)) {
            Log.Info(`Updated ${relative(Cwd, path) || path}`);
          }
        }
      } catch (error) {
        Log.Error(errorMessage(error));
        return 1;
      }
    }
  }

  return exitCode(results, params, Log, parser);
}

/**
 * Drop every document that another document's include tree already holds,
 * so each file is bumped and written through exactly one root.
 */
export function rootDocuments(documents: RequirementsDocument[]): RequirementsDocument[] {
  let roots: RequirementsDocument[] = [];

  for (const document of documents) {
    if (roots.some((root) => root.documents().includes(document))) continue;

    const tree = document.documents();
    roots = [...roots.filter((root) => !tree.includes(root)), document];
  }

  return roots;
}

/**
 * Split requests across documents: each document gets the requests it
 * declares. Undeclared requests go to the first document under `--add`.
 */
export function planTargets(
  documents: RequirementsDocument[],
  targets: VersionTarget[],
  add: boolean,
  parser = new RequirementParser(),
): { perDocument: VersionTarget[][]; undeclared: VersionTarget[] } {
  const perDocument = documents.map((document) =>
    targets.filter((target) => document.find(target.packageName).length > 0)
  );

  const undeclared = targets.filter((target) =>
    perDocument.every((assigned) =>
      !assigned.some((other) => parser.normalizeName(other.packageName) === parser.normalizeName(target.packageName))
    )
  );

  if (add && undeclared.length > 0) {
    perDocument[0] = [...perDocument[0], ...undeclared];
  }

  return { perDocument, undeclared };
}

function exitCode(results: BumpResult[], params: BumpParams, log: BumpLog, parser: RequirementParser): number {
  if (results.some((result) => result.skipped.some((skip) => FAILED_SKIP_REASONS.has(skip.reason)))) {
    return 1;
  }

  const unresolved = results.flatMap((result) =>
    result.unresolved.map(({ requirement }) => parser.format(requirement.name, requirement.specifiers))
  );

  if (params.Strict && unresolved.length > 0) {
    log.Error(new UnsatisfiedRequirementError([...new Set(unresolved)]).message);
    return 2;
  }

  return 0;
}

function label(cwd: string, document: RequirementsDocument): string {
  return document.path ? relative(cwd, document.path) || document.path : '<document>';
}
