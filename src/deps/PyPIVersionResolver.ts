/**
 * Version provider backed by the PyPI JSON API.
 *
 * ## Endpoints
 *
 * - **Package metadata**: `{indexUrl}/{package}/json`
 * - **Changelogs**: `https://raw.githubusercontent.com/{owner}/{repo}/HEAD/{file}`
 *   for the GitHub repository named in the project URLs
 *
 * @module
 */

import { z } from 'zod';
import { BumpError, PackageNotFoundError } from '../bumpers/BumpErrors.js';
import { type BumpLog, silentLog } from '../services/BumpLog.js';
import { ChangelogParser } from './ChangelogParser.js';
import { VersionComparator } from './VersionComparator.js';
import type { ChangelogEntry, VersionProvider } from './VersionProvider.js';

/**
 * Subset of the PyPI project response the resolver reads.
 */
export const PyPIProjectSchema = z.object({
  info: z.object({
    name: z.string(),
    version: z.string(),
    home_page: z.string().nullish(),
    project_urls: z.record(z.string(), z.string()).nullish(),
  }),
  releases: z.record(
    z.string(),
    z.array(
      z.object({
        yanked: z.boolean().optional(),
        upload_time_iso_8601: z.string().optional(),
      }),
    ),
  ),
});

export type PyPIProject = z.infer<typeof PyPIProjectSchema>;

/**
 * Options for the PyPI resolver.
 */
export interface PyPIResolverOptions {
  /** Base URL of the JSON API (default: 'https://pypi.org/pypi') */
  indexUrl?: string;

  /** Fetch timeout in milliseconds (default: 10000) */
  timeout?: number;

  log?: BumpLog;
}

const CHANGELOG_NAMES = ['CHANGELOG', 'CHANGES', 'HISTORY'];
const CHANGELOG_EXTENSIONS = ['.md', '.rst', '.txt', ''];
const CHANGELOG_DIRS = ['', 'docs/'];

const GITHUB_REPO_REGEX = /github\.com\/([A-Za-z0-9_.-]+)\/([A-Za-z0-9_.-]+?)(?:\.git)?(?:[/#?]|$)/;

/**
 * Resolver for package versions and changelogs on PyPI.
 *
 * @example Get the newest version of a package
 * ```typescript
 * const resolver = new PyPIVersionResolver({ timeout: 5000 });
 * const latest = await resolver.latestVersion('requests');
 * ```
 *
 * @example Read what changed between two versions
 * ```typescript
 * const entries = await resolver.changelog('requests', '2.30.0', '2.31.0');
 *
 * for (const entry of entries) {
 *   console.log(`${entry.version}\n${entry.text}`);
 * }
 * ```
 */
export class PyPIVersionResolver implements VersionProvider {
  private comparator = new VersionComparator();
  private parser = new ChangelogParser(this.comparator);
  private cache = new Map<string, PyPIProject>();
  private changelogCache = new Map<string, string | undefined>();

  private readonly indexUrl: string;
  private readonly timeout: number;
  private readonly log: BumpLog;

  public constructor(options: PyPIResolverOptions = {}) {
    this.indexUrl = (options.indexUrl ?? 'https://pypi.org/pypi').replace(/\/+$/, '');
    this.timeout = options.timeout ?? 10000;
    this.log = options.log ?? silentLog;
  }

  async latestVersion(packageName: string): Promise<string> {
    const project = await this.getProject(packageName);
    return project.info.version;
  }

  /**
   * Published versions, newest first. Releases without files and releases
   * whose files are all yanked are left out.
   */
  async versions(packageName: string): Promise<string[]> {
    const project = await this.getProject(packageName);

    const published = Object.entries(project.releases)
      .filter(([, files]) => files.length > 0 && files.some((file) => !file.yanked))
      .map(([version]) => version);

    return this.comparator.sortDescending(published);
  }

  async changelog(packageName: string, fromVersion: string, toVersion: string): Promise<ChangelogEntry[]> {
    const text = await this.getChangelogText(packageName);

    if (text === undefined) {
      this.log.Debug?.(`No changelog found for ${packageName}`);
      return [];
    }

    return this.parser.entriesBetween(text, fromVersion, toVersion);
  }

  /**
   * Find the GitHub repository of a project from its URLs.
   *
   * @returns `owner/repo`, or undefined when no GitHub URL is listed
   */
  findRepository(project: PyPIProject): string | undefined {
    const urls = [
      ...Object.values(project.info.project_urls ?? {}),
      project.info.home_page ?? '',
    ];

    for (const url of urls) {
      const match = GITHUB_REPO_REGEX.exec(url);
      if (match) {
        return `${match[1]}/${match[2]}`;
      }
    }

    return undefined;
  }

  private async getProject(packageName: string): Promise<PyPIProject> {
    const cached = this.cache.get(packageName);
    if (cached) return cached;

    const url = `${this.indexUrl}/${encodeURIComponent(packageName)}/json`;
    this.log.Debug?.(`GET ${url}`);

    const response = await fetch(url, {
      headers: {
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.timeout),
    });

    if (!response.ok) {
      if (response.status === 404) {
        throw new PackageNotFoundError(packageName);
      }
      throw new BumpError(`Failed to fetch PyPI package ${packageName}: ${response.status}`);
    }

    const parsed = PyPIProjectSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new BumpError(`Unexpected PyPI response for ${packageName}`, { cause: parsed.error });
    }

    this.cache.set(packageName, parsed.data);

    return parsed.data;
  }

  private async getChangelogText(packageName: string): Promise<string | undefined> {
    if (this.changelogCache.has(packageName)) {
      return this.changelogCache.get(packageName);
    }

    const repository = this.findRepository(await this.getProject(packageName));
    let text: string | undefined;

    if (repository) {
      for (const file of this.changelogCandidates()) {
        const url = `https://raw.githubusercontent.com/${repository}/HEAD/${file}`;
        this.log.Debug?.(`GET ${url}`);

        const response = await fetch(url, { signal: AbortSignal.timeout(this.timeout) });

        if (response.ok) {
          text = await response.text();
          break;
        }

        if (response.status !== 404) {
          throw new BumpError(`Failed to fetch changelog for ${packageName}: ${response.status}`);
        }
      }
    }

    this.changelogCache.set(packageName, text);

    return text;
  }

  private changelogCandidates(): string[] {
    return CHANGELOG_DIRS.flatMap((dir) =>
      CHANGELOG_NAMES.flatMap((name) => CHANGELOG_EXTENSIONS.map((ext) => `${dir}${name}${ext}`))
    );
  }
}
