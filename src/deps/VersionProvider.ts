/**
 * Capabilities the bump engine needs from a package index.
 *
 * @module
 */

/**
 * Changes published for one version of a package.
 */
export interface ChangelogEntry {
  /** Version the entry belongs to */
  version: string;

  /** Entry text, possibly several lines */
  text: string;
}

/**
 * Source of published versions and changelogs.
 *
 * Implementations own caching, retries and any lookup optimization; callers
 * await one call at a time.
 */
export interface VersionProvider {
  /**
   * Newest production version of a package.
   *
   * @throws PackageNotFoundError if the index does not know the package
   */
  latestVersion(packageName: string): Promise<string>;

  /**
   * All published (non-yanked) versions, newest first.
   *
   * @throws PackageNotFoundError if the index does not know the package
   */
  versions(packageName: string): Promise<string[]>;

  /**
   * Changelog entries after `fromVersion` up to and including `toVersion`,
   * oldest first. An empty list means no data.
   */
  changelog(packageName: string, fromVersion: string, toVersion: string): Promise<ChangelogEntry[]>;
}
