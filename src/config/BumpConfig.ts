import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { BumpError } from '../bumpers/BumpErrors.js';

export const BumpConfigSchema = z.object({
  targets: z.array(z.string()).default(['requirements.txt', 'pinned.txt'])
    .describe('Requirements files bumped when no --file is given'),
  indexUrl: z.string().url().default('https://pypi.org/pypi')
    .describe('Base URL of the PyPI JSON API'),
  timeout: z.number().int().positive().default(10000)
    .describe('Index request timeout in milliseconds'),
  changelog: z.boolean().default(false)
    .describe('Include changelog excerpts in the summary'),
  allowDowngrade: z.boolean().default(false)
    .describe('Let latest resolve to an older version'),
});

export type BumpConfig = z.infer<typeof BumpConfigSchema>;

export const BUMP_CONFIG_FILE = 'reqbump.config.json';

/**
 * Loads `reqbump.config.json` from a working directory, applying defaults and
 * the `REQBUMP_INDEX_URL` / `REQBUMP_TIMEOUT` environment overrides.
 */
export class BumpConfigStore {
  public constructor(
    protected readonly cwd: string,
    protected readonly env: Record<string, string | undefined> = process.env,
    protected readonly fileName = BUMP_CONFIG_FILE,
  ) {}

  get Path(): string {
    return join(this.cwd, this.fileName);
  }

  /**
   * @throws BumpError if the file is not valid JSON or fails validation
   */
  public async Load(): Promise<BumpConfig> {
    const raw = { ...(await this.loadFile()), ...this.envOverrides() };
    const parsed = BumpConfigSchema.safeParse(raw);

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new BumpError(`Invalid configuration in ${this.Path}: ${issues.join('; ')}`);
    }

    return parsed.data;
  }

  protected async loadFile(): Promise<Record<string, unknown>> {
    let text: string;

    try {
      text = await readFile(this.Path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw new BumpError(`Could not read ${this.Path}`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new BumpError(`Invalid JSON in ${this.Path}`, { cause: error });
    }

    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new BumpError(`Expected a JSON object in ${this.Path}`);
    }

    return Object.fromEntries(Object.entries(data));
  }

  protected envOverrides(): Record<string, unknown> {
    const overrides: Record<string, unknown> = {};

    if (this.env.REQBUMP_INDEX_URL) {
      overrides.indexUrl = this.env.REQBUMP_INDEX_URL;
    }

    if (this.env.REQBUMP_TIMEOUT) {
      overrides.timeout = Number(this.env.REQBUMP_TIMEOUT);
    }

    return overrides;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
