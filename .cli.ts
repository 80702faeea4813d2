#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import {
  BumpArgsSchema,
  BumpFlagsSchema,
  BumpParams,
  createBumpServices,
  runBump,
} from './commands/bump.js';
import { errorMessage } from './src/bumpers/BumpErrors.js';
import { BumpConfigStore } from './src/config/BumpConfig.js';
import { consoleLog } from './src/services/BumpLog.js';

/**
 * Version from the nearest package.json, so releases only update one file.
 * The entry runs from the repo root in development and from dist/ when built.
 */
function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));

  for (let depth = 0; depth < 3; depth++) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(join(dir, 'package.json'), 'utf-8'));
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version;
      }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    }
    dir = dirname(dir);
  }

  return '0.0.0';
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

const program = new Command()
  .name('reqbump')
  .description('Bump version constraints in requirements.txt and pinned.txt')
  .version(readVersion())
  .argument('[names...]', 'Packages to bump: name, name==1.2.3 or \'name>=1.2\' (quote ranges)')
  .option('--file <path>', 'Requirements file to bump (repeatable)', collect)
  .option('--add', 'Add requested packages that are not declared yet')
  .option('--changelog', 'Show changelog entries for each bump')
  .option('--allow-downgrade', 'Allow latest to resolve to an older version')
  .option('-n, --dry-run', 'Show what would change without writing')
  .option('--strict', 'Exit with 2 when requirements stay unresolved')
  .option('--debug', 'Turn on debug output')
  .action(async (names: unknown, options: unknown) => {
    const flags = BumpFlagsSchema.parse(options);
    const log = consoleLog(flags.debug ?? false);

    try {
      const config = await new BumpConfigStore(process.cwd()).Load();
      const params = new BumpParams(BumpArgsSchema.parse(names), flags, config);

      process.exitCode = await runBump(params, createBumpServices(config, log));
    } catch (error) {
      if (flags.debug) throw error;

      log.Error(errorMessage(error));
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
