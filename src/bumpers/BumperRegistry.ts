import type { VersionProvider } from '../deps/VersionProvider.js';
import type { RequirementsDialect } from '../requirements/RequirementSpec.js';
import type { Bumper } from './Bumper.js';
import type { BumperOptions } from './BumpTypes.js';
import { PinnedBumper } from './PinnedBumper.js';
import { RequirementsBumper } from './RequirementsBumper.js';

export function bumperFor(
  dialect: RequirementsDialect,
  provider: VersionProvider,
  options: BumperOptions = {},
): Bumper {
  switch (dialect) {
    case 'pinned':
      return new PinnedBumper(provider, options);
    case 'requirements':
      return new RequirementsBumper(provider, options);
  }
}
