import { BumperDriver } from '../../src/bumpers/BumperDriver.js';
import { RequirementParser } from '../../src/requirements/RequirementParser.js';
import { RequirementsDocument } from '../../src/requirements/RequirementsDocument.js';
import { createMockLog, expect, FakeVersionProvider, test } from '../test.deps.js';

const parser = new RequirementParser();

function createProvider() {
  return new FakeVersionProvider({
    alpha: { versions: ['1.0.0', '2.0.0'] },
    beta: { versions: ['1.0', '1.1', '1.2'] },
    gamma: { versions: ['3.0.0', '3.1.4'] },
    delta: { versions: ['0.3.0'] },
    pkgA: { versions: ['1.0', '1.1', '1.3'] },
    pkgB: { versions: ['1.0', '2.0'], changelog: [{ version: '2.0', text: '* requires=pkgA>=1.2' }] },
    flaky: { versions: ['1.0'], failWith: new Error('connection reset') },
  });
}

function requirements(text: string, path = 'requirements.txt') {
  return RequirementsDocument.parse(text, { path });
}

// =============================================================================
// BumperDriver.bump() - apply phase
// =============================================================================

test('BumperDriver.bump - Bumps a pin and verifies the other requirements', async () => {
  const document = requirements('alpha==1.0.0\nbeta>=1.1\n');
  const driver = new BumperDriver(createProvider());

  const result = await driver.bump(document, [parser.parseRequest('alpha==2.0.0')]);

  expect(document.render()).toBe('alpha==2.0.0\nbeta>=1.1\n');
  expect(result.changes.map((c) => [c.name, c.previousVersion, c.newVersion, c.isDowngrade])).toEqual([
    ['alpha', '1.0.0', '2.0.0', false],
  ]);
  expect(result.changes[0].locations).toEqual([
    { path: 'requirements.txt', lineIndex: 0, previousLine: 'alpha==1.0.0', newLine: 'alpha==2.0.0' },
  ]);
  expect(result.unresolved).toEqual([]);
  expect(result.outcomes).toEqual([{ packageName: 'alpha', state: 'verified' }]);
});

test('BumperDriver.bump - Bare name moves to latest and keeps its comment', async () => {
  const document = requirements('gamma  # comment\n');
  const driver = new BumperDriver(createProvider());

  const result = await driver.bump(document, [{ packageName: 'gamma', desiredVersion: 'latest' }]);

  expect(document.render()).toBe('gamma==3.1.4  # comment\n');
  expect(result.changes[0].previousVersion).toBeUndefined();
  expect(result.changes[0].newVersion).toBe('3.1.4');
});

test('BumperDriver.bump - Empty targets pin every == requirement to latest', async () => {
  const document = requirements('alpha==1.0.0\nbeta>=1.0\ngamma\n');
  const driver = new BumperDriver(createProvider());

  const result = await driver.bump(document, []);

  expect(result.outcomes.map((o) => o.packageName)).toEqual(['alpha']);
  expect(document.render()).toBe('alpha==2.0.0\nbeta>=1.0\ngamma\n');
});

test('BumperDriver.bump - Rewrites every declaration in included documents', async () => {
  const root = requirements('-r base.txt\nalpha==1.0.0\n');
  const base = requirements('beta==1.0\n', 'base.txt');
  root.attach(0, base);
  const driver = new BumperDriver(createProvider());

  const result = await driver.bump(root, [{ packageName: 'beta', desiredVersion: 'latest' }]);

  expect(base.render()).toBe('beta==1.2\n');
  expect(base.dirty).toBe(true);
  expect(root.dirty).toBe(false);
  expect(result.changes[0].locations).toEqual([
    { path: 'base.txt', lineIndex: 0, previousLine: 'beta==1.0', newLine: 'beta==1.2' },
  ]);
});

test('BumperDriver.bump - Duplicate requests bump once', async () => {
  const document = requirements('alpha==1.0.0\n');
  const provider = createProvider();
  const driver = new BumperDriver(provider);

  const result = await driver.bump(document, [
    { packageName: 'alpha', desiredVersion: 'latest' },
    parser.parseRequest('Alpha==1.0.0'),
  ]);

  expect(result.changes).toHaveLength(1);
  expect(result.changes[0].newVersion).toBe('2.0.0');
  expect(result.warnings).toEqual(['Alpha was requested more than once; using the first request']);
  expect(provider.calls).toEqual(['latest:alpha']);
});

test('BumperDriver.bump - Second run over the output changes nothing', async () => {
  const provider = createProvider();
  const first = requirements('alpha==1.0.0\nbeta==1.1\n');
  await new BumperDriver(provider).bump(first, []);

  const second = requirements(first.render());
  const result = await new BumperDriver(provider).bump(second, []);

  expect(first.render()).toBe('alpha==2.0.0\nbeta==1.2\n');
  expect(result.changes).toEqual([]);
  expect(result.skipped.map((s) => s.reason)).toEqual(['up-to-date', 'up-to-date']);
  expect(second.dirty).toBe(false);
});

test('BumperDriver.bump - Unparseable lines survive byte for byte', async () => {
  const text = 'alpha==1.0.0\nthis is free text\ngit+https://example.com/x.git#egg=x\n';
  const document = requirements(text);

  await new BumperDriver(createProvider()).bump(document, []);

  expect(document.render()).toBe('alpha==2.0.0\nthis is free text\ngit+https://example.com/x.git#egg=x\n');
});

test('BumperDriver.bump - Lookup failures skip the package and the run continues', async () => {
  const log = createMockLog();
  const document = requirements('missing==1.0\nflaky==1.0\nalpha==1.0.0\n');
  const driver = new BumperDriver(createProvider(), { log });

  const result = await driver.bump(document, []);

  expect(result.skipped).toEqual([
    { packageName: 'missing', reason: 'not-found', message: 'Package not found: missing' },
    { packageName: 'flaky', reason: 'lookup-failed', message: 'connection reset' },
  ]);
  expect(result.changes.map((c) => c.name)).toEqual(['alpha']);
  expect(result.outcomes.map((o) => o.state)).toEqual(['skipped', 'skipped', 'verified']);
  expect(log.logs).toEqual([
    'WARN: Skipped missing: Package not found: missing',
    'WARN: Skipped flaky: connection reset',
  ]);
});

test('BumperDriver.bump - Latest resolving lower is skipped', async () => {
  const document = requirements('alpha==3.0.0\n');

  const result = await new BumperDriver(createProvider()).bump(document, []);

  expect(result.changes).toEqual([]);
  expect(result.outcomes).toEqual([{ packageName: 'alpha', state: 'skipped', reason: 'downgrade-refused' }]);
  expect(document.dirty).toBe(false);
});

test('BumperDriver.bump - Latest below any declaration is refused whatever the include order', async () => {
  for (const rootText of ['alpha==1.0.0\n-r base.txt\n', '-r base.txt\nalpha==1.0.0\n']) {
    const root = requirements(rootText);
    const base = requirements('alpha==3.0.0\n', 'base.txt');
    root.attach(rootText.indexOf('-r') === 0 ? 0 : 1, base);

    const result = await new BumperDriver(createProvider()).bump(root, []);

    expect(result.changes).toEqual([]);
    expect(result.skipped).toEqual([
      {
        packageName: 'alpha',
        reason: 'downgrade-refused',
        message: 'Latest version 2.0.0 is older than the declared 3.0.0',
      },
    ]);
    expect(root.dirty).toBe(false);
    expect(base.dirty).toBe(false);
  }
});

test('BumperDriver.bump - Allowed downgrade is judged against the highest declaration', async () => {
  const root = requirements('alpha==1.0.0\n-r base.txt\n');
  const base = requirements('alpha==3.0.0\n', 'base.txt');
  root.attach(1, base);

  const result = await new BumperDriver(createProvider(), { allowDowngrade: true }).bump(root, []);

  expect(result.changes.map((c) => [c.previousVersion, c.newVersion, c.isDowngrade])).toEqual([
    ['3.0.0', '2.0.0', true],
  ]);
  expect(root.render()).toBe('alpha==2.0.0\n-r base.txt\n');
  expect(base.render()).toBe('alpha==2.0.0\n');
});

test('BumperDriver.bump - Huge declared versions do not break verification', async () => {
  const document = requirements('alpha==1.0.0\nfoo==99999999999999999999\n');

  const result = await new BumperDriver(createProvider()).bump(document, [
    { packageName: 'alpha', desiredVersion: 'latest' },
  ]);

  expect(document.render()).toBe('alpha==2.0.0\nfoo==99999999999999999999\n');
  expect(result.unresolved).toEqual([]);
});

test('BumperDriver.bump - Undeclared package is appended with a warning', async () => {
  const document = requirements('alpha==1.0.0\n');

  const result = await new BumperDriver(createProvider()).bump(document, [
    { packageName: 'delta', desiredVersion: 'latest' },
  ]);

  expect(document.render()).toBe('alpha==1.0.0\ndelta==0.3.0\n');
  expect(result.warnings).toEqual(['delta is not declared in requirements.txt; adding it']);
  expect(result.changes[0].locations).toEqual([{ path: 'requirements.txt', lineIndex: 1, newLine: 'delta==0.3.0' }]);
});

test('BumperDriver.bump - Ad hoc run reports the change without a document', async () => {
  const result = await new BumperDriver(createProvider()).bump(undefined, [
    { packageName: 'alpha', desiredVersion: 'latest' },
  ]);

  expect(result.changes[0].rewrittenLine).toBe('alpha==2.0.0');
  expect(result.changes[0].locations).toEqual([]);
  expect(result.warnings).toEqual(['alpha is not declared in any requirements file']);
});

test('BumperDriver.bump - Pinned documents resolve ranges to an exact pin', async () => {
  const document = RequirementsDocument.parse('beta==1.0\n', { path: 'pinned.txt', dialect: 'pinned' });

  await new BumperDriver(createProvider()).bump(document, [parser.parseRequest('beta>=1.0,<1.2')]);

  expect(document.render()).toBe('beta==1.1\n');
});

// =============================================================================
// BumperDriver.bump() - verify phase
// =============================================================================

test('BumperDriver.bump - Changelog requirement on an unbumped package is unresolved', async () => {
  const document = requirements('pkgA==1.0\npkgB==1.0\n');
  const driver = new BumperDriver(createProvider(), { includeChangelog: true });

  const result = await driver.bump(document, [{ packageName: 'pkgB', desiredVersion: 'latest' }]);

  expect(result.unresolved).toHaveLength(1);
  expect(result.unresolved[0]).toMatchObject({
    packageName: 'pkga',
    requiredBy: 'pkgB',
    currentVersion: '1.0',
    suggestedVersion: '1.2',
  });
  expect(document.render()).toBe('pkgA==1.0\npkgB==2.0\n');
  expect(result.outcomes).toEqual([{ packageName: 'pkgb', state: 'verified' }]);
});

test('BumperDriver.bump - Requirement is verified once its package is bumped', async () => {
  const document = requirements('pkgA==1.0\npkgB==1.0\n');
  const driver = new BumperDriver(createProvider(), { includeChangelog: true });

  const result = await driver.bump(document, [
    { packageName: 'pkgB', desiredVersion: 'latest' },
    parser.parseRequest('pkgA==1.3'),
  ]);

  expect(result.unresolved).toEqual([]);
  expect(result.outcomes).toEqual([
    { packageName: 'pkgb', state: 'verified' },
    { packageName: 'pkga', state: 'verified' },
  ]);
  expect(document.render()).toBe('pkgA==1.3\npkgB==2.0\n');
});

test('BumperDriver.bump - Declared requirement not met by another declaration is unresolved', async () => {
  const root = requirements('-c constraints.txt\npkgA>=1.2\n');
  root.attach(0, requirements('pkgA==1.0\n', 'constraints.txt'));

  const result = await new BumperDriver(createProvider()).bump(root, [
    { packageName: 'gamma', desiredVersion: '3.1.4' },
  ]);

  expect(result.unresolved.map((u) => [u.packageName, u.currentVersion, u.suggestedVersion])).toEqual([
    ['pkga', '1.0', '1.2'],
  ]);
});

test('BumperDriver.bump - Bumped package that breaks a requirement is a conflict', async () => {
  const document = requirements('pkgA==1.0\npkgB==1.0\n');
  const driver = new BumperDriver(createProvider(), { includeChangelog: true });

  const result = await driver.bump(document, [
    parser.parseRequest('pkgA==1.1'),
    { packageName: 'pkgB', desiredVersion: 'latest' },
  ]);

  expect(result.unresolved.map((u) => [u.packageName, u.currentVersion, u.requiredBy])).toEqual([
    ['pkga', '1.1', 'pkgB'],
  ]);
  expect(result.outcomes).toEqual([
    { packageName: 'pkga', state: 'unresolved' },
    { packageName: 'pkgb', state: 'verified' },
  ]);
  expect(result.warnings).toEqual(['pkgA 1.1 conflicts with pkgA>=1.2 (required by pkgB)']);
});

test('BumperDriver.bump - Downgraded package skips requirement checks', async () => {
  const document = requirements('pkgA==2.0\npkgB==1.0\n');
  const driver = new BumperDriver(createProvider(), { includeChangelog: true });

  const result = await driver.bump(document, [
    parser.parseRequest('pkgA==1.0'),
    { packageName: 'pkgB', desiredVersion: 'latest' },
  ]);

  expect(result.changes[0].isDowngrade).toBe(true);
  expect(result.unresolved).toEqual([]);
  expect(document.render()).toBe('pkgA==1.0\npkgB==2.0\n');
});
