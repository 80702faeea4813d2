import { ParseError } from '../../src/bumpers/BumpErrors.js';
import { RequirementParser } from '../../src/requirements/RequirementParser.js';
import { expect, test } from '../test.deps.js';

const parser = new RequirementParser();

// =============================================================================
// RequirementParser.parse() Tests
// =============================================================================

test('RequirementParser.parse - Parses exact pin with trailing comment', () => {
  const spec = parser.parse('alpha==1.0.0  # core');

  expect(spec.name).toBe('alpha');
  expect(spec.packageName).toBe('alpha');
  expect(spec.operator).toBe('exact');
  expect(spec.version).toBe('1.0.0');
  expect(spec.specifiers).toEqual([{ operator: '==', version: '1.0.0' }]);
  expect(spec.indent).toBe('');
  expect(spec.suffix).toBe('  # core');
});

test('RequirementParser.parse - Parses extras and environment marker', () => {
  const spec = parser.parse('Flask_Login[security] >= 0.6 ; python_version < "3.12"');

  expect(spec.name).toBe('Flask_Login');
  expect(spec.packageName).toBe('flask-login');
  expect(spec.extras).toBe('[security]');
  expect(spec.operator).toBe('min');
  expect(spec.specifiers).toEqual([{ operator: '>=', version: '0.6' }]);
  expect(spec.suffix).toBe(' ; python_version < "3.12"');
});

test('RequirementParser.parse - Parses comma separated comparators', () => {
  const spec = parser.parse('beta>0.2,<0.2.5');

  expect(spec.operator).toBe('min');
  expect(spec.version).toBe('0.2');
  expect(spec.specifiers).toEqual([
    { operator: '>', version: '0.2' },
    { operator: '<', version: '0.2.5' },
  ]);
});

test('RequirementParser.parse - Bare name has no constraint', () => {
  const spec = parser.parse('gamma');

  expect(spec.operator).toBe('none');
  expect(spec.version).toBeUndefined();
  expect(spec.specifiers).toEqual([]);
});

test('RequirementParser.parse - Throws ParseError for a missing version', () => {
  expect(() => parser.parse('alpha==')).toThrow(ParseError);
  expect(() => parser.parse('alpha==')).toThrow(
    `Could not parse requirement "alpha==": invalid version specifier '=='`,
  );
});

// =============================================================================
// RequirementParser.parseLine() Tests
// =============================================================================

test('RequirementParser.parseLine - Classifies blanks, comments and options', () => {
  expect(parser.parseLine('', 0)).toEqual({ kind: 'opaque', reason: 'blank', rawText: '', sourceLineIndex: 0 });
  expect(parser.parseLine('# pinned for CI', 1)).toMatchObject({ kind: 'opaque', reason: 'comment' });
  expect(parser.parseLine('--index-url https://mirror.example.com/simple', 2)).toMatchObject({
    kind: 'opaque',
    reason: 'option',
  });
});

test('RequirementParser.parseLine - Recognizes include directives', () => {
  expect(parser.parseLine('-r base.txt', 0)).toMatchObject({ reason: 'include', include: 'base.txt' });
  expect(parser.parseLine('--requirement=dev.txt', 0)).toMatchObject({ reason: 'include', include: 'dev.txt' });
  expect(parser.parseLine('-c constraints.txt', 0)).toMatchObject({ reason: 'include', include: 'constraints.txt' });
});

test('RequirementParser.parseLine - Degrades unparseable lines to opaque', () => {
  const line = parser.parseLine('git+https://example.com/x.git#egg=x', 3);

  expect(line.kind).toBe('opaque');
  expect(line.rawText).toBe('git+https://example.com/x.git#egg=x');
  expect(line.sourceLineIndex).toBe(3);
  if (line.kind === 'opaque') {
    expect(line.reason).toBe('unparsed');
    expect(line.error).toContain('invalid version specifier');
  }
});

// =============================================================================
// RequirementParser.rewrite() Tests
// =============================================================================

test('RequirementParser.rewrite - Replaces the constraint and keeps indent and comment', () => {
  const spec = parser.parse('  alpha==1.0  # pinned');

  expect(parser.rewrite(spec, [{ operator: '==', version: '2.0' }])).toBe('  alpha==2.0  # pinned');
});

test('RequirementParser.rewrite - Keeps extras and marker', () => {
  const spec = parser.parse('Flask_Login[security] >= 0.6 ; python_version < "3.12"');

  expect(parser.rewrite(spec, [{ operator: '>=', version: '0.7' }])).toBe(
    'Flask_Login[security]>=0.7 ; python_version < "3.12"',
  );
});

test('RequirementParser.rewrite - Adds a constraint to a bare name', () => {
  const spec = parser.parse('gamma  # comment');

  expect(parser.rewrite(spec, [{ operator: '==', version: '3.1.4' }])).toBe('gamma==3.1.4  # comment');
});

// =============================================================================
// RequirementParser.parseRequest() Tests
// =============================================================================

test('RequirementParser.parseRequest - Bare name and @latest request latest', () => {
  expect(parser.parseRequest('alpha')).toEqual({ packageName: 'alpha', desiredVersion: 'latest' });
  expect(parser.parseRequest('alpha@latest')).toEqual({ packageName: 'alpha', desiredVersion: 'latest' });
});

test('RequirementParser.parseRequest - Keeps operator and extra specifiers', () => {
  expect(parser.parseRequest('alpha==2.0.0')).toEqual({
    packageName: 'alpha',
    desiredVersion: '2.0.0',
    operator: '==',
  });

  expect(parser.parseRequest('beta>0.2,<0.2.5', true)).toEqual({
    packageName: 'beta',
    desiredVersion: '0.2',
    operator: '>',
    extraSpecifiers: [{ operator: '<', version: '0.2.5' }],
    includeChangelog: true,
  });
});

// =============================================================================
// RequirementParser misc Tests
// =============================================================================

test('RequirementParser.normalizeName - Folds case and separators', () => {
  expect(parser.normalizeName('Foo.Bar__baz')).toBe('foo-bar-baz');
});

test('RequirementParser.requirementsFromChangelog - Collects requires= lists', () => {
  const requirements = parser.requirementsFromChangelog([
    '* requires=localconfig,remote-config>=2.3,<3',
    'Fixed a bug\n- Require=localconfig',
  ]);

  expect(requirements.map((r) => r.name)).toEqual(['localconfig', 'remote-config']);
  expect(requirements[1].specifiers).toEqual([
    { operator: '>=', version: '2.3' },
    { operator: '<', version: '3' },
  ]);
});
