import { validatePipeline } from '../../src/dsl/validator';
import { makeDocument } from './fixtures';

function codes(doc: unknown): string[] {
  return validatePipeline(doc).errors.map((e) => e.code);
}

describe('validatePipeline', () => {
  test('accepts a valid document and returns the typed pipeline', () => {
    const result = validatePipeline(makeDocument({ if: "event == 'push'" }));
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.pipeline?.name).toBe('Docs');
    expect(result.pipeline?.on.push.branches).toEqual(['main']);
    expect(result.pipeline?.if).toBe("event == 'push'");
    expect(result.pipeline?.steps.map((s) => s.id)).toEqual(['checkout', 'build', 'publish']);
    expect(result.pipeline?.steps[1].workingDirectory).toBe('docs');
  });

  test('rejects a non-object document', () => {
    expect(codes([])).toEqual(['VALIDATION.INVALID_DOCUMENT']);
    expect(codes('steps')).toEqual(['VALIDATION.INVALID_DOCUMENT']);
  });

  test('reports every missing required field', () => {
    const result = validatePipeline({ name: 'Docs' });
    expect(result.errors.map((e) => e.message)).toEqual([
      'Missing required field: specVersion',
      'Missing required field: on',
      'Missing required field: steps',
    ]);
  });

  test('rejects unsupported versions', () => {
    expect(codes(makeDocument({ specVersion: '2.0.0' }))).toEqual(['VALIDATION.UNSUPPORTED_VERSION']);
  });

  test('requires at least one trigger branch', () => {
    expect(codes(makeDocument({ on: { push: { branches: [] } } }))).toEqual(['VALIDATION.INVALID_TRIGGER']);
    expect(codes(makeDocument({ on: { pull_request: {} } }))).toEqual(['VALIDATION.INVALID_TRIGGER']);
  });

  test('rejects an overly long pipeline name', () => {
    expect(codes(makeDocument({ name: 'x'.repeat(257) }))).toEqual(['VALIDATION.NAME_TOO_LONG']);
  });

  test('rejects malformed conditions with their position', () => {
    const result = validatePipeline(makeDocument({ if: "event = 'push'" }));
    expect(result.valid).toBe(false);
    expect(result.errors[0].code).toBe('VALIDATION.INVALID_CONDITION');
    expect(result.errors[0].details).toEqual({ condition: "event = 'push'", position: 6 });
  });

  test('enforces timeout bounds', () => {
    expect(codes(makeDocument({ timeoutMinutes: 0 }))).toEqual(['VALIDATION.INVALID_TIMEOUT']);
    expect(codes(makeDocument({ timeoutMinutes: 361 }))).toEqual(['VALIDATION.INVALID_TIMEOUT']);
  });

  test('env values must be strings', () => {
    const result = validatePipeline(makeDocument({ env: { LANG: 'C', DEBUG: 1 } }));
    expect(result.errors.map((e) => e.message)).toEqual(['"env.DEBUG" must be a string']);
  });

  test('parses secret requirements', () => {
    const result = validatePipeline(makeDocument({ secrets: [{ key: 'DEPLOY_TOKEN', required: true }, { key: 'OPTIONAL' }] }));
    expect(result.pipeline?.secrets).toEqual([
      { key: 'DEPLOY_TOKEN', required: true, description: undefined },
      { key: 'OPTIONAL', required: false, description: undefined },
    ]);
  });

  test('rejects empty step lists', () => {
    expect(codes(makeDocument({ steps: [] }))).toEqual(['VALIDATION.EMPTY_STEPS']);
  });

  test('reports missing step fields', () => {
    const result = validatePipeline(makeDocument({ steps: [{ id: 'a', type: 'shell' }] }));
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('VALIDATION.STEP_REQUIRED_FIELD');
    expect(result.errors[0].message).toBe('Step at index 0 is missing required fields: name');
  });

  test('rejects invalid step ids and unknown step types', () => {
    const result = validatePipeline(
      makeDocument({
        steps: [
          { id: 'Build Docs', name: 'Build', type: 'shell', with: { run: 'make' } },
          { id: 'deploy', name: 'Deploy', type: 'docker' },
        ],
      }),
    );
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.INVALID_STEP_ID', 'VALIDATION.INVALID_STEP_TYPE']);
    expect(result.errors[1].message).toBe('Step "deploy" has unknown type "docker"');
  });

  test('rejects duplicate step ids', () => {
    const step = { id: 'build', name: 'Build', type: 'shell', with: { run: 'make' } };
    const result = validatePipeline(makeDocument({ steps: [step, step] }));
    expect(result.errors.map((e) => e.message)).toEqual(['Duplicate step ID: build']);
  });

  test('working directories must stay inside the workspace', () => {
    const escape = (workingDirectory: string) =>
      codes(makeDocument({ steps: [{ id: 'a', name: 'A', type: 'shell', workingDirectory, with: { run: 'ls' } }] }));
    expect(escape('../outside')).toEqual(['VALIDATION.INVALID_WORKING_DIRECTORY']);
    expect(escape('docs/../../outside')).toEqual(['VALIDATION.INVALID_WORKING_DIRECTORY']);
    expect(escape('/etc')).toEqual(['VALIDATION.INVALID_WORKING_DIRECTORY']);
  });

  test('normalizes working directories', () => {
    const result = validatePipeline(
      makeDocument({
        steps: [
          { id: 'a', name: 'A', type: 'shell', workingDirectory: './docs//build/', with: { run: 'ls' } },
          { id: 'p', name: 'P', type: 'publish-branch', with: { branch: 'gh-pages', source: 'a', target: 'b' } },
        ],
      }),
    );
    expect(result.pipeline?.steps[0].workingDirectory).toBe('docs/build/');
  });

  test('bounds maxAttempts', () => {
    const withAttempts = (maxAttempts: unknown) =>
      codes(makeDocument({ steps: [{ id: 'a', name: 'A', type: 'checkout', maxAttempts }] }));
    expect(withAttempts(0)).toEqual(['VALIDATION.INVALID_MAX_ATTEMPTS']);
    expect(withAttempts(6)).toEqual(['VALIDATION.INVALID_MAX_ATTEMPTS']);
    expect(withAttempts(1.5)).toEqual(['VALIDATION.INVALID_MAX_ATTEMPTS']);
    expect(withAttempts(3)).toEqual([]);
  });

  test('"with" must be an object', () => {
    expect(codes(makeDocument({ steps: [{ id: 'a', name: 'A', type: 'shell', with: 'make' }] }))).toEqual([
      'VALIDATION.INVALID_INPUTS',
    ]);
  });

  describe('step input contracts', () => {
    function stepErrors(step: Record<string, unknown>): string[] {
      return validatePipeline(makeDocument({ steps: [step] })).errors.map((e) => e.message);
    }

    test('missing required input', () => {
      const result = validatePipeline(makeDocument({ steps: [{ id: 'build', name: 'Build', type: 'shell' }] }));
      expect(result.valid).toBe(false);
      expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.HANDLER_CONTRACT']);
      expect(result.errors[0].message).toBe('Step "build": missing required input "run" for step type "shell"');
      expect(result.errors[0].stepId).toBe('build');
      expect(result.errors[0].suggestedFixes.map((f) => f.description)).toEqual(['Script to run']);
    });

    test('a blank required string counts as missing', () => {
      expect(stepErrors({ id: 'build', name: 'Build', type: 'shell', with: { run: '  ' } })).toEqual([
        'Step "build": missing required input "run" for step type "shell"',
      ]);
    });

    test('unknown inputs are rejected alongside missing ones', () => {
      expect(stepErrors({ id: 'build', name: 'Build', type: 'shell', with: { bogus: 1 } })).toEqual([
        'Step "build": missing required input "run" for step type "shell"',
        'Step "build": unknown input "bogus" for step type "shell"',
      ]);
    });

    test('inherited property names are not known inputs', () => {
      expect(stepErrors({ id: 'build', name: 'Build', type: 'shell', with: { run: 'make', constructor: 'x', toString: 'y' } })).toEqual([
        'Step "build": unknown input "constructor" for step type "shell"',
        'Step "build": unknown input "toString" for step type "shell"',
      ]);
    });

    test('wrong input type', () => {
      expect(stepErrors({ id: 'checkout', name: 'Check out', type: 'checkout', with: { fetchDepth: '0' } })).toEqual([
        'Step "checkout": input "fetchDepth" must be type "number", got "string"',
      ]);
    });

    test('value outside the allowed set', () => {
      const result = validatePipeline(
        makeDocument({ steps: [{ id: 'build', name: 'Build', type: 'shell', with: { run: 'make', shell: 'zsh' } }] }),
      );
      expect(result.errors.map((e) => e.message)).toEqual([
        'Step "build": input "shell" has invalid value "zsh". Allowed: bash, sh',
      ]);
      expect(result.errors[0].suggestedFixes.map((f) => f.description)).toEqual(['Use "bash" for shell', 'Use "sh" for shell']);
    });

    test('publish-branch requires branch, source and target', () => {
      expect(stepErrors({ id: 'publish', name: 'Publish', type: 'publish-branch', with: { branch: 'gh-pages' } })).toEqual([
        'Step "publish": missing required input "source" for step type "publish-branch"',
        'Step "publish": missing required input "target" for step type "publish-branch"',
      ]);
    });

    test('setup-runtime accepts only known runtimes', () => {
      expect(
        stepErrors({ id: 'setup', name: 'Setup', type: 'setup-runtime', with: { runtime: 'ruby', version: '3.2' } }),
      ).toEqual(['Step "setup": input "runtime" has invalid value "ruby". Allowed: python, node']);
    });
  });

  describe('warnings', () => {
    test('step timeout longer than the job timeout', () => {
      const result = validatePipeline(makeDocument({ timeoutMinutes: 10 }));
      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual(['Step "build" timeout (20m) exceeds the job timeout (10m)']);
    });

    test('no publish step', () => {
      const result = validatePipeline(
        makeDocument({ steps: [{ id: 'build', name: 'Build', type: 'shell', with: { run: 'make' } }] }),
      );
      expect(result.warnings).toEqual(['Pipeline has no publish-branch step; generated output will not be published']);
    });

    test('retried shell scripts', () => {
      const result = validatePipeline(
        makeDocument({
          steps: [
            { id: 'build', name: 'Build', type: 'shell', maxAttempts: 2, with: { run: 'make' } },
            { id: 'p', name: 'P', type: 'publish-branch', with: { branch: 'gh-pages', source: 'a', target: 'b' } },
          ],
        }),
      );
      expect(result.warnings).toEqual(['Step "build" retries a shell script; make sure it is safe to run more than once']);
    });
  });
});
