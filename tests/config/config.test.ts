import * as path from 'path';
import { ConfigError, DEFAULT_PIPELINE_FILE, loadConfig, parseBoolean, parseLogFormat } from '../../src/config';
import { LogLevel } from '../../src/logger';

const cwd = path.resolve('/repo');

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({}, cwd)).toEqual({
      pipelineFile: DEFAULT_PIPELINE_FILE,
      workspace: cwd,
      logLevel: LogLevel.Info,
      logFormat: 'text',
      dryRun: false,
      event: 'push',
      ref: undefined,
      workflow: undefined,
    });
  });

  it('reads overrides and CI variables', () => {
    const config = loadConfig(
      {
        DOCS_FLOW_FILE: 'ci/docs.json',
        DOCS_FLOW_WORKSPACE: 'checkout',
        DOCS_FLOW_LOG_LEVEL: 'DEBUG',
        DOCS_FLOW_LOG_FORMAT: 'json',
        DOCS_FLOW_DRY_RUN: 'yes',
        GITHUB_EVENT_NAME: 'pull_request',
        GITHUB_REF: 'refs/heads/main',
        GITHUB_WORKFLOW: 'Docs',
      },
      cwd,
    );

    expect(config.pipelineFile).toBe('ci/docs.json');
    expect(config.workspace).toBe(path.resolve(cwd, 'checkout'));
    expect(config.logLevel).toBe(LogLevel.Debug);
    expect(config.logFormat).toBe('json');
    expect(config.dryRun).toBe(true);
    expect(config.event).toBe('pull_request');
    expect(config.ref).toBe('refs/heads/main');
    expect(config.workflow).toBe('Docs');
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ DOCS_FLOW_FILE: '  ', GITHUB_REF: '', DOCS_FLOW_LOG_LEVEL: ' ' }, cwd);
    expect(config.pipelineFile).toBe(DEFAULT_PIPELINE_FILE);
    expect(config.ref).toBeUndefined();
    expect(config.logLevel).toBe(LogLevel.Info);
  });

  it('rejects an unknown log level', () => {
    const err = configError(() => loadConfig({ DOCS_FLOW_LOG_LEVEL: 'loud' }, cwd));
    expect(err.typedError.code).toBe('CONFIG.INVALID_VALUE');
    expect(err.message).toBe('DOCS_FLOW_LOG_LEVEL has invalid value "loud". Allowed: debug, info, warn, error');
  });

  it('rejects an unparseable dry-run flag', () => {
    const err = configError(() => loadConfig({ DOCS_FLOW_DRY_RUN: 'maybe' }, cwd));
    expect(err.message).toBe('DOCS_FLOW_DRY_RUN has invalid value "maybe". Allowed: 1, true, yes, 0, false, no');
    expect(err.typedError.details).toEqual({ variable: 'DOCS_FLOW_DRY_RUN', value: 'maybe' });
  });
});

describe('parseBoolean', () => {
  it.each([
    ['1', true],
    ['TRUE', true],
    [' yes ', true],
    ['0', false],
    ['false', false],
    ['', false],
  ])('parses %j', (value, expected) => {
    expect(parseBoolean('FLAG', value)).toBe(expected);
  });
});

describe('parseLogFormat', () => {
  it('normalizes case', () => {
    expect(parseLogFormat('--log-format', 'JSON')).toBe('json');
  });

  it('rejects other formats', () => {
    const err = configError(() => parseLogFormat('--log-format', 'xml'));
    expect(err.message).toBe('--log-format has invalid value "xml". Allowed: text, json');
  });
});
