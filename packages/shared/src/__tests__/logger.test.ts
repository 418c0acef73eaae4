import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Writable } from 'stream';
import {
  configureLogger,
  createFileSink,
  createScopedLogger,
  createStreamSink,
  formatEntry,
  logDebug,
  logFullError,
  logInfo,
  logWarn,
  parseLogLevel,
} from '../logger';

function collectingStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('parseLogLevel', () => {
  it('should accept known levels in any case', () => {
    expect(parseLogLevel('debug')).toBe('DEBUG');
    expect(parseLogLevel(' Error ')).toBe('ERROR');
    expect(parseLogLevel('warning')).toBe('WARN');
  });

  it('should default to INFO', () => {
    expect(parseLogLevel(undefined)).toBe('INFO');
    expect(parseLogLevel('loud')).toBe('INFO');
  });
});

describe('formatEntry', () => {
  it('should include level and message', () => {
    const entry = formatEntry('INFO', 'hello');
    expect(entry).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] hello\n$/);
  });

  it('should render object data indented', () => {
    const entry = formatEntry('WARN', 'with data', { a: 1 });
    expect(entry.endsWith('] [WARN] with data\n  Data: {\n    "a": 1\n  }\n')).toBe(true);
  });

  it('should render errors with message', () => {
    const entry = formatEntry('ERROR', 'failed', new Error('boom'));
    expect(entry).toContain('\n  Error: boom');
  });

  it('should render primitives', () => {
    const entry = formatEntry('DEBUG', 'n', 42);
    expect(entry.endsWith('] [DEBUG] n\n  Data: 42\n')).toBe(true);
  });
});

describe('stream sink', () => {
  afterEach(() => {
    configureLogger([]);
  });

  it('should drop entries below the threshold', () => {
    const out = collectingStream();
    configureLogger([createStreamSink(out.stream, 'WARN')]);

    logDebug('quiet');
    logInfo('also quiet');
    logWarn('loud');

    expect(out.text()).not.toContain('quiet');
    expect(out.text()).toContain('[WARN] loud');
  });

  it('should prefix scoped messages', () => {
    const out = collectingStream();
    configureLogger([createStreamSink(out.stream, 'DEBUG')]);

    const log = createScopedLogger('apply');
    log.debug('selecting workspace');
    log.command('terraform apply');

    expect(out.text()).toContain('[DEBUG] [apply] selecting workspace');
    expect(out.text()).toContain('[CMD] Executing: [apply] terraform apply');
  });

  it('should record error context', () => {
    const out = collectingStream();
    configureLogger([createStreamSink(out.stream)]);

    logFullError('redeploy', new Error('no service'), { workspace: 'dev' });

    expect(out.text()).toContain('[ERROR] Error in redeploy');
    expect(out.text()).toContain('"workspace": "dev"');
    expect(out.text()).toContain('"errorMessage": "no service"');
  });
});

describe('file sink', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'docs-mcp-log-'));
  });

  afterEach(() => {
    configureLogger([]);
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write a session header once and then entries', () => {
    const logPath = join(tempDir, 'debug.log');
    configureLogger([createFileSink(logPath, 'Admin CLI')]);

    logInfo('first');
    logInfo('second');

    expect(existsSync(logPath)).toBe(true);
    const content = readFileSync(logPath, 'utf-8');
    expect(content.match(/Admin CLI Session Started/g)).toHaveLength(1);
    expect(content).toContain('[INFO] first');
    expect(content).toContain('[INFO] second');
  });
});
