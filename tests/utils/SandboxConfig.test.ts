import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError } from '../../src/sandbox/errors';
import { loadSandboxConfig } from '../../src/utils/SandboxConfig';

describe('loadSandboxConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sandbox-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  it('should fall back to defaults when no file exists', () => {
    const config = loadSandboxConfig(dir, {});

    expect(config.source).toBeUndefined();
    expect(config.apiKey).toBeUndefined();
    expect(config.policy.maxExecutionSeconds).toBe(10);
    expect(config.policy.maxOutputChars).toBe(10_000);
    expect(config.generator).toEqual({ model: 'gpt-3.5-turbo', temperature: 0.3, maxTokens: 1500 });
  });

  it('should read the config file in the working directory', () => {
    const file = writeConfig('snippet-sandbox.config.json', {
      policy: { maxExecutionSeconds: 2, allowedImports: ['path'] },
      generator: { model: 'test-model' },
    });

    const config = loadSandboxConfig(dir, {});

    expect(config.source).toBe(file);
    expect(config.policy.maxExecutionSeconds).toBe(2);
    expect([...config.policy.allowedImports]).toEqual(['path']);
    expect(config.generator.model).toBe('test-model');
    expect(config.generator.maxTokens).toBe(1500);
  });

  it('should use the example file when no main file exists', () => {
    const file = writeConfig('snippet-sandbox.config.example.json', { policy: { maxOutputChars: 99 } });

    const config = loadSandboxConfig(dir, {});

    expect(config.source).toBe(file);
    expect(config.policy.maxOutputChars).toBe(99);
  });

  it('should prefer an explicit SANDBOX_CONFIG path', () => {
    writeConfig('snippet-sandbox.config.json', { policy: { maxOutputChars: 1 } });
    const file = writeConfig('custom.json', { policy: { maxOutputChars: 2 } });

    const config = loadSandboxConfig(dir, { SANDBOX_CONFIG: 'custom.json' });

    expect(config.source).toBe(file);
    expect(config.policy.maxOutputChars).toBe(2);
  });

  it('should fail when SANDBOX_CONFIG points at a missing file', () => {
    expect(() => loadSandboxConfig(dir, { SANDBOX_CONFIG: 'missing.json' })).toThrow(
      `Sandbox configuration file not found: ${path.join(dir, 'missing.json')}`,
    );
  });

  it('should fail on malformed JSON', () => {
    const file = writeConfig('snippet-sandbox.config.json', '{ not json');

    expect(() => loadSandboxConfig(dir, {})).toThrow(
      `Failed to read sandbox configuration from ${file}`,
    );
  });

  it('should fail on invalid settings', () => {
    const file = writeConfig('snippet-sandbox.config.json', { policy: { maxOutputChars: -5 } });

    expect(() => loadSandboxConfig(dir, {})).toThrow(ConfigurationError);
    expect(() => loadSandboxConfig(dir, {})).toThrow(
      `Invalid sandbox configuration in ${file}: policy.maxOutputChars: Number must be greater than 0`,
    );
  });

  it('should read the API key from the environment only', () => {
    writeConfig('snippet-sandbox.config.json', { apiKey: 'ignored' });

    expect(loadSandboxConfig(dir, { OPENAI_API_KEY: 'test-key' }).apiKey).toBe('test-key');
    expect(loadSandboxConfig(dir, {}).apiKey).toBeUndefined();
  });
});
