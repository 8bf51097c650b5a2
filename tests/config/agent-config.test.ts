import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { applyEnvOverrides, loadAgentConfig, resolveAgentConfig } from '../../src/config/agent-config.js';
import { ConfigError } from '../../src/exception/errors.js';

describe('resolveAgentConfig', () => {
  it('fills in defaults', () => {
    const config = resolveAgentConfig();

    expect(config.maxSteps).toBe(100);
    expect(config.maxActionsPerStep).toBe(10);
    expect(config.maxConsecutiveFailures).toBe(3);
    expect(config.useVision).toBe(true);
    expect(config.viewportExpansion).toBe(500);
    expect(config.includeAttributes).toContain('aria-label');
    expect(config.sensitiveData).toEqual({});
  });

  it('keeps given values', () => {
    const config = resolveAgentConfig({ maxSteps: 7, viewportExpansion: -1, sensitiveData: { pw: 'test-secret' } });

    expect(config.maxSteps).toBe(7);
    expect(config.viewportExpansion).toBe(-1);
    expect(config.sensitiveData).toEqual({ pw: 'test-secret' });
  });

  it('rejects invalid values with a ConfigError listing the issues', () => {
    let caught: unknown;
    try {
      resolveAgentConfig({ maxSteps: 0, stuckRepeatThreshold: 1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError ? caught.issues.map((issue) => issue.split(':')[0]) : []).toEqual([
      'maxSteps',
      'stuckRepeatThreshold',
    ]);
  });
});

describe('loadAgentConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `agent-config-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('reads and validates a JSON file', async () => {
    const filePath = join(testDir, 'agent.json');
    await writeFile(filePath, JSON.stringify({ maxSteps: 12, useVision: false }), 'utf-8');

    const config = await loadAgentConfig(filePath);

    expect(config.maxSteps).toBe(12);
    expect(config.useVision).toBe(false);
    expect(config.maxActionsPerStep).toBe(10);
  });

  it('reports a missing file', async () => {
    const filePath = join(testDir, 'missing.json');

    await expect(loadAgentConfig(filePath)).rejects.toThrow(`Cannot read config file ${filePath}`);
  });

  it('reports a file that is not JSON', async () => {
    const filePath = join(testDir, 'broken.json');
    await writeFile(filePath, 'maxSteps = 3', 'utf-8');

    await expect(loadAgentConfig(filePath)).rejects.toThrow(`Config file ${filePath} is not valid JSON`);
  });

  it('names the file in validation errors', async () => {
    const filePath = join(testDir, 'bad.json');
    await writeFile(filePath, JSON.stringify({ useVision: 'yes' }), 'utf-8');

    await expect(loadAgentConfig(filePath)).rejects.toThrow(`Invalid configuration (${filePath}): useVision:`);
  });
});

describe('applyEnvOverrides', () => {
  const base = resolveAgentConfig();

  it('applies numeric and boolean variables', () => {
    const config = applyEnvOverrides(base, {
      AGENT_MAX_STEPS: '25',
      AGENT_MAX_FAILURES: '5',
      AGENT_MAX_INPUT_TOKENS: '32000',
      AGENT_USE_VISION: 'FALSE',
    });

    expect(config.maxSteps).toBe(25);
    expect(config.maxConsecutiveFailures).toBe(5);
    expect(config.maxInputTokens).toBe(32000);
    expect(config.useVision).toBe(false);
    expect(base.maxSteps).toBe(100);
  });

  it('ignores unset and empty variables', () => {
    expect(applyEnvOverrides(base, { AGENT_MAX_STEPS: '' })).toEqual(base);
  });

  it('rejects values that are not positive integers', () => {
    expect(() => applyEnvOverrides(base, { AGENT_MAX_STEPS: '0' })).toThrow(
      'AGENT_MAX_STEPS must be a positive integer, got "0"',
    );
    expect(() => applyEnvOverrides(base, { AGENT_USE_VISION: 'maybe' })).toThrow(ConfigError);
  });
});
