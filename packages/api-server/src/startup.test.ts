import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG } from '@blogboard/core';
import { applyPortOverride, loadServerConfig, parsePort } from './startup.js';

describe('loadServerConfig', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await mkdtemp(join(tmpdir(), 'blogboard-startup-'));
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it('should fall back to defaults without a config file', async () => {
    const result = await loadServerConfig(rootDir);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.usedDefaults).toBe(true);
      expect(result.value.config).toEqual(DEFAULT_CONFIG);
    }
  });

  it('should load an existing config file', async () => {
    await writeFile(join(rootDir, '.blogboard.yaml'), 'server:\n  port: 8080\n');

    const result = await loadServerConfig(rootDir);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.usedDefaults).toBe(false);
      expect(result.value.config.server.port).toBe(8080);
    }
  });

  it('should fail on an invalid config file', async () => {
    await writeFile(join(rootDir, '.blogboard.yaml'), 'server:\n  port: 70000\n');

    const result = await loadServerConfig(rootDir);

    expect(result.isErr()).toBe(true);
  });
});

describe('parsePort', () => {
  it('should accept ports in range', () => {
    expect(parsePort('5002')._unsafeUnwrap()).toBe(5002);
  });

  it.each(['0', '65536', 'abc', '80.5'])('should reject %s', (value) => {
    const result = parsePort(value);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(`Invalid port number: ${value}`);
    }
  });
});

describe('applyPortOverride', () => {
  it('should keep the config port without an override', () => {
    expect(applyPortOverride(DEFAULT_CONFIG, undefined)._unsafeUnwrap().server.port).toBe(5002);
    expect(applyPortOverride(DEFAULT_CONFIG, '')._unsafeUnwrap().server.port).toBe(5002);
  });

  it('should replace the port', () => {
    const result = applyPortOverride(DEFAULT_CONFIG, '9000')._unsafeUnwrap();

    expect(result.server.port).toBe(9000);
    expect(result.server.corsOrigin).toBe(DEFAULT_CONFIG.server.corsOrigin);
  });
});
