/**
 * Tests for .intcalc.yaml loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CONFIG_FILE_NAME, loadConfig } from '../../src/cli-config.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'intcalc-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function writeConfig(content: string): Promise<void> {
    await fs.writeFile(path.join(tempDir, CONFIG_FILE_NAME), content);
  }

  it('returns null when the file is absent', () => {
    expect(loadConfig(tempDir)).toBeNull();
  });

  it('loads format and verbose', async () => {
    await writeConfig('format: json\nverbose: true\n');

    expect(loadConfig(tempDir)).toEqual({ format: 'json', verbose: true });
  });

  it('treats an empty file as no settings', async () => {
    await writeConfig('');

    expect(loadConfig(tempDir)).toEqual({});
  });

  it('treats a comment-only file as no settings', async () => {
    await writeConfig('# defaults\n');

    expect(loadConfig(tempDir)).toEqual({});
  });

  it('rejects a list', async () => {
    await writeConfig('- human\n');

    expect(() => loadConfig(tempDir)).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects a scalar', async () => {
    await writeConfig('compact\n');

    expect(() => loadConfig(tempDir)).toThrow(
      'Invalid configuration: must be a mapping'
    );
  });

  it('rejects unknown keys', async () => {
    await writeConfig('color: true\n');

    expect(() => loadConfig(tempDir)).toThrow(
      'Invalid configuration: unknown key color'
    );
  });

  it('rejects an unknown format', async () => {
    await writeConfig('format: xml\n');

    expect(() => loadConfig(tempDir)).toThrow(
      'Invalid configuration: format "xml" must be one of: human, json, compact'
    );
  });

  it('rejects a non-boolean verbose', async () => {
    await writeConfig('verbose: yes please\n');

    expect(() => loadConfig(tempDir)).toThrow(
      'Invalid configuration: verbose must be true or false'
    );
  });

  it('reports malformed YAML', async () => {
    await writeConfig('format: [human\n');

    expect(() => loadConfig(tempDir)).toThrow(
      /^Invalid configuration: invalid YAML \(/
    );
  });
});
