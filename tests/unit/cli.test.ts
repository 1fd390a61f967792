/**
 * CLI Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { VERSION, main, parseCliArgs } from '../../src/cli';
import { CONFIG_FILE, ConfigError } from '../../src/config';
import { createTempWorkspace, rawExport, type TempWorkspace } from '../helpers/test-harness';

describe('parseCliArgs', () => {
  it('reads the command and flags', () => {
    const parsed = parseCliArgs([
      'report',
      '--exports-dir',
      'in',
      '--master',
      'm.yaml',
      '--output-dir',
      'out',
      '--aliases',
      'a.yaml',
      '--threshold',
      '0.8',
      '--language',
      'en',
      '--reference',
      'survey_A',
      '--pairwise',
    ]);

    expect(parsed.command).toBe('report');
    expect(parsed.configPath).toBe(CONFIG_FILE);
    expect(parsed.cliArgs).toEqual({
      exportsDir: 'in',
      masterPath: 'm.yaml',
      outputDir: 'out',
      sectionAliasesPath: 'a.yaml',
      threshold: 0.8,
      language: 'en',
      reference: 'survey_A',
      pairwise: true,
    });
  });

  it('leaves unset flags out of the CLI layer', () => {
    const parsed = parseCliArgs(['master', '--config', 'custom.yml']);

    expect(parsed.command).toBe('master');
    expect(parsed.configPath).toBe('custom.yml');
    expect(parsed.cliArgs).toEqual({});
  });

  it('reads help and version flags', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--version']).version).toBe(true);
  });

  it('rejects unknown commands and bad thresholds', () => {
    expect(() => parseCliArgs(['publish'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['report', 'extra'])).toThrow(ConfigError);
    expect(() => parseCliArgs(['report', '--threshold', 'high'])).toThrow(ConfigError);
  });
});

describe('main', () => {
  let workspace: TempWorkspace;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workspace = createTempWorkspace();
  });

  afterEach(() => {
    workspace.cleanup();
    vi.restoreAllMocks();
  });

  it('prints the version', () => {
    expect(main(['--version'])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(`v${VERSION}`);
  });

  it('requires a command', () => {
    expect(main([])).toBe(1);
  });

  it('runs master and report', () => {
    workspace.writeExport(
      'survey_A_First_20250101_0800.json',
      rawExport([{ name: 'Allgemein', elements: [{ id: 1, elementType: 'OpenQuestion', code: 'FQ1', text: 'Frage' }] }]),
    );
    const common = [
      '--exports-dir',
      workspace.exportsDir,
      '--master',
      workspace.masterPath,
      '--aliases',
      workspace.aliasesPath,
      '--output-dir',
      workspace.outputDir,
      '--config',
      path.join(workspace.path, CONFIG_FILE),
    ];

    expect(main(['master', ...common])).toBe(0);
    expect(fs.existsSync(workspace.masterPath)).toBe(true);

    expect(main(['report', ...common])).toBe(0);
    expect(fs.existsSync(path.join(workspace.outputDir, 'data.json'))).toBe(true);
  });

  it('exits non-zero when the run fails', () => {
    expect(
      main([
        'report',
        '--exports-dir',
        workspace.exportsDir,
        '--master',
        workspace.masterPath,
        '--config',
        path.join(workspace.path, CONFIG_FILE),
      ]),
    ).toBe(1);
  });
});
