/**
 * Drift Pipeline Integration Test
 *
 * Runs `master` and `report` end to end against exports written to a
 * temporary workspace.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { buildConfig, type DriftConfig } from '../../src/config';
import type { ComparisonExport } from '../../src/export';
import { loadMaster } from '../../src/master-store';
import { DATA_FILE, runGenerateMaster, runReport } from '../../src/orchestrator';
import { createTempWorkspace, rawExport, type TempWorkspace } from '../helpers/test-harness';

const OLDER = 'survey_A_First_20250101_0800';
const NEWER = 'survey_B_Second_20260201_0900';

function writeSampleExports(workspace: TempWorkspace): void {
  workspace.writeExport(
    `${OLDER}.json`,
    rawExport([
      {
        name: 'Allgemein',
        elements: [
          { id: 1, elementType: 'SingleChoice', code: 'FQ1', text: 'Pick one', choices: [['1', 'Ja']] },
          { id: 2, elementType: 'OpenQuestion', code: 'FQ2', text: 'Tell us' },
          { id: 3, elementType: 'OpenQuestion', code: 'FQ3', text: 'Gone' },
        ],
      },
    ]),
  );
  workspace.writeExport(
    `${NEWER}.json`,
    rawExport([
      {
        name: 'Allgemein',
        elements: [
          { id: 1, elementType: 'SingleChoice', code: 'IQ1', text: 'Pick one', choices: [['1', 'Ja']] },
          { id: 2, elementType: 'OpenQuestion', code: 'IQ2', text: 'Choose one' },
          { id: 4, elementType: 'OpenQuestion', code: 'IQ4', text: 'New' },
        ],
      },
    ]),
  );
}

describe('Drift pipeline', () => {
  let workspace: TempWorkspace;
  let config: DriftConfig;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workspace = createTempWorkspace();
    config = buildConfig(
      {
        exportsDir: workspace.exportsDir,
        masterPath: workspace.masterPath,
        sectionAliasesPath: workspace.aliasesPath,
        outputDir: workspace.outputDir,
      },
      {},
      {},
    );
  });

  afterEach(() => {
    workspace.cleanup();
    vi.restoreAllMocks();
  });

  describe('master', () => {
    it('merges all exports with the newest winning', () => {
      writeSampleExports(workspace);

      const result = runGenerateMaster(config);

      expect(result.success).toBe(true);
      expect(result.exportsRead).toBe(2);
      expect(result.questionCount).toBe(4);

      const master = loadMaster(workspace.masterPath);
      expect([...master.keys()]).toEqual(['Q1', 'Q2', 'Q3', 'Q4']);
      expect(master.get('Q2')?.texts).toEqual({ 'de-ch': 'Choose one' });
      expect(master.get('Q3')?.texts).toEqual({ 'de-ch': 'Gone' });
      expect(master.get('Q1')?.section_name).toBe('Allgemein');
    });

    it('fails when there are no exports', () => {
      const result = runGenerateMaster(config);

      expect(result.success).toBe(false);
      expect(result.error).toBe(`No JSON exports found in ${workspace.exportsDir}`);
      expect(fs.existsSync(workspace.masterPath)).toBe(false);
    });

    it('skips an export that cannot be parsed', () => {
      writeSampleExports(workspace);
      fs.writeFileSync(path.join(workspace.exportsDir, 'broken.json'), '{ not json', 'utf-8');

      const result = runGenerateMaster(config);

      expect(result.success).toBe(true);
      expect(result.exportsRead).toBe(2);
      expect(result.summary.errors).toHaveLength(1);
      expect(result.summary.errors[0].stage).toBe('parse');
      expect(result.summary.errors[0].fatal).toBe(false);
    });

    it('reads an export whose text has a character reference outside Unicode', () => {
      writeSampleExports(workspace);
      workspace.writeExport(
        'survey_C_Third_20260301_1000.json',
        rawExport([
          { name: 'Allgemein', elements: [{ id: 5, elementType: 'OpenQuestion', code: 'IQ5', text: 'Preis &#x110000;' }] },
        ]),
      );

      const result = runGenerateMaster(config);

      expect(result.success).toBe(true);
      expect(result.exportsRead).toBe(3);
      expect(result.summary.errors).toEqual([]);
      expect(loadMaster(workspace.masterPath).get('Q5')?.texts).toEqual({ 'de-ch': 'Preis \ufffd' });
    });
  });

  describe('report', () => {
    it('compares the master with every export', () => {
      writeSampleExports(workspace);
      runGenerateMaster(config);

      const result = runReport(config);

      expect(result.success).toBe(true);
      expect(result.dataPath).toBe(path.join(workspace.outputDir, DATA_FILE));
      expect(result.sources).toEqual([
        { source: OLDER, matched: 3, added: 0, removed: 1 },
        { source: NEWER, matched: 3, added: 0, removed: 1 },
      ]);
      expect(result.comparisons).toBe(2);
      expect(result.totalQuestions).toBe(4);

      const data: ComparisonExport = JSON.parse(fs.readFileSync(result.dataPath, 'utf-8'));
      expect(data.meta.sources).toEqual(['master', OLDER, NEWER]);
      expect(data.meta.short_names).toEqual({ master: 'Master', [OLDER]: 'A', [NEWER]: 'B' });
      expect(data.meta.sections).toEqual([{ name: 'Allgemein', codes: ['Q1', 'Q2', 'Q3', 'Q4'] }]);

      const olderDiffs = data.diffs[`master→${OLDER}`];
      expect(Object.keys(olderDiffs)).toEqual(['Q1', 'Q2', 'Q3', 'Q4']);
      expect(olderDiffs.Q1.status).toBe('identical');
      expect(olderDiffs.Q2.status).toBe('text_changed');
      expect(olderDiffs.Q3.status).toBe('identical');
      expect(olderDiffs.Q4.status).toBe('removed');
    });

    it('adds every ordered pair of exports when pairwise', () => {
      writeSampleExports(workspace);
      runGenerateMaster(config);

      const result = runReport({ ...config, pairwise: true });

      expect(result.comparisons).toBe(4);
      const data: ComparisonExport = JSON.parse(fs.readFileSync(result.dataPath, 'utf-8'));
      expect(Object.keys(data.diffs)).toEqual([
        `master→${OLDER}`,
        `master→${NEWER}`,
        `${OLDER}→${NEWER}`,
        `${NEWER}→${OLDER}`,
      ]);
    });

    it('applies section aliases from the alias file', () => {
      writeSampleExports(workspace);
      runGenerateMaster(config);
      fs.writeFileSync(workspace.aliasesPath, 'Allgemein: Allgemeine Angaben\n', 'utf-8');

      const result = runReport(config);

      const data: ComparisonExport = JSON.parse(fs.readFileSync(result.dataPath, 'utf-8'));
      expect(data.meta.sections).toEqual([
        { name: 'Allgemeine Angaben', codes: ['Q1', 'Q2', 'Q3', 'Q4'], aliases: ['Allgemein'] },
      ]);
    });

    it('fails when the master is missing', () => {
      writeSampleExports(workspace);

      const result = runReport(config);

      expect(result.success).toBe(false);
      expect(result.error).toBe(`Master file not found: ${workspace.masterPath} (run "drift master" first)`);
      expect(fs.existsSync(result.dataPath)).toBe(false);
    });

    it('fails on an unknown reference source', () => {
      writeSampleExports(workspace);
      runGenerateMaster(config);

      const result = runReport({ ...config, reference: 'survey_X' });

      expect(result.success).toBe(false);
      expect(result.error).toBe("Unknown reference source 'survey_X'");
    });
  });
});
