/**
 * Master Store Unit Tests
 *
 * Tests for extracting, merging, saving and loading the master file.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  MasterFormatError,
  extractMaster,
  loadMaster,
  masterToQuestions,
  mergeMasters,
  questionToRecord,
  saveMaster,
} from '../../src/master-store';
import { choice, lt, makeMatrix, makeQuestion } from '../helpers/test-harness';

let tempDir: string;
let masterPath: string;

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'drift-master-'));
  masterPath = path.join(tempDir, 'master', 'master.yaml');
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

const sampleQuestions = () => [
  makeQuestion('FUnternehmenArt', 'Art des Unternehmens', {
    texts: [lt('Art des Unternehmens'), lt('Type of company', 'en')],
    choices: [choice('1', 'Startup'), choice('2', 'KMU')],
    sectionName: 'Angaben zum Unternehmen',
    sectionIndex: 2,
  }),
  makeQuestion('Q2', 'Pick one'),
  makeMatrix('IZufriedenheit', 'Wie zufrieden sind Sie?', [['r1', 'Preis']], [['1', 'gut'], ['2', 'schlecht']]),
];

describe('questionToRecord', () => {
  it('keeps only the fields a question actually has', () => {
    expect(questionToRecord(makeQuestion('Q2', 'Pick one'))).toEqual({
      element_type: 'SingleChoice',
      texts: { 'de-ch': 'Pick one' },
    });
  });

  it('writes section details and choices', () => {
    const [first] = sampleQuestions();
    expect(questionToRecord(first)).toEqual({
      element_type: 'SingleChoice',
      section_name: 'Angaben zum Unternehmen',
      section_index: 2,
      texts: { 'de-ch': 'Art des Unternehmens', en: 'Type of company' },
      choices: [
        { code: '1', texts: { 'de-ch': 'Startup' } },
        { code: '2', texts: { 'de-ch': 'KMU' } },
      ],
    });
  });

  it('keeps the first text of a repeated language', () => {
    const question = makeQuestion('Q1', 'Erste', { texts: [lt('Erste'), lt('Zweite')] });
    expect(questionToRecord(question).texts).toEqual({ 'de-ch': 'Erste' });
  });

  it('flattens matrix columns', () => {
    const [, , matrix] = sampleQuestions();
    expect(questionToRecord(matrix)).toEqual({
      element_type: 'Matrix',
      texts: { 'de-ch': 'Wie zufrieden sind Sie?' },
      matrix_rows: [{ code: 'r1', texts: { 'de-ch': 'Preis' } }],
      matrix_columns: [
        { code: '1', texts: { 'de-ch': 'gut' } },
        { code: '2', texts: { 'de-ch': 'schlecht' } },
      ],
    });
  });
});

describe('extractMaster', () => {
  it('keys records by normalized code', () => {
    expect([...extractMaster(sampleQuestions()).keys()]).toEqual([
      'UnternehmenArt',
      'Q2',
      'Zufriedenheit',
    ]);
  });

  it('keeps the last question for a repeated normalized code', () => {
    const master = extractMaster([makeQuestion('FX', 'Alt'), makeQuestion('IX', 'Neu')]);
    expect(master).toEqual(new Map([['X', { element_type: 'SingleChoice', texts: { 'de-ch': 'Neu' } }]]));
  });

  it('keeps first-seen order for number-like codes', () => {
    const master = extractMaster([makeQuestion('Zeta', 'Z'), makeQuestion('20', 'Zwanzig'), makeQuestion('3', 'Drei')]);
    expect([...master.keys()]).toEqual(['Zeta', '20', '3']);
  });
});

describe('mergeMasters', () => {
  it('lets newer exports win and keeps codes only found in older ones', () => {
    const older = extractMaster([makeQuestion('Q1', 'Alt'), makeQuestion('Q2', 'Nur alt')]);
    const newer = extractMaster([makeQuestion('Q1', 'Neu'), makeQuestion('Q3', 'Nur neu')]);

    const merged = mergeMasters([older, newer]);

    expect([...merged.keys()]).toEqual(['Q1', 'Q2', 'Q3']);
    expect(merged.get('Q1')?.texts).toEqual({ 'de-ch': 'Neu' });
    expect(merged.get('Q2')?.texts).toEqual({ 'de-ch': 'Nur alt' });
  });

  it('returns an empty master for no extracts', () => {
    expect(mergeMasters([])).toEqual(new Map());
  });
});

describe('saveMaster / loadMaster', () => {
  it('round-trips an extracted master', () => {
    const master = extractMaster(sampleQuestions());

    saveMaster(master, masterPath);

    expect(fs.existsSync(`${masterPath}.tmp`)).toBe(false);
    expect(loadMaster(masterPath)).toEqual(master);
  });

  it('round-trips number-like and reserved codes in file order', () => {
    const master = extractMaster([
      makeQuestion('Zeta', 'Z'),
      makeQuestion('20', 'Zwanzig'),
      makeQuestion('3', 'Drei'),
      makeQuestion('__proto__', 'Reserviert'),
    ]);

    saveMaster(master, masterPath);
    const reloaded = loadMaster(masterPath);

    expect([...reloaded.keys()]).toEqual(['Zeta', '20', '3', '__proto__']);
    expect(reloaded.get('20')?.texts).toEqual({ 'de-ch': 'Zwanzig' });
    expect(reloaded.get('__proto__')?.texts).toEqual({ 'de-ch': 'Reserviert' });
  });

  it('keeps a hand edit and nothing else changes', () => {
    const master = extractMaster(sampleQuestions());
    saveMaster(master, masterPath);

    const content = fs.readFileSync(masterPath, 'utf-8');
    fs.writeFileSync(masterPath, content.replace('Pick one', 'Pick exactly one'), 'utf-8');

    const reloaded = loadMaster(masterPath);
    expect(reloaded.get('Q2')?.texts).toEqual({ 'de-ch': 'Pick exactly one' });
    expect(reloaded.get('UnternehmenArt')).toEqual(master.get('UnternehmenArt'));
    expect(reloaded.get('Zufriedenheit')).toEqual(master.get('Zufriedenheit'));
  });

  it('reads numeric choice codes as strings', () => {
    fs.mkdirSync(path.dirname(masterPath), { recursive: true });
    fs.writeFileSync(
      masterPath,
      'Q1:\n  element_type: SingleChoice\n  texts:\n    de-ch: Frage\n  choices:\n    - code: 1\n      texts:\n        de-ch: Ja\n',
      'utf-8',
    );

    expect(loadMaster(masterPath).get('Q1')?.choices).toEqual([{ code: '1', texts: { 'de-ch': 'Ja' } }]);
  });

  it('loads an empty file as an empty master', () => {
    fs.mkdirSync(path.dirname(masterPath), { recursive: true });
    fs.writeFileSync(masterPath, '', 'utf-8');

    expect(loadMaster(masterPath)).toEqual(new Map());
  });

  it('rejects a file that is not a mapping', () => {
    fs.mkdirSync(path.dirname(masterPath), { recursive: true });
    fs.writeFileSync(masterPath, '- Q1\n- Q2\n', 'utf-8');

    expect(() => loadMaster(masterPath)).toThrow(MasterFormatError);
  });

  it('rejects malformed YAML', () => {
    fs.mkdirSync(path.dirname(masterPath), { recursive: true });
    fs.writeFileSync(masterPath, 'Q1: [unclosed\n', 'utf-8');

    expect(() => loadMaster(masterPath)).toThrow(MasterFormatError);
  });

  it('names the offending field of a misshapen record', () => {
    fs.mkdirSync(path.dirname(masterPath), { recursive: true });
    fs.writeFileSync(masterPath, 'Q1:\n  element_type: Slider\n  texts: {}\n', 'utf-8');

    try {
      loadMaster(masterPath);
      expect.unreachable('loadMaster should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(MasterFormatError);
      if (err instanceof MasterFormatError) {
        expect(err.filePath).toBe(masterPath);
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0].startsWith('Q1.element_type: ')).toBe(true);
      }
    }
  });
});

describe('masterToQuestions', () => {
  it('rebuilds comparable questions from records', () => {
    const questions = masterToQuestions(extractMaster(sampleQuestions()));

    expect(questions.map(q => q.code)).toEqual(['UnternehmenArt', 'Q2', 'Zufriedenheit']);

    const [company, , matrix] = questions;
    expect(company.sectionName).toBe('Angaben zum Unternehmen');
    expect(company.sectionIndex).toBe(2);
    expect(company.texts).toEqual([lt('Art des Unternehmens'), lt('Type of company', 'en')]);
    expect(company.choices.map(c => c.code)).toEqual(['1', '2']);

    expect(matrix.elementType).toBe('Matrix');
    expect(matrix.matrixRows).toEqual([{ id: 0, code: 'r1', texts: [lt('Preis')] }]);
    expect(matrix.matrixColumnGroups).toHaveLength(1);
    expect(matrix.matrixColumnGroups[0].columns.map(c => c.code)).toEqual(['1', '2']);
  });

  it('gives questions without a section index position 0', () => {
    const [question] = masterToQuestions(new Map([['Q1', { element_type: 'OpenQuestion', texts: {} }]]));

    expect(question.sectionIndex).toBe(0);
    expect(question.sectionName).toBeUndefined();
    expect(question.matrixColumnGroups).toEqual([]);
  });
});
