import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { formatReport, saveReport } from './report';

const strains = [
  { strainName: 'Blue Dream', thcPercentage: '24%', analysis: 'Balanced hybrid.\nGood for daytime.' },
  { strainName: 'Gelato', thcPercentage: '21%', analysis: 'Calming.' },
];

const RULE = '='.repeat(50);

describe('formatReport', () => {
  it('writes one block per strain', () => {
    expect(formatReport(strains)).toBe(
      `\n${RULE}\nStrain: Blue Dream\nTHC: 24%\nAnalysis:\nBalanced hybrid.\nGood for daytime.\n` +
        `\n${RULE}\nStrain: Gelato\nTHC: 21%\nAnalysis:\nCalming.\n`
    );
  });

  it('is empty without strains', () => {
    expect(formatReport([])).toBe('');
  });
});

describe('saveReport', () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'strain-report-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('overwrites the report file', async () => {
    const file = path.join(dir, 'strain_analysis.txt');
    await fs.writeFile(file, 'stale contents from the previous run', 'utf-8');

    await expect(saveReport(file, strains)).resolves.toBe(true);

    await expect(fs.readFile(file, 'utf-8')).resolves.toBe(formatReport(strains));
    expect(console.log).toHaveBeenCalledWith(`[Report] Saved 2 strains to ${file}`);
  });

  it('logs and reports write failures instead of throwing', async () => {
    const file = path.join(dir, 'missing-dir', 'strain_analysis.txt');

    await expect(saveReport(file, strains)).resolves.toBe(false);

    expect(console.log).toHaveBeenCalledWith(expect.stringMatching(/^Error saving results: ENOENT/));
  });
});
