import { promises as fs } from 'fs';
import type { AnalyzedStrain } from './scraper/types';

/** Flat text dump, one block per strain */
export function formatReport(strains: AnalyzedStrain[]): string {
  let out = '';
  for (const strain of strains) {
    out += `\n${'='.repeat(50)}\n`;
    out += `Strain: ${strain.strainName}\n`;
    out += `THC: ${strain.thcPercentage}\n`;
    out += `Analysis:\n${strain.analysis}\n`;
  }
  return out;
}

/**
 * Overwrite `filePath` with the report. A write failure is logged and
 * reported as `false`; it never aborts the run.
 */
export async function saveReport(filePath: string, strains: AnalyzedStrain[]): Promise<boolean> {
  try {
    await fs.writeFile(filePath, formatReport(strains), 'utf-8');
    console.log(`[Report] Saved ${strains.length} strains to ${filePath}`);
    return true;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.log(`Error saving results: ${msg}`);
    return false;
  }
}
