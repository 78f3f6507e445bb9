import type { StrainInfo } from '../types';

const THC_MARKER = 'THC:';

/**
 * Split a batch label like "Blue Dream THC: 24.5%" into name and THC figure.
 * The name ends at the first "THC:", the figure at the next one (if any).
 * The figure is kept as free text.
 */
export function parseStrainInfo(text: string): StrainInfo | null {
  const idx = text.indexOf(THC_MARKER);
  if (idx === -1) return null;

  return {
    strainName: text.slice(0, idx).trim(),
    thcPercentage: text.slice(idx + THC_MARKER.length).split(THC_MARKER)[0].trim(),
  };
}
