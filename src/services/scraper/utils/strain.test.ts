import { describe, it, expect } from 'vitest';
import { parseStrainInfo } from './strain';

describe('parseStrainInfo', () => {
  it('splits name and THC figure', () => {
    expect(parseStrainInfo('Blue Dream THC: 24.5%')).toEqual({
      strainName: 'Blue Dream',
      thcPercentage: '24.5%',
    });
  });

  it('returns null without the THC marker', () => {
    expect(parseStrainInfo('Blue Dream 24.5%')).toBeNull();
    expect(parseStrainInfo('')).toBeNull();
  });

  it('is case-sensitive about the marker', () => {
    expect(parseStrainInfo('Blue Dream thc: 24.5%')).toBeNull();
  });

  it('stops the figure at a second marker', () => {
    expect(parseStrainInfo('Sour Diesel THC: 20% THC: 22%')).toEqual({
      strainName: 'Sour Diesel',
      thcPercentage: '20%',
    });
    expect(parseStrainInfo('Runtz THC:THC: 26%')).toEqual({ strainName: 'Runtz', thcPercentage: '' });
  });

  it('keeps empty pieces', () => {
    expect(parseStrainInfo('THC: 18%')).toEqual({ strainName: '', thcPercentage: '18%' });
    expect(parseStrainInfo('  Gelato THC:  ')).toEqual({ strainName: 'Gelato', thcPercentage: '' });
  });

  it('does not validate the figure', () => {
    expect(parseStrainInfo('Mystery THC: ask staff')?.thcPercentage).toBe('ask staff');
  });
});
