import type { AnalyzedStrain } from './scraper/types';

export function buildAnalysisPrompt(strainName: string, thcPercentage: string): string {
  return `Please analyze the cannabis strain ${strainName} and provide:
1. General Profile:
   * THC content: ${thcPercentage}
   * Strain family (Indica/Sativa/Hybrid)
2. Primary Effects:
   * Mental effects (mood, creativity, focus)
   * Physical sensations
   * Duration/onset expectations`;
}

/** Strain block embedded in the recommendation prompt */
export function formatStrainsForPrompt(strains: AnalyzedStrain[]): string {
  let formatted = '';
  for (const strain of strains) {
    formatted += `\nStrain: ${strain.strainName}\n`;
    formatted += `THC: ${strain.thcPercentage}\n`;
    formatted += `Analysis: ${strain.analysis}\n`;
    formatted += '-'.repeat(30) + '\n';
  }
  return formatted;
}

export function buildRecommendationPrompt(userPreference: string, strains: AnalyzedStrain[]): string {
  return `Given this list of cannabis strains and their analyses, recommend the best options for someone who says: "${userPreference}"

Here are the strains to consider:

${formatStrainsForPrompt(strains)}

Please provide:
1. Top 2-3 recommended strains with brief explanations why
2. Any relevant warnings or considerations
3. Suggested usage tips`;
}
