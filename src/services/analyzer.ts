import type { AnalyzedStrain, StrainInfo } from './scraper/types';
import { buildAnalysisPrompt, buildRecommendationPrompt } from './prompts';

/** Anything that can turn a prompt into model text (OllamaClient in production) */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Ask the model about one strain. Failures come back as text, never thrown */
export async function getStrainAnalysis(model: TextGenerator, info: StrainInfo): Promise<string> {
  try {
    return await model.generate(buildAnalysisPrompt(info.strainName, info.thcPercentage));
  } catch (err) {
    console.error(`[Ollama] Analysis failed for ${info.strainName}: ${errorMessage(err)}`);
    return `Error getting analysis: ${errorMessage(err)}`;
  }
}

export async function getStrainRecommendations(
  model: TextGenerator,
  userPreference: string,
  strains: AnalyzedStrain[]
): Promise<string> {
  try {
    return await model.generate(buildRecommendationPrompt(userPreference, strains));
  } catch (err) {
    console.error(`[Ollama] Recommendation failed: ${errorMessage(err)}`);
    return `Error getting recommendations: ${errorMessage(err)}`;
  }
}
