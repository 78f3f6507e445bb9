import * as readline from 'readline';
import type { AnalyzedStrain } from './scraper/types';

export interface RecommendationLoopOptions {
  recommend: (userPreference: string, strains: AnalyzedStrain[]) => Promise<string>;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const QUESTION = '\nWhat are you looking for? ';
const RULE = '-'.repeat(50);

const WELCOME = [
  '\nWelcome to the Strain Recommendation System!',
  "Tell me what you're looking for in a cannabis experience.",
  'Examples:',
  "- 'I want something to help with creativity'",
  "- 'Looking for a relaxing indica for evening use'",
  "- 'Need something for anxiety that won't make me too sleepy'",
  "\nType 'quit' to exit",
];

/**
 * Read preferences line by line and answer each with model recommendations.
 * Ends on "quit" (any case) or end of input. Returns how many answers were given.
 */
export async function runRecommendationLoop(
  strains: AnalyzedStrain[],
  options: RecommendationLoopOptions
): Promise<number> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const say = (line: string) => output.write(`${line}\n`);

  const rl = readline.createInterface({ input, terminal: false });
  let served = 0;

  try {
    for (const line of WELCOME) say(line);
    output.write(QUESTION);

    for await (const raw of rl) {
      const userInput = raw.trim();

      if (userInput.toLowerCase() === 'quit') break;

      if (!userInput) {
        say('Please provide some preferences to get recommendations.');
        output.write(QUESTION);
        continue;
      }

      say('\nAnalyzing your preferences...');
      const recommendations = await options.recommend(userInput, strains);
      served++;

      say('\nRecommendations:');
      say(RULE);
      say(recommendations);
      say(RULE);
      output.write(QUESTION);
    }
  } finally {
    rl.close();
  }

  return served;
}
