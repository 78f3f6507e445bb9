import 'dotenv/config';
import { z } from 'zod';

export const DEFAULT_LISTING_URL = 'https://livwell.com/order_ahead/pre-weighed-flower?page={page}';

const envSchema = z.object({
  LISTING_URL: z.string().url('LISTING_URL must be a full URL').default(DEFAULT_LISTING_URL),
  LISTING_PAGES: z.coerce.number().int().min(1).max(50).default(2),
  OLLAMA_URL: z.string().url('OLLAMA_URL must be a full URL').default('http://localhost:11434'),
  OLLAMA_MODEL: z.string().min(1).default('mistral'),
  OUTPUT_FILE: z.string().min(1).default('strain_analysis.txt'),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  PAGE_TIMEOUT_MS: z.coerce.number().int().min(0).default(10000),
  MODEL_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  SCRAPE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(1),
});

export interface AppConfig {
  listingUrl: string;
  listingPages: number;
  ollamaUrl: string;
  ollamaModel: string;
  outputFile: string;
  requestDelayMs: number;
  pageTimeoutMs: number;
  modelTimeoutMs: number;
  scrapeMaxAttempts: number;
}

/** Build the app config from an environment map. Blank values fall back to defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parse = envSchema.safeParse(present);
  if (!parse.success) {
    const issues = parse.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parse.data;
  return {
    listingUrl: e.LISTING_URL,
    listingPages: e.LISTING_PAGES,
    ollamaUrl: e.OLLAMA_URL,
    ollamaModel: e.OLLAMA_MODEL,
    outputFile: e.OUTPUT_FILE,
    requestDelayMs: e.REQUEST_DELAY_MS,
    pageTimeoutMs: e.PAGE_TIMEOUT_MS,
    modelTimeoutMs: e.MODEL_TIMEOUT_MS,
    scrapeMaxAttempts: e.SCRAPE_MAX_ATTEMPTS,
  };
}
