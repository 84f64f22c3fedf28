import path from 'path';

const PROJECT_ROOT = process.cwd();

export const STORE_DIR = path.resolve(
  PROJECT_ROOT,
  process.env.STORE_DIR || 'store',
);
export const DB_PATH = process.env.DB_PATH || path.join(STORE_DIR, 'journeys.db');

// Milestone/checkpoint table for the journey type served by this process
export const JOURNEY_DEFINITION_PATH =
  process.env.JOURNEY_DEFINITION_PATH ||
  path.resolve(PROJECT_ROOT, 'journeys', 'renovation.json');

// Models
export const MODEL_SENTINEL = process.env.SENTINEL_MODEL || 'claude-haiku-4-5';
export const MODEL_GENERATION =
  process.env.GENERATION_MODEL || 'claude-sonnet-4-5';

// Trailing message windows
export const SENTINEL_WINDOW = 5;
export const GENERATION_WINDOW = 10;

export const EXTRACTION_TIMEOUT = parseInt(
  process.env.EXTRACTION_TIMEOUT || '20000',
  10,
); // 20s
export const GENERATION_TIMEOUT = parseInt(
  process.env.GENERATION_TIMEOUT || '60000',
  10,
); // 60s

// Deterministic keyword matching when the extraction model is unavailable
export const KEYWORD_FALLBACK_ENABLED =
  process.env.KEYWORD_FALLBACK_ENABLED !== 'false'; // true by default

// Expose advance_milestone / complete_journey / remember_user_attribute to the generation model
export const GENERATION_ACTIONS_ENABLED =
  process.env.GENERATION_ACTIONS_ENABLED !== 'false'; // true by default

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
