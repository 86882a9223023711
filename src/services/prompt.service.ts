import fs from 'fs';
import { logger } from '../config/logger';
import { CUSTOM_PROMPT_KEY, PROMPT_OPTIONS, USER_CONSTANTS } from '../config/constants';
import { AppError } from '../middleware/errorHandler';

export interface ResolvedPrompt {
  prompt: string;
  /** Human-readable note on where the prompt came from */
  status: string;
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** Replace `{{Name}}` placeholders with the matching user constant. */
export function applyUserConstants(
  text: string,
  constants: Record<string, string> = USER_CONSTANTS
): string {
  let resolved = text;
  for (const [name, value] of Object.entries(constants)) {
    resolved = resolved.replace(new RegExp(`\\{\\{${escapeRegExp(name)}\\}\\}`, 'g'), value);
  }
  return resolved;
}

/**
 * Load the system prompt for `key`. The custom key takes the prompt text as
 * given; any other key names a prompt file in `options`.
 */
export function getSystemPrompt(
  key: string,
  options: Record<string, string> = PROMPT_OPTIONS,
  customPrompt?: string,
  constants: Record<string, string> = USER_CONSTANTS
): ResolvedPrompt {
  if (key === CUSTOM_PROMPT_KEY) {
    const status = 'Using custom prompt text from request.';
    logger.info(status);
    return { prompt: applyUserConstants(customPrompt ?? '', constants), status };
  }

  const promptFile = options[key];
  if (!promptFile) {
    throw new AppError(
      `Unknown prompt "${key}". Available: ${[...Object.keys(options), CUSTOM_PROMPT_KEY].join(', ')}`,
      400
    );
  }
  if (!fs.existsSync(promptFile)) {
    logger.warn(`Prompt file not found: ${promptFile}`);
    throw new AppError(`Failed to load system prompt: ${promptFile}`, 500);
  }

  const prompt = applyUserConstants(fs.readFileSync(promptFile, 'utf-8'), constants);
  const status = `Loaded prompt: ${promptFile}`;
  logger.info(status);
  return { prompt, status };
}

/** Keys a client may send as `promptKey`. */
export function listPromptKeys(options: Record<string, string> = PROMPT_OPTIONS): string[] {
  return [...Object.keys(options), CUSTOM_PROMPT_KEY];
}
