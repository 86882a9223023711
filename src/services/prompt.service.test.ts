import fs from 'fs';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { applyUserConstants, getSystemPrompt, listPromptKeys } from './prompt.service';
import { AppError } from '../middleware/errorHandler';
import { PROMPT_OPTIONS } from '../config/constants';
import { makeTempDir, removeDir } from '../test/helpers';

describe('applyUserConstants', () => {
  it('replaces every occurrence of each placeholder', () => {
    expect(applyUserConstants('Hi {{Username}}, bye {{Username}}.', { Username: 'Alex' })).toBe(
      'Hi Alex, bye Alex.'
    );
  });

  it('leaves unknown placeholders alone', () => {
    expect(applyUserConstants('{{Case}} for {{Username}}', { Username: 'Alex' })).toBe(
      '{{Case}} for Alex'
    );
  });
});

describe('getSystemPrompt', () => {
  let dir: string;
  let options: Record<string, string>;

  beforeEach(() => {
    dir = makeTempDir();
    const file = path.join(dir, 'brief.txt');
    fs.writeFileSync(file, 'Summarize for {{Username}}.');
    options = { brief: file, missing: path.join(dir, 'nope.txt') };
  });

  afterEach(() => removeDir(dir));

  it('loads a prompt file and fills in user constants', () => {
    const result = getSystemPrompt('brief', options, undefined, { Username: 'Deponent' });

    expect(result.prompt).toBe('Summarize for Deponent.');
    expect(result.status).toBe(`Loaded prompt: ${options.brief}`);
  });

  it('uses the custom text as the prompt itself', () => {
    const result = getSystemPrompt('__custom__', options, 'Talk to {{Username}}.', { Username: 'Sam' });

    expect(result).toEqual({
      prompt: 'Talk to Sam.',
      status: 'Using custom prompt text from request.',
    });
  });

  it('rejects an unknown key with a 400', () => {
    expect(() => getSystemPrompt('poem', options)).toThrow(AppError);
    try {
      getSystemPrompt('poem', options);
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) expect(error.statusCode).toBe(400);
    }
  });

  it('fails when the prompt file is gone', () => {
    expect(() => getSystemPrompt('missing', options)).toThrow(
      `Failed to load system prompt: ${options.missing}`
    );
  });

  it('ships the built-in prompts', () => {
    for (const key of Object.keys(PROMPT_OPTIONS)) {
      expect(getSystemPrompt(key).prompt.length).toBeGreaterThan(0);
    }
    expect(listPromptKeys()).toEqual(['summary', 'dialogue', 'narration', '__custom__']);
  });
});
