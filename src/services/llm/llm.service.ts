import axios from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { NO_MODEL } from '../../config/constants';
import { errorDetails, upstreamError } from '../../utils/http-error';

interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      })
    )
    .min(1),
  usage: z
    .object({
      total_tokens: z.number().nullish(),
    })
    .nullish(),
});

export interface GenerateTextParams {
  /** Model name; `no_model` returns `text` unchanged */
  model: string;
  systemPrompt: string;
  text: string;
}

/** What the narration workflow needs from a language model. */
export interface TextGenerator {
  generate(params: GenerateTextParams): Promise<string>;
}

/**
 * Parse a chat completion body and return the first choice's text.
 */
export function parseChatCompletion(body: unknown): string {
  const parsed = ChatCompletionSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Unexpected LLM response: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }

  const content = parsed.data.choices[0].message.content?.trim();
  if (!content) {
    throw new Error('No content generated by the LLM');
  }
  return content;
}

class LLMService implements TextGenerator {
  private apiUrl: string;
  private apiKey: string;

  constructor() {
    this.apiUrl = process.env.LLM_API_URL || 'http://localhost:11434/v1/chat/completions';
    this.apiKey = process.env.LLM_API_KEY || '';
  }

  /**
   * Rewrite document text with the given system prompt.
   */
  async generate({ model, systemPrompt, text }: GenerateTextParams): Promise<string> {
    if (model === NO_MODEL) {
      logger.info('No model selected. Using document text directly.');
      return text;
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: systemPrompt },
      { role: 'user', content: text },
    ];

    logger.info('Sending text to LLM', { model, textLength: text.length });

    let body: unknown;
    try {
      const response = await axios.post<unknown>(
        this.apiUrl,
        { model, messages, stream: false },
        {
          headers: {
            'Content-Type': 'application/json',
            ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
          },
          timeout: 600000,
        }
      );
      body = response.data;
    } catch (error: unknown) {
      logger.error('Error communicating with the LLM', { ...errorDetails(error), model });
      throw upstreamError('LLM', 'generate text', error);
    }

    const content = parseChatCompletion(body);
    logger.info('LLM response received', { model, length: content.length });
    return content;
  }
}

export { LLMService };
export default new LLMService();
