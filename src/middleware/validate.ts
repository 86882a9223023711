import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { AppError } from './errorHandler';
import { MAX_CHUNK_LENGTH, MAX_PHRASE_LEN_LIMIT, REPEAT_DETECTION_DEFAULTS } from '../config/constants';

export const validate = (schema: Joi.ObjectSchema) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { error, value } = schema.validate(req.body, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const errorMessage = error.details
        .map((detail) => detail.message)
        .join(', ');
      throw new AppError(errorMessage, 400);
    }

    // Replace request body with validated value
    req.body = value;
    next();
  };
};

const voiceList = Joi.array()
  .items(
    Joi.string().min(1),
    Joi.object({
      name: Joi.string().min(1).required(),
      gender: Joi.string().valid('male', 'female', 'neutral').optional(),
      description: Joi.string().optional(),
    })
  )
  .optional();

const word = Joi.object({
  text: Joi.string().allow('').required(),
  start: Joi.number().min(0).required(),
  end: Joi.number().min(Joi.ref('start')).required(),
});

export const schemas = {
  previewChunks: Joi.object({
    text: Joi.string().allow('').required(),
    voice: Joi.string().min(1).required(),
    voices: voiceList,
    maxLength: Joi.number().integer().min(1).default(MAX_CHUNK_LENGTH),
  }),

  createNarration: Joi.object({
    text: Joi.string().min(1),
    documentPath: Joi.string().min(1),
    model: Joi.string().min(1).required(),
    promptKey: Joi.string().min(1).required(),
    customPrompt: Joi.string().allow('').optional(),
    voice: Joi.string().min(1).required(),
    voices: voiceList,
    skipTts: Joi.boolean().default(false),
    maxLength: Joi.number().integer().min(1).default(MAX_CHUNK_LENGTH),
  }).xor('text', 'documentPath'),

  detectRepeats: Joi.object({
    words: Joi.array().items(word).required(),
    minWords: Joi.number().integer().min(1).default(REPEAT_DETECTION_DEFAULTS.minWords),
    maxPhraseLen: Joi.number().integer().min(1).max(MAX_PHRASE_LEN_LIMIT).default(REPEAT_DETECTION_DEFAULTS.maxPhraseLen),
    maxGapMs: Joi.number().min(0).default(REPEAT_DETECTION_DEFAULTS.maxGapMs),
  }),
};
