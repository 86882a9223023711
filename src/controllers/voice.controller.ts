import { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import { DEFAULT_VOICE, VOICE_CATALOG } from '../services/voice/voice-catalog';
import orpheusService from '../services/tts/orpheus.service';

/**
 * Get the voices the TTS server offers
 */
export const getVoices = asyncHandler(async (req: Request, res: Response) => {
  res.json({
    success: true,
    data: {
      provider: orpheusService.provider,
      configured: orpheusService.isConfigured(),
      defaultVoice: DEFAULT_VOICE,
      voices: VOICE_CATALOG,
    },
  });
});
