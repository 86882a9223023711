import axios from 'axios';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import { errorDetails, upstreamError } from '../../utils/http-error';
import type { VoiceId } from '../../types/narration.types';
import type {
  ISpeechSynthesizer,
  SynthesisOptions,
  SynthesisResult,
} from './tts-provider.interface';

// ===========================================================================
// Orpheus TTS client
//
// Talks to an OpenAI-compatible /v1/audio/speech endpoint serving the
// Orpheus model and stores each response as a WAV file.
// ===========================================================================

class OrpheusService implements ISpeechSynthesizer {
  readonly provider = 'orpheus';

  private endpoint: string;
  private model: string;
  private outputDir: string;
  private timeoutMs: number;

  constructor() {
    this.endpoint = process.env.TTS_ENDPOINT || 'http://localhost:5005/v1/audio/speech';
    this.model = process.env.TTS_MODEL || 'orpheus-tts';
    this.outputDir = path.resolve(process.cwd(), process.env.OUTPUT_DIR || 'output');
    this.timeoutMs = 500000;
  }

  isConfigured(): boolean {
    return this.endpoint.length > 0;
  }

  /**
   * Generate speech audio for one chunk
   */
  async generateSpeech(text: string, voice: VoiceId, options: SynthesisOptions = {}): Promise<Buffer> {
    const { speed = 1, onProgress } = options;

    logger.info(`Requesting audio from Orpheus for voice '${voice}'`, {
      textLength: text.length,
      model: this.model,
    });

    try {
      const response = await axios.post<ArrayBuffer>(
        this.endpoint,
        {
          input: text,
          model: this.model,
          voice: voice.toLowerCase(),
          response_format: 'wav',
          speed,
        },
        {
          headers: { 'Content-Type': 'application/json' },
          responseType: 'arraybuffer',
          timeout: this.timeoutMs,
          onDownloadProgress: (event) => {
            if (onProgress && event.total) {
              onProgress(Math.min(Math.floor((100 * event.loaded) / event.total), 99));
            }
          },
        }
      );

      onProgress?.(100);
      return Buffer.from(response.data);
    } catch (error: unknown) {
      logger.error(`Error generating speech for voice '${voice}'`, errorDetails(error));
      throw upstreamError('Orpheus TTS', 'generate speech', error);
    }
  }

  /**
   * Generate speech and save it as OUTPUT_DIR/tts_<uuid>.wav
   */
  async synthesizeToFile(
    text: string,
    voice: VoiceId,
    options: SynthesisOptions = {}
  ): Promise<SynthesisResult> {
    const audioBuffer = await this.generateSpeech(text, voice, options);

    fs.mkdirSync(this.outputDir, { recursive: true });
    const filePath = path.join(this.outputDir, `tts_${uuidv4().replace(/-/g, '')}.wav`);
    fs.writeFileSync(filePath, audioBuffer);

    logger.info(`Audio generated and saved to: ${filePath}`, { bytes: audioBuffer.length });

    return { filePath, bytes: audioBuffer.length, voice };
  }
}

export { OrpheusService };
export default new OrpheusService();
