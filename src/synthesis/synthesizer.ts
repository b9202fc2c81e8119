/**
 * Newscast — Speech Synthesizer
 *
 * Text-to-speech collaborator. The pipeline only depends on the
 * SpeechSynthesizer interface; the OpenAI implementation is the default.
 */

import OpenAI from 'openai';
import type { SpeechVoice } from '../config';

export interface SynthesisOptions {
  voice: SpeechVoice;
}

export interface SpeechSynthesizer {
  /**
   * Produce MP3 audio for the given text.
   */
  synthesize(text: string, options: SynthesisOptions): Promise<Uint8Array>;
}

export interface OpenAISynthesizerConfig {
  apiKey?: string;
  model: string;
}

/**
 * Synthesizer backed by the OpenAI speech endpoint.
 * The client is created on first use, so a missing key only fails
 * when something actually needs to be voiced.
 */
export class OpenAISpeechSynthesizer implements SpeechSynthesizer {
  private client: OpenAI | null = null;

  constructor(private readonly config: OpenAISynthesizerConfig) {}

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new Error('OPENAI_API_KEY environment variable is missing or empty');
      }
      this.client = new OpenAI({ apiKey: this.config.apiKey });
    }
    return this.client;
  }

  async synthesize(text: string, options: SynthesisOptions): Promise<Uint8Array> {
    const response = await this.getClient().audio.speech.create({
      model: this.config.model,
      voice: options.voice,
      input: text,
      response_format: 'mp3',
    });
    return new Uint8Array(await response.arrayBuffer());
  }
}
