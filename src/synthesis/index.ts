/**
 * Newscast — Synthesis Module
 */

export {
  OpenAISpeechSynthesizer,
  type SpeechSynthesizer,
  type SynthesisOptions,
  type OpenAISynthesizerConfig,
} from './synthesizer';

export { synthesizeAll, type SynthesisReport, type SynthesisRunConfig } from './runner';
