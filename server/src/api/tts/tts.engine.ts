import config from '../../config';
import type { VoiceProfile } from '../voice/voice.cache';
import { SampleFileTtsEngine } from './tts.sample.engine';
import { UpstreamTtsEngine } from './tts.upstream.engine';

export type SynthesisRequest = {
  text: string;
  voice: VoiceProfile | null;
};

/**
 * External speech synthesizer. Both methods produce a complete WAV stream.
 * `stream` is pulled by the consumer; ending iteration early releases the engine's resources.
 */
export interface TtsEngine {
  readonly name: string;
  synthesize(request: SynthesisRequest): Promise<Buffer>;
  stream(request: SynthesisRequest): AsyncIterable<Buffer>;
}

export const createTtsEngine = (ttsConfig: typeof config.tts = config.tts): TtsEngine => {
  if (ttsConfig.engine === 'upstream') {
    return new UpstreamTtsEngine(ttsConfig.upstreamUrl, ttsConfig.upstreamApiKey);
  }
  return new SampleFileTtsEngine(ttsConfig.sampleFile);
};
