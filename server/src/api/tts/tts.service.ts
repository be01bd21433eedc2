import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { nanoid } from 'nanoid';
import config from '../../config';
import { BadGatewayError, BadRequestError, NotFoundError } from '../../utils/errors';
import { RIFF_HEADER_BYTES, hasWavSignature, parseWavHeader } from '../../utils/wav';
import { voiceService } from '../voice/voice.service';
import { voiceProcessor } from '../voice/voice.processor';
import type { VoiceProfile } from '../voice/voice.cache';
import { createTtsEngine, type SynthesisRequest, type TtsEngine } from './tts.engine';

export type GenerateSpeechInput = {
  text: string;
  voiceId?: string;
};

export type GeneratedSpeech = {
  audio_url: string;
  duration: number;
  text: string;
};

const OUTPUT_FILENAME_PATTERN = /^[A-Za-z0-9_-]+\.wav$/;

const INVALID_WAV = 'TTS engine returned invalid WAV audio';

async function* resume(head: Buffer, rest: AsyncIterator<Buffer>): AsyncGenerator<Buffer> {
  try {
    yield head;
    while (true) {
      const next = await rest.next();
      if (next.done) return;
      yield next.value;
    }
  } finally {
    await rest.return?.();
  }
}

export const downloadUrlFor = (filename: string) => `${config.apiPrefix}/tts/download/${filename}`;

export const createTtsService = (engine: TtsEngine, outputDir: string = config.tts.outputDir) => ({
  engine,

  async resolveVoice(userId: string, voiceId?: string): Promise<VoiceProfile | null> {
    if (!voiceId) return null;

    const voice = await voiceService.getOwned(userId, voiceId);
    if (voice.status !== 'ready') {
      throw new BadRequestError('Voice is not ready');
    }
    const profile = await voiceProcessor.getProfile(voice);
    if (!profile) {
      throw new BadRequestError('Voice is not ready');
    }
    return profile;
  },

  async buildRequest(userId: string, input: GenerateSpeechInput): Promise<SynthesisRequest> {
    return { text: input.text, voice: await this.resolveVoice(userId, input.voiceId) };
  },

  /** Synthesizes into the output directory and describes where to download it. */
  async generate(userId: string, input: GenerateSpeechInput): Promise<GeneratedSpeech> {
    const request = await this.buildRequest(userId, input);
    const audio = await engine.synthesize(request);

    const wav = parseWavHeader(audio);
    if (!wav) {
      throw new BadGatewayError(INVALID_WAV);
    }

    const filename = `${userId}_${nanoid()}.wav`;
    await fs.promises.mkdir(outputDir, { recursive: true });
    await fs.promises.writeFile(path.join(outputDir, filename), audio);

    return { audio_url: downloadUrlFor(filename), duration: wav.duration, text: input.text };
  },

  /**
   * Starts the engine and waits for the RIFF header, so engine failures and non-WAV
   * output surface before any response headers are sent. The returned stream pulls
   * the rest on demand; destroying it stops the engine.
   */
  async openStream(request: SynthesisRequest): Promise<Readable> {
    const chunks = engine.stream(request)[Symbol.asyncIterator]();
    const head: Buffer[] = [];
    let headBytes = 0;

    while (headBytes < RIFF_HEADER_BYTES) {
      const next = await chunks.next();
      if (next.done) break;
      head.push(next.value);
      headBytes += next.value.length;
    }

    const first = Buffer.concat(head);
    if (!hasWavSignature(first)) {
      await chunks.return?.();
      throw new BadGatewayError(INVALID_WAV);
    }
    return Readable.from(resume(first, chunks), { objectMode: false });
  },

  /** Absolute path of a generated file owned by the user. */
  async resolveDownload(userId: string, filename: string): Promise<string> {
    if (!OUTPUT_FILENAME_PATTERN.test(filename) || !filename.startsWith(`${userId}_`)) {
      throw new NotFoundError('Audio file not found');
    }

    const filePath = path.resolve(outputDir, filename);
    const stat = await fs.promises.stat(filePath).catch(() => null);
    if (!stat || !stat.isFile()) {
      throw new NotFoundError('Audio file not found');
    }
    return filePath;
  },
});

export type TtsService = ReturnType<typeof createTtsService>;

export const ttsService = createTtsService(createTtsEngine());
