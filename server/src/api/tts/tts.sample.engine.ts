import fs from 'fs';
import path from 'path';
import { ServiceUnavailableError } from '../../utils/errors';
import type { SynthesisRequest, TtsEngine } from './tts.engine';

const CHUNK_BYTES = 64 * 1024;

// Answers every request with the same WAV file; stands in until a real engine is configured.
export class SampleFileTtsEngine implements TtsEngine {
  readonly name = 'sample';
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  private async readSample(): Promise<Buffer> {
    try {
      return await fs.promises.readFile(this.filePath);
    } catch (error) {
      console.error(`[tts] Cannot read sample audio ${this.filePath}:`, error);
      throw new ServiceUnavailableError('Example audio file not found');
    }
  }

  async synthesize(_request: SynthesisRequest): Promise<Buffer> {
    return this.readSample();
  }

  async *stream(_request: SynthesisRequest): AsyncGenerator<Buffer> {
    const audio = await this.readSample();
    for (let offset = 0; offset < audio.length; offset += CHUNK_BYTES) {
      yield audio.subarray(offset, offset + CHUNK_BYTES);
    }
  }
}
