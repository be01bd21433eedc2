import { BadGatewayError } from '../../utils/errors';
import type { SynthesisRequest, TtsEngine } from './tts.engine';

const EMPTY_AUDIO = 'TTS upstream returned empty audio';

export class UpstreamTtsEngine implements TtsEngine {
  readonly name = 'upstream';

  constructor(
    private readonly url: string,
    private readonly apiKey: string = ''
  ) {}

  private async fetchUpstream(request: SynthesisRequest): Promise<Response> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'audio/wav',
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ text: request.text, voice: request.voice?.voice_id ?? null }),
      });
    } catch (error) {
      throw new BadGatewayError(`TTS upstream unreachable: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!res.ok) {
      const maybeText = await res.text().catch(() => '');
      throw new BadGatewayError(`TTS upstream error (${res.status}): ${maybeText.slice(0, 200)}`);
    }
    return res;
  }

  async synthesize(request: SynthesisRequest): Promise<Buffer> {
    const res = await this.fetchUpstream(request);
    const buf = Buffer.from(await res.arrayBuffer());
    if (!buf.length) {
      throw new BadGatewayError(EMPTY_AUDIO);
    }
    return buf;
  }

  async *stream(request: SynthesisRequest): AsyncGenerator<Buffer> {
    const res = await this.fetchUpstream(request);
    const reader = res.body?.getReader();
    if (!reader) {
      throw new BadGatewayError(EMPTY_AUDIO);
    }

    let hasData = false;
    let finished = false;
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        const buf = Buffer.from(value);
        if (!buf.length) continue;
        hasData = true;
        yield buf;
      }
      finished = true;
    } finally {
      // Consumer stopped early (client gone or stream failed): stop pulling from upstream.
      if (!finished) {
        await reader.cancel().catch((err: unknown) => {
          console.warn('[tts] Failed to cancel upstream body:', err);
        });
      }
    }

    if (!hasData) {
      throw new BadGatewayError(EMPTY_AUDIO);
    }
  }
}
