export interface WavInfo {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  byteRate: number;
  bitsPerSample: number;
  dataBytes: number;
  duration: number;
}

export const RIFF_HEADER_BYTES = 12;
const CHUNK_HEADER_BYTES = 8;
const FMT_MIN_BYTES = 16;

/** True when the buffer opens with a RIFF/WAVE header. */
export const hasWavSignature = (buf: Buffer): boolean =>
  buf.length >= RIFF_HEADER_BYTES && buf.toString('ascii', 0, 4) === 'RIFF' && buf.toString('ascii', 8, 12) === 'WAVE';

/**
 * Reads the `fmt ` and `data` chunks of a RIFF/WAVE buffer.
 * Returns null when the buffer is not a WAV file or misses either chunk.
 * A `data` chunk that claims more bytes than are present is clamped to what is there.
 */
export const parseWavHeader = (buf: Buffer): WavInfo | null => {
  if (!hasWavSignature(buf)) return null;

  let fmt: Omit<WavInfo, 'dataBytes' | 'duration'> | null = null;
  let dataBytes: number | null = null;
  let offset = RIFF_HEADER_BYTES;

  while (offset + CHUNK_HEADER_BYTES <= buf.length) {
    const id = buf.toString('ascii', offset, offset + 4);
    const size = buf.readUInt32LE(offset + 4);
    const body = offset + CHUNK_HEADER_BYTES;

    if (id === 'fmt ') {
      if (size < FMT_MIN_BYTES || body + FMT_MIN_BYTES > buf.length) return null;
      fmt = {
        audioFormat: buf.readUInt16LE(body),
        channels: buf.readUInt16LE(body + 2),
        sampleRate: buf.readUInt32LE(body + 4),
        byteRate: buf.readUInt32LE(body + 8),
        bitsPerSample: buf.readUInt16LE(body + 14),
      };
    } else if (id === 'data') {
      dataBytes = Math.min(size, buf.length - body);
      break;
    }

    // chunks are word aligned
    offset = body + size + (size % 2);
  }

  if (!fmt || dataBytes === null || fmt.byteRate === 0 || fmt.channels === 0) return null;

  return {
    ...fmt,
    dataBytes,
    duration: Math.round((dataBytes / fmt.byteRate) * 1000) / 1000,
  };
};
