import type { AudioChunk, AudioFormat } from "../../domain/protocol/events";

/** What Porcupine consumes: 16 kHz, 16-bit signed little-endian, mono. */
export const DETECTOR_AUDIO_FORMAT: AudioFormat = { rate: 16000, width: 2, channels: 1 };

const SUPPORTED_WIDTHS = new Set([1, 2, 3, 4]);

/**
 * Converts a stream of audio chunks to a fixed PCM format.
 *
 * One instance per audio stream: an incomplete sample frame and the
 * resampler's read position are carried from one chunk to the next, so the
 * output does not depend on how the client split its audio. A change of
 * source format starts over.
 */
export class PcmConverter {
  private sourceKey: string | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private resampler: LinearResampler | null = null;

  constructor(private readonly target: AudioFormat = DETECTOR_AUDIO_FORMAT) {
    assertWidth(target.width);
  }

  convert(chunk: AudioChunk): AudioChunk {
    const { rate, width, channels } = this.target;
    if (chunk.rate === rate && chunk.width === width && chunk.channels === channels) {
      return chunk;
    }
    assertWidth(chunk.width);

    const key = `${chunk.rate}/${chunk.width}/${chunk.channels}`;
    if (key !== this.sourceKey) {
      this.sourceKey = key;
      this.pending = Buffer.alloc(0);
      this.resampler = chunk.rate === rate ? null : new LinearResampler(chunk.rate, rate, channels);
    }

    const input = this.pending.length ? Buffer.concat([this.pending, chunk.audio]) : chunk.audio;
    const frameBytes = chunk.width * chunk.channels;
    const whole = input.length - (input.length % frameBytes);
    this.pending = Buffer.from(input.subarray(whole));

    let samples = decodeSamples(input.subarray(0, whole), chunk.width, chunk.channels);
    samples = remixChannels(samples, chunk.channels, channels);
    if (this.resampler) samples = this.resampler.push(samples);

    return {
      rate,
      width,
      channels,
      timestamp: chunk.timestamp,
      audio: encodeSamples(samples, width),
    };
  }
}

/**
 * Streaming linear interpolation. Output frame `n` sits at input position
 * `n * fromRate / toRate`; it is produced once both neighbouring input
 * frames have arrived.
 */
class LinearResampler {
  private readonly ratio: number;
  private produced = 0;
  /** Absolute index of the first frame in `held`. */
  private heldStart = 0;
  private held: Float64Array = new Float64Array(0);

  constructor(fromRate: number, toRate: number, private readonly channels: number) {
    this.ratio = fromRate / toRate;
  }

  push(samples: Float64Array): Float64Array {
    const { channels } = this;
    const frames = new Float64Array(this.held.length + samples.length);
    frames.set(this.held);
    frames.set(samples, this.held.length);
    const frameCount = frames.length / channels;

    const out: number[] = [];
    for (;;) {
      const position = this.produced * this.ratio;
      const lower = Math.floor(position);
      const fraction = position - lower;
      const local = lower - this.heldStart;
      if (local >= frameCount || (fraction > 0 && local + 1 >= frameCount)) break;

      for (let c = 0; c < channels; c++) {
        const a = frames[local * channels + c];
        out.push(fraction > 0 ? a * (1 - fraction) + frames[(local + 1) * channels + c] * fraction : a);
      }
      this.produced++;
    }

    const keepFrom = Math.min(Math.floor(this.produced * this.ratio), this.heldStart + frameCount);
    this.held = frames.slice((keepFrom - this.heldStart) * channels);
    this.heldStart = keepFrom;
    return Float64Array.from(out);
  }
}

/** Interleaved samples normalised to [-1, 1). Trailing partial frames are dropped. */
function decodeSamples(audio: Buffer, width: number, channels: number): Float64Array {
  const frameBytes = width * channels;
  const count = Math.floor(audio.length / frameBytes) * channels;
  const out = new Float64Array(count);
  for (let i = 0; i < count; i++) {
    const offset = i * width;
    switch (width) {
      case 1:
        out[i] = (audio.readUInt8(offset) - 128) / 128;
        break;
      case 2:
        out[i] = audio.readInt16LE(offset) / 32768;
        break;
      case 3:
        out[i] = audio.readIntLE(offset, 3) / 8388608;
        break;
      default:
        out[i] = audio.readInt32LE(offset) / 2147483648;
        break;
    }
  }
  return out;
}

function encodeSamples(samples: Float64Array, width: number): Buffer {
  const out = Buffer.alloc(samples.length * width);
  for (let i = 0; i < samples.length; i++) {
    const value = Math.max(-1, Math.min(1, samples[i]));
    const offset = i * width;
    switch (width) {
      case 1:
        out.writeUInt8(clampInt(Math.round(value * 128) + 128, 0, 255), offset);
        break;
      case 2:
        out.writeInt16LE(clampInt(Math.round(value * 32768), -32768, 32767), offset);
        break;
      case 3:
        out.writeIntLE(clampInt(Math.round(value * 8388608), -8388608, 8388607), offset, 3);
        break;
      default:
        out.writeInt32LE(clampInt(Math.round(value * 2147483648), -2147483648, 2147483647), offset);
        break;
    }
  }
  return out;
}

function remixChannels(samples: Float64Array, from: number, to: number): Float64Array {
  if (from === to) return samples;
  const frames = samples.length / from;
  const out = new Float64Array(frames * to);
  for (let f = 0; f < frames; f++) {
    let sum = 0;
    for (let c = 0; c < from; c++) sum += samples[f * from + c];
    const mixed = sum / from;
    for (let c = 0; c < to; c++) {
      // mono to N duplicates; N to M averages then duplicates
      out[f * to + c] = from === 1 ? samples[f] : mixed;
    }
  }
  return out;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function assertWidth(width: number) {
  if (!SUPPORTED_WIDTHS.has(width)) {
    throw new RangeError(`Unsupported sample width: ${width} bytes`);
  }
}
