/**
 * PCM16 helpers
 * All audio in the engine is mono, signed 16-bit little-endian.
 */

import type { AudioFrame } from '../types/index.js';

/** Root-mean-square amplitude of a frame */
export function rms(frame: AudioFrame): number {
  if (frame.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < frame.length; i++) {
    sum += frame[i] * frame[i];
  }
  return Math.sqrt(sum / frame.length);
}

export function durationMs(samples: number, sampleRate: number): number {
  return (samples / sampleRate) * 1000;
}

export function concatFrames(frames: AudioFrame[]): AudioFrame {
  const total = frames.reduce((n, f) => n + f.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const frame of frames) {
    out.set(frame, offset);
    offset += frame.length;
  }
  return out;
}

/** Linear-interpolation resampler, good enough for speech */
export function resample(pcm: AudioFrame, fromRate: number, toRate: number): AudioFrame {
  if (fromRate === toRate || pcm.length === 0) return pcm;
  const outLength = Math.round((pcm.length * toRate) / fromRate);
  const out = new Int16Array(outLength);
  const ratio = fromRate / toRate;
  for (let i = 0; i < outLength; i++) {
    const pos = i * ratio;
    const left = Math.floor(pos);
    const right = Math.min(left + 1, pcm.length - 1);
    const t = pos - left;
    out[i] = Math.round(pcm[left] * (1 - t) + pcm[right] * t);
  }
  return out;
}

export function pcmToBuffer(pcm: AudioFrame): Buffer {
  const buf = Buffer.alloc(pcm.length * 2);
  for (let i = 0; i < pcm.length; i++) {
    buf.writeInt16LE(pcm[i], i * 2);
  }
  return buf;
}

/** Decode little-endian bytes; a trailing odd byte is ignored */
export function pcmFromBytes(bytes: Uint8Array): AudioFrame {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out = new Int16Array(Math.floor(buf.length / 2));
  for (let i = 0; i < out.length; i++) {
    out[i] = buf.readInt16LE(i * 2);
  }
  return out;
}

/** Wrap PCM in a 44-byte RIFF/WAVE header */
export function encodeWav(pcm: AudioFrame, sampleRate: number): Buffer {
  const data = pcmToBuffer(pcm);
  const header = Buffer.alloc(44);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + data.length, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);            // fmt chunk size
  header.writeUInt16LE(1, 20);             // PCM
  header.writeUInt16LE(1, 22);             // mono
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * 2, 28); // byte rate
  header.writeUInt16LE(2, 32);             // block align
  header.writeUInt16LE(16, 34);            // bits per sample
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(data.length, 40);
  return Buffer.concat([header, data]);
}
