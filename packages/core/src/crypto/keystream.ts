import { AUDIO_WINDOW } from '../config/defaults.js';
import type { KeyBox } from './KeyBox.js';

/**
 * The keystream only depends on `(p + 1) & 0xff`, so one 256-byte period
 * covers the whole payload. Index `j` holds the byte for positions where
 * `(p + 1) & 0xff === j`.
 */
export function keystreamPeriod(keyBox: KeyBox): Uint8Array {
  const ks = new Uint8Array(256);
  for (let j = 0; j < 256; j++) {
    const a = keyBox.at(j);
    ks[j] = keyBox.at((a + keyBox.at((a + j) & 0xff)) & 0xff);
  }
  return ks;
}

/**
 * XOR `data` with the audio keystream. Self-inverse.
 *
 * @param offset - payload-relative position of `data[0]`, for slices that do
 *   not start at the beginning of the audio block.
 */
export function decryptAudio(data: Uint8Array, keyBox: KeyBox, offset = 0): Uint8Array {
  const ks  = keystreamPeriod(keyBox);
  const out = new Uint8Array(data.length);

  for (let win = 0; win < data.length; win += AUDIO_WINDOW) {
    const end = Math.min(win + AUDIO_WINDOW, data.length);
    for (let i = win; i < end; i++) {
      out[i] = data[i] ^ ks[(offset + i + 1) & 0xff];
    }
  }
  return out;
}
