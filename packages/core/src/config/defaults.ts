// packages/core/src/config/defaults.ts
const ascii = (s: string): Uint8Array => Uint8Array.from(s, c => c.charCodeAt(0));

/** "CTENFDAM" read as a little-endian u64. */
export const NCM_MAGIC = 0x4d41_4446_4e45_5443n;

/** magic (8) + reserved (2) */
export const HEADER_SIZE = 10;
/** CRC32 (4) + reserved (5) between the info and image blocks */
export const INFO_IMAGE_GAP = 9;

export const KEY_XOR  = 0x64;
export const INFO_XOR = 0x63;

/** AES-128 key that unwraps the key block. */
export const HEADER_KEY = ascii('hzHRAmso5kInbaxW');
/** AES-128 key that unwraps the metadata block. */
export const INFO_KEY   = ascii("#14ljk_!\\]&0U<'(");

/** "neteasecloudmusic" prefix of the decrypted key block */
export const KEY_TAG_LENGTH        = 17;
/** "163 key(Don't modify):" prefix of the deobfuscated info block */
export const INFO_TAG_LENGTH       = 22;
/** "music:" prefix of the decrypted info JSON */
export const INFO_PLAIN_TAG_LENGTH = 6;

/** Audio is deciphered in windows of this size; windows carry no state. */
export const AUDIO_WINDOW = 0x8000;
