// packages/core/src/metadata/info.ts
import {
  INFO_KEY,
  INFO_PLAIN_TAG_LENGTH,
  INFO_TAG_LENGTH,
  INFO_XOR,
} from '../config/defaults.js';
import { aes128EcbDecrypt } from '../crypto/aesEcb.js';
import { InfoDecodeError } from '../errors/index.js';
import { base64Decode, xorBytes } from '../util/bytes.js';
import type { ArtistEntry, NcmInfo } from '../types/index.js';

const asciiDecoder = new TextDecoder('utf-8');
const utf8Decoder  = new TextDecoder('utf-8', { fatal: true });

type Json = Record<string, unknown>;

function isRecord(v: unknown): v is Json {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isUint(v: unknown): v is number {
  return typeof v === 'number' && Number.isSafeInteger(v) && v >= 0;
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every(s => typeof s === 'string');
}

function isArtistEntry(v: unknown): v is ArtistEntry {
  return Array.isArray(v) && v.length === 2 && typeof v[0] === 'string' && isUint(v[1]);
}

function required<T>(obj: Json, key: string, guard: (v: unknown) => v is T): T {
  const v = obj[key];
  if (!guard(v)) throw new InfoDecodeError(`Metadata field "${key}" missing or mistyped`);
  return v;
}

/** `undefined` for absent/null, otherwise the value must pass `guard`. */
function optional<T>(obj: Json, key: string, guard: (v: unknown) => v is T): T | undefined {
  const v = obj[key];
  if (v === undefined || v === null) return undefined;
  if (!guard(v)) throw new InfoDecodeError(`Metadata field "${key}" mistyped`);
  return v;
}

/**
 * Map the on-wire JSON object onto {@link NcmInfo}. Unknown keys are ignored.
 * @throws {InfoDecodeError} on missing or mistyped fields.
 */
export function parseInfo(json: unknown): NcmInfo {
  if (!isRecord(json)) throw new InfoDecodeError('Metadata is not a JSON object');

  const info: NcmInfo = {
    name    : required(json, 'musicName', (v): v is string => typeof v === 'string'),
    id      : required(json, 'musicId', isUint),
    album   : required(json, 'album', (v): v is string => typeof v === 'string'),
    artist  : required(json, 'artist', (v): v is ArtistEntry[] => Array.isArray(v) && v.every(isArtistEntry)),
    bitrate : required(json, 'bitrate', isUint),
    duration: required(json, 'duration', isUint),
    format  : required(json, 'format', (v): v is string => typeof v === 'string'),
  };

  const mvId       = optional(json, 'mvId', isUint);
  const alias      = optional(json, 'alias', isStringArray);
  const albumId    = optional(json, 'albumId', isUint);
  const albumPic   = optional(json, 'albumPic', (v): v is string => typeof v === 'string');
  const transNames = optional(json, 'transNames', isStringArray);

  if (mvId       !== undefined) info.mvId       = mvId;
  if (alias      !== undefined) info.alias      = alias;
  if (albumId    !== undefined) info.albumId    = albumId;
  if (albumPic   !== undefined) info.albumPic   = albumPic;
  if (transNames !== undefined) info.transNames = transNames;
  return info;
}

/**
 * Full metadata chain for the raw info block:
 * XOR → drop tag → base64 → AES-ECB → drop "music:" → UTF-8 → JSON.
 *
 * @throws {InfoDecodeError} for any failure along the way.
 */
export function decodeInfoBlock(block: Uint8Array): NcmInfo {
  if (block.length < INFO_TAG_LENGTH) {
    throw new InfoDecodeError(`Info block too short (${block.length} bytes)`);
  }

  let plain: Uint8Array;
  try {
    const text = asciiDecoder.decode(xorBytes(block, INFO_XOR).subarray(INFO_TAG_LENGTH));
    plain = aes128EcbDecrypt(base64Decode(text), INFO_KEY);
  } catch (err) {
    throw new InfoDecodeError(err instanceof Error ? err.message : String(err));
  }

  if (plain.length < INFO_PLAIN_TAG_LENGTH) {
    throw new InfoDecodeError(`Decrypted info too short (${plain.length} bytes)`);
  }

  let json: unknown;
  try {
    json = JSON.parse(utf8Decoder.decode(plain.subarray(INFO_PLAIN_TAG_LENGTH)));
  } catch (err) {
    throw new InfoDecodeError(
      `Metadata is not valid UTF-8 JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseInfo(json);
}
