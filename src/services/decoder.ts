//Decoder: raw upload bytes → text lines
//attempts run in a fixed order and the first success wins, a later attempt never re-checks an earlier result
import type { DecodedFile, SupportedEncoding, TextLines } from '../models/index.js';
import { DecodingError } from '../errors.js';
import { childLogger, type ImportLogger } from '../logger.js';

export type DecodeAttempt =
  | { ok: true; encoding: SupportedEncoding; text: string }
  | { ok: false; encoding: SupportedEncoding; reason: string };

//positions the Windows-1252 code page leaves unassigned
const WINDOWS_1252_UNDEFINED = new Set([0x81, 0x8d, 0x8f, 0x90, 0x9d]);

export function decodeWindows1252(raw: Uint8Array): DecodeAttempt {
  const offset = raw.findIndex(b => WINDOWS_1252_UNDEFINED.has(b));
  if (offset !== -1) {
    return { ok: false, encoding: 'windows-1252', reason: `byte 0x${raw[offset]?.toString(16)} at offset ${offset} is undefined in windows-1252` };
  }
  return { ok: true, encoding: 'windows-1252', text: new TextDecoder('windows-1252').decode(raw) };
}

export function decodeUtf8(raw: Uint8Array): DecodeAttempt {
  try {
    return { ok: true, encoding: 'utf-8', text: new TextDecoder('utf-8', { fatal: true }).decode(raw) };
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    return { ok: false, encoding: 'utf-8', reason: err.message };
  }
}

export const DECODE_ATTEMPTS: readonly ((raw: Uint8Array) => DecodeAttempt)[] = [decodeWindows1252, decodeUtf8];

//\r\n, \n and bare \r all end a line; a final line break does not open an empty last line
export function splitLines(text: string): TextLines {
  if (text === '') return [];
  const lines = text.split(/\r\n|\n|\r/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export interface IDecoder {
  decode(raw: Uint8Array): DecodedFile;
}

export class Decoder implements IDecoder {
  constructor(
    private attempts: readonly ((raw: Uint8Array) => DecodeAttempt)[] = DECODE_ATTEMPTS,
    private log: ImportLogger = childLogger('decoder'),
  ) {}

  decode(raw: Uint8Array): DecodedFile {
    if (raw.length === 0) return { encoding: 'windows-1252', lines: [] };

    const failures: string[] = [];
    for (const attempt of this.attempts) {
      const result = attempt(raw);
      if (result.ok) {
        this.log.debug({ encoding: result.encoding, bytes: raw.length }, 'decoded BC3 file');
        return { encoding: result.encoding, lines: splitLines(result.text) };
      }
      this.log.debug({ encoding: result.encoding, reason: result.reason }, 'decode attempt failed');
      failures.push(`${result.encoding}: ${result.reason}`);
    }
    throw new DecodingError(failures);
  }
}

export function decodeBc3(raw: Uint8Array): DecodedFile {
  return new Decoder().decode(raw);
}
