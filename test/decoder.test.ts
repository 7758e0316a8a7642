import { describe, it, expect } from 'vitest';
import { Decoder, decodeBc3, decodeUtf8, decodeWindows1252, splitLines } from '../src/services/decoder.js';
import { DecodingError } from '../src/errors.js';
import { createRecordingLogger, toBc3Bytes } from './setup.js';

describe('Decoder', () => {
  it('returns no lines for an empty buffer', () => {
    expect(decodeBc3(new Uint8Array(0))).toEqual({ encoding: 'windows-1252', lines: [] });
  });

  it('reads single-byte accented text as windows-1252', () => {
    const decoded = decodeBc3(toBc3Bytes(['~V|SOFT|FIEBDC-3/2016|', '~C|A1|m2|Tabiquería cerámica|12,50']));
    expect(decoded.encoding).toBe('windows-1252');
    expect(decoded.lines).toEqual(['~V|SOFT|FIEBDC-3/2016|', '~C|A1|m2|Tabiquería cerámica|12,50']);
  });

  it('keeps the windows-1252 reading even when the bytes are also valid UTF-8', () => {
    const decoded = decodeBc3(Buffer.from('Señal', 'utf8'));
    expect(decoded.encoding).toBe('windows-1252');
    expect(decoded.lines).toEqual(['SeÃ±al']);
  });

  it('falls back to UTF-8 when a byte is undefined in windows-1252', () => {
    // "Á" is C3 81 in UTF-8, and 0x81 has no windows-1252 character
    const decoded = decodeBc3(Buffer.from('~C|A1|m3|ÁRIDO|4,10\n', 'utf8'));
    expect(decoded.encoding).toBe('utf-8');
    expect(decoded.lines).toEqual(['~C|A1|m3|ÁRIDO|4,10']);
  });

  it('throws DecodingError when no attempt succeeds', () => {
    const run = () => decodeBc3(new Uint8Array([0x41, 0x9d, 0xff]));
    expect(run).toThrow(DecodingError);
    try {
      run();
    } catch (err) {
      expect(err).toBeInstanceOf(DecodingError);
      if (err instanceof DecodingError) {
        expect(err.code).toBe('DECODING_FAILED');
        expect(err.attempts).toHaveLength(2);
        expect(err.message).toBe('The file encoding could not be determined. Please save it as UTF-8 or Windows-1252 (ANSI).');
      }
    }
  });

  it('never fails and yields lines for any non-empty windows-1252 buffer', () => {
    const defined = Array.from({ length: 256 }, (_, b) => b).filter(b => ![0x81, 0x8d, 0x8f, 0x90, 0x9d].includes(b));
    for (const b of defined) {
      const decoded = decodeBc3(new Uint8Array([b]));
      expect(decoded.encoding).toBe('windows-1252');
      expect(decoded.lines.length).toBeGreaterThan(0);
    }
    expect(decodeBc3(new Uint8Array(defined)).lines.length).toBeGreaterThan(0);
  });

  it('tries attempts in the order it was given', () => {
    const logger = createRecordingLogger();
    const decoded = new Decoder([decodeUtf8, decodeWindows1252], logger).decode(Buffer.from('Señal', 'utf8'));
    expect(decoded).toEqual({ encoding: 'utf-8', lines: ['Señal'] });
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });

  it('reports the offending byte when windows-1252 fails', () => {
    expect(decodeWindows1252(new Uint8Array([0x41, 0x8d]))).toEqual({
      ok: false, encoding: 'windows-1252', reason: 'byte 0x8d at offset 1 is undefined in windows-1252',
    });
  });
});

describe('splitLines', () => {
  it('breaks on CRLF, LF and bare CR', () => {
    expect(splitLines('a\r\nb\nc\rd')).toEqual(['a', 'b', 'c', 'd']);
  });

  it('does not add an empty line after a final line break', () => {
    expect(splitLines('a\r\n')).toEqual(['a']);
    expect(splitLines('\n')).toEqual(['']);
  });

  it('keeps blank lines in the middle', () => {
    expect(splitLines('a\n\nb')).toEqual(['a', '', 'b']);
  });

  it('returns nothing for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});
