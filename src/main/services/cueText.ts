/**
 * CUE Sheet Text Decoding
 *
 * CUE sheets ripped on older systems are often written in a legacy
 * single-byte code page. Decoding walks a prioritized candidate list and
 * returns the first strict success, falling back to a lossy decode.
 */

import * as fs from 'fs';
import { isUtf8 } from 'buffer';
import * as iconv from 'iconv-lite';

/** Encodings the decoder knows how to try */
export type CueEncoding = 'utf-8' | 'windows-1252' | 'iso-8859-1';

/** Default candidate order */
export const CUE_ENCODINGS: readonly CueEncoding[] = ['utf-8', 'windows-1252', 'iso-8859-1'];

/** Result of decoding CUE bytes */
export interface DecodedCueText {
  text: string;
  /** Encoding that produced `text`; 'binary' when no candidate was given */
  encoding: CueEncoding | 'binary';
  /** True when invalid sequences were dropped */
  lossy: boolean;
}

const REPLACEMENT_CHAR = /\uFFFD/g;
const UTF8_BOM = '\uFEFF';

function stripBom(text: string): string {
  return text.startsWith(UTF8_BOM) ? text.slice(1) : text;
}

function decodeWith(bytes: Buffer, encoding: CueEncoding): string {
  if (encoding === 'utf-8') {
    return stripBom(bytes.toString('utf8'));
  }
  return iconv.decode(bytes, encoding);
}

/**
 * Decodes without loss, or returns null if the bytes are not valid in
 * `encoding`. windows-1252 leaves five byte values undefined; iconv-lite
 * maps them to U+FFFD, which is treated as invalid input here.
 */
function decodeStrict(bytes: Buffer, encoding: CueEncoding): string | null {
  if (encoding === 'utf-8') {
    return isUtf8(bytes) ? decodeWith(bytes, encoding) : null;
  }
  const text = decodeWith(bytes, encoding);
  if (encoding === 'windows-1252' && text.includes('\uFFFD')) {
    return null;
  }
  return text;
}

/**
 * Decodes CUE sheet bytes using the first candidate encoding that accepts
 * them. If none does, the first candidate is applied with invalid
 * sequences dropped. With no candidates the bytes map one-to-one to
 * characters.
 *
 * @param bytes - Raw file contents
 * @param encodings - Candidates in priority order
 */
export function decodeCueBytes(
  bytes: Buffer,
  encodings: readonly CueEncoding[] = CUE_ENCODINGS,
): DecodedCueText {
  for (const encoding of encodings) {
    const text = decodeStrict(bytes, encoding);
    if (text !== null) {
      return { text, encoding, lossy: false };
    }
  }

  if (encodings.length > 0) {
    const encoding = encodings[0];
    return {
      text: decodeWith(bytes, encoding).replace(REPLACEMENT_CHAR, ''),
      encoding,
      lossy: true,
    };
  }

  return { text: bytes.toString('latin1'), encoding: 'binary', lossy: false };
}

/**
 * Reads a CUE sheet and decodes it. The file is only read.
 *
 * @throws Error if the file cannot be read
 */
export async function decodeCueText(
  cuePath: string,
  encodings: readonly CueEncoding[] = CUE_ENCODINGS,
): Promise<DecodedCueText> {
  const bytes = await fs.promises.readFile(cuePath);
  return decodeCueBytes(bytes, encodings);
}
