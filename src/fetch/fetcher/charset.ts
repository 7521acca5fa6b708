const DEFAULT_CHARSET = 'utf-8';
const SNIFF_BYTES = 8_192;

const BOM_SIGNATURES: readonly { bytes: readonly number[]; charset: string }[] = [
  { bytes: [0xef, 0xbb, 0xbf], charset: 'utf-8' },
  { bytes: [0xff, 0xfe], charset: 'utf-16le' },
  { bytes: [0xfe, 0xff], charset: 'utf-16be' },
];

export type CharsetSource = 'header' | 'bom' | 'document' | 'default';

export interface ResolvedCharset {
  /** Canonical encoding name as reported by TextDecoder. */
  charset: string;
  source: CharsetSource;
}

/** Canonical name for `label`, or undefined when TextDecoder does not know it. */
export function canonicalCharset(label: string | undefined): string | undefined {
  const trimmed = label?.trim().replace(/^["']|["']$/g, '');
  if (!trimmed) return undefined;
  try {
    return new TextDecoder(trimmed).encoding;
  } catch {
    return undefined;
  }
}

export function charsetFromContentType(contentType: string | null): string | undefined {
  if (!contentType) return undefined;
  const match = /charset\s*=\s*("[^"]*"|[^;\s]+)/i.exec(contentType);
  return match?.[1];
}

function bomCharset(body: Uint8Array): string | undefined {
  for (const { bytes, charset } of BOM_SIGNATURES) {
    if (body.length >= bytes.length && bytes.every((byte, i) => body[i] === byte)) {
      return charset;
    }
  }
  return undefined;
}

function documentCharset(body: Uint8Array): string | undefined {
  // latin1 maps bytes 1:1, so ASCII markup survives whatever the real encoding is
  const head = Buffer.from(body.buffer, body.byteOffset, Math.min(body.length, SNIFF_BYTES)).toString(
    'latin1',
  );

  const metaCharset = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i.exec(head);
  if (metaCharset) return metaCharset[1];

  const xmlEncoding = /<\?xml[^>]*encoding\s*=\s*["']([\w.:-]+)["']/i.exec(head);
  return xmlEncoding?.[1];
}

/**
 * Header charset first, then byte-order mark, then a declaration inside the
 * document; unknown labels are skipped at every step.
 */
export function resolveCharset(contentType: string | null, body: Uint8Array): ResolvedCharset {
  const fromHeader = canonicalCharset(charsetFromContentType(contentType));
  if (fromHeader) return { charset: fromHeader, source: 'header' };

  const fromBom = canonicalCharset(bomCharset(body));
  if (fromBom) return { charset: fromBom, source: 'bom' };

  const fromDocument = canonicalCharset(documentCharset(body));
  if (fromDocument) return { charset: fromDocument, source: 'document' };

  return { charset: DEFAULT_CHARSET, source: 'default' };
}

/** Malformed byte sequences decode to U+FFFD instead of throwing. */
export function decodeBody(body: Uint8Array, charset: string): string {
  return new TextDecoder(charset, { fatal: false }).decode(body);
}
