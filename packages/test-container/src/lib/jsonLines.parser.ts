import { StringDecoder } from 'node:string_decoder';

type Chunk = Buffer | string | Uint8Array | null | undefined;

export type JsonLinesParserOptions = {
  onError?: (payload: string, error: unknown) => void;
};

export type JsonLinesParser = {
  handleChunk: (chunk: Chunk) => void;
  flush: () => void;
};

const parseLine = (raw: string, emit: (value: unknown) => void, options?: JsonLinesParserOptions) => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    options?.onError?.(raw, error);
    return;
  }
  emit(value);
};

/**
 * Splits a newline-delimited JSON stream into values, tolerating lines split across chunks.
 * Engine progress streams use this framing.
 */
export const createJsonLinesParser = (
  emit: (value: unknown) => void,
  options?: JsonLinesParserOptions,
): JsonLinesParser => {
  let buffer = '';
  // holds the bytes of a multibyte character split across chunks
  const decoder = new StringDecoder('utf8');

  const handleChunk = (chunk: Chunk) => {
    if (!chunk) return;
    buffer += typeof chunk === 'string' ? chunk : decoder.write(Buffer.from(chunk));
    while (true) {
      const newlineIdx = buffer.indexOf('\n');
      if (newlineIdx === -1) break;
      const raw = buffer.slice(0, newlineIdx).trim();
      buffer = buffer.slice(newlineIdx + 1);
      if (raw) parseLine(raw, emit, options);
    }
  };

  const flush = () => {
    const trailing = (buffer + decoder.end()).trim();
    buffer = '';
    if (trailing) parseLine(trailing, emit, options);
  };

  return { handleChunk, flush };
};
