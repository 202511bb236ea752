import { UnreadableDocument } from '../errors.js';

export type RawContent = Buffer | Uint8Array | string;

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function toBytes(content: RawContent): Buffer {
  return typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
}

/** Strict UTF-8 decode. Binary payloads (NUL bytes) are rejected as well. */
export function decodeText(content: RawContent): string {
  let text: string;
  if (typeof content === 'string') {
    text = content;
  } else {
    try {
      text = utf8.decode(content);
    } catch (err) {
      throw new UnreadableDocument('content is not valid UTF-8 text', { cause: err });
    }
  }
  if (text.includes('\u0000')) {
    throw new UnreadableDocument('content contains binary data');
  }
  return text;
}
