import { Ajv, type ValidateFunction } from 'ajv';
import type { Segment, Word } from '../types.js';

interface RawWord {
  word: string;
  start: number;
  end: number;
  conf?: number;
}

interface RawSegment {
  content: string;
  start: number;
  end: number;
  words?: RawWord[];
}

/** Canonical transcript schema: a top-level array of segments. */
export const TRANSCRIPT_JSON_SCHEMA = {
  type: 'array',
  items: {
    type: 'object',
    required: ['content', 'start', 'end'],
    properties: {
      content: { type: 'string' },
      start: { type: 'number', minimum: 0 },
      end: { type: 'number', minimum: 0 },
      words: {
        type: 'array',
        items: {
          type: 'object',
          required: ['word', 'start', 'end'],
          properties: {
            word: { type: 'string' },
            start: { type: 'number' },
            end: { type: 'number' },
            conf: { type: 'number', minimum: 0, maximum: 1 },
          },
        },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: false });
let validator: ValidateFunction<RawSegment[]> | undefined;

function getValidator(): ValidateFunction<RawSegment[]> {
  validator ??= ajv.compile<RawSegment[]>(TRANSCRIPT_JSON_SCHEMA);
  return validator;
}

/**
 * Parses the canonical JSON transcript. Throws on malformed JSON or a schema
 * violation; the store turns that into a T002 error.
 */
export function parseJsonTranscript(text: string, file: string): Segment[] {
  const payload: unknown = JSON.parse(text);
  const validate = getValidator();
  if (!validate(payload)) {
    const messages = (validate.errors ?? []).map((error) =>
      `${error.instancePath || '/'} ${error.message ?? ''}`.trim(),
    );
    throw new Error(`Invalid transcript JSON: ${messages.join('; ')}`);
  }

  return payload.map((raw) => {
    const segment: Segment = {
      file,
      start: raw.start,
      end: raw.end,
      content: raw.content,
    };
    if (raw.words) {
      segment.words = raw.words.map(toWord);
    }
    return segment;
  });
}

function toWord(raw: RawWord): Word {
  return {
    word: raw.word,
    start: raw.start,
    end: raw.end,
    confidence: raw.conf ?? 1,
  };
}
