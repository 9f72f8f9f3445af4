import { z } from 'zod';
import { TranscriptFormatError } from '../utils/errors';
import type { SpeakerSegment, TranscriptItem, TranscriptionResult } from '../types/transcript';

// Amazon Transcribe writes timestamps as decimal strings
const seconds = z.union([z.string(), z.number()]).transform((value, ctx) => {
  // Number('') is 0, so blank strings are rejected before conversion
  const parsed = typeof value === 'string' && value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a number of seconds' });
    return z.NEVER;
  }
  return parsed;
});

const alternatives = z.array(z.object({ content: z.string() })).min(1);

const pronunciationItemSchema = z.object({
  type: z.literal('pronunciation'),
  start_time: seconds,
  end_time: seconds,
  alternatives
});

const punctuationItemSchema = z.object({
  type: z.literal('punctuation'),
  alternatives
});

const speakerSegmentSchema = z.object({
  start_time: seconds,
  end_time: seconds,
  speaker_label: z.string()
});

const transcribeDocumentSchema = z.object({
  jobName: z.string().optional(),
  results: z.object({
    transcripts: z.array(z.object({ transcript: z.string() })).optional(),
    items: z.array(z.discriminatedUnion('type', [pronunciationItemSchema, punctuationItemSchema])),
    speaker_labels: z
      .object({
        segments: z.array(speakerSegmentSchema).default([])
      })
      .optional()
  })
});

/**
 * Convert an Amazon Transcribe output document into a TranscriptionResult.
 */
export function parseTranscribeOutput(raw: unknown): TranscriptionResult {
  const parsed = transcribeDocumentSchema.safeParse(raw);

  if (!parsed.success) {
    throw new TranscriptFormatError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const { results } = parsed.data;

  const items = results.items.map((item): TranscriptItem =>
    item.type === 'pronunciation'
      ? {
          kind: 'word',
          startTime: item.start_time,
          endTime: item.end_time,
          text: item.alternatives[0].content
        }
      : {
          kind: 'punctuation',
          text: item.alternatives[0].content
        }
  );

  const speakerSegments = (results.speaker_labels?.segments ?? []).map((segment): SpeakerSegment => ({
    startTime: segment.start_time,
    endTime: segment.end_time,
    speakerLabel: segment.speaker_label
  }));

  return {
    transcriptText: results.transcripts?.[0]?.transcript ?? '',
    items,
    speakerSegments
  };
}

/**
 * Parse the JSON text of an Amazon Transcribe output document.
 */
export function parseTranscriptJson(text: string): TranscriptionResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new TranscriptFormatError([`<root>: ${error instanceof Error ? error.message : 'Invalid JSON'}`], {
      cause: error
    });
  }
  return parseTranscribeOutput(raw);
}
