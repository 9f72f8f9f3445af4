import { formatTimeRange, isTimeInSegment } from '../utils/time';
import type {
  PunctuationItem,
  SpeakerRun,
  SpeakerSegment,
  TranscriptItem,
  TranscriptionResult,
  WordItem
} from '../types/transcript';

export const TRANSCRIPT_TITLE = '# Meeting Transcript';

interface RenderState {
  current?: SpeakerRun;
  lines: string[];
}

/**
 * Label of the first segment, in list order, whose closed interval contains
 * `time`. Overlapping segments are not ranked by tightness.
 */
export function resolveSpeaker(time: number, segments: SpeakerSegment[]): string | undefined {
  return segments.find(segment => isTimeInSegment(time, segment.startTime, segment.endTime))?.speakerLabel;
}

export function formatRun(run: SpeakerRun): string {
  return `[speaker: ${run.speakerLabel ?? ''}][${formatTimeRange(run.startTime, run.endTime)}]: ${run.words.join(' ')}`;
}

export class MarkdownTranscriptBuilder {

  /**
   * Render a transcription as a speaker-attributed Markdown document.
   *
   * Words are grouped into runs of the same speaker; each run becomes one
   * entry. Punctuation is glued onto the preceding word.
   */
  render(result: TranscriptionResult): string {
    const segments = result.speakerSegments;

    const state = result.items.reduce<RenderState>(
      (acc, item) => this.step(acc, item, segments),
      { lines: [] }
    );

    const lines = state.current ? [...state.lines, formatRun(state.current)] : state.lines;

    return `${TRANSCRIPT_TITLE}\n\n${lines.join('\n\n')}`;
  }

  private step(state: RenderState, item: TranscriptItem, segments: SpeakerSegment[]): RenderState {
    switch (item.kind) {
      case 'word':
        return this.addWord(state, item, segments);
      case 'punctuation':
        return this.addPunctuation(state, item);
    }
  }

  private addWord(state: RenderState, word: WordItem, segments: SpeakerSegment[]): RenderState {
    const speakerLabel = resolveSpeaker(word.startTime, segments);
    const { current } = state;

    if (current && current.speakerLabel === speakerLabel) {
      current.words.push(word.text);
      current.endTime = word.endTime;
      return state;
    }

    if (current) {
      state.lines.push(formatRun(current));
    }
    state.current = {
      speakerLabel,
      startTime: word.startTime,
      endTime: word.endTime,
      words: [word.text]
    };
    return state;
  }

  private addPunctuation(state: RenderState, mark: PunctuationItem): RenderState {
    const words = state.current?.words;

    // Punctuation before the first word has nothing to attach to
    if (!words || words.length === 0) {
      return state;
    }

    words[words.length - 1] += mark.text;
    return state;
  }

  /**
   * Number of distinct speaker labels in the diarization segments.
   */
  countSpeakers(result: TranscriptionResult): number {
    return new Set(result.speakerSegments.map(segment => segment.speakerLabel)).size;
  }

  /**
   * First entries of a rendered document, one per line, without the title.
   */
  preview(document: string, entryCount: number = 2): string {
    return document
      .split('\n\n')
      .slice(1, 1 + entryCount)
      .filter(entry => entry.length > 0)
      .join('\n');
  }
}
