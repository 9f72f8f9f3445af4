export interface WordItem {
  kind: 'word';
  startTime: number;
  endTime: number;
  text: string;
}

export interface PunctuationItem {
  kind: 'punctuation';
  text: string;
}

export type TranscriptItem = WordItem | PunctuationItem;

/**
 * Diarization interval, closed on both ends.
 */
export interface SpeakerSegment {
  startTime: number;
  endTime: number;
  speakerLabel: string;
}

export interface TranscriptionResult {
  transcriptText: string;
  items: TranscriptItem[];
  speakerSegments: SpeakerSegment[];
}

/**
 * Contiguous words attributed to one speaker. `speakerLabel` is undefined
 * when no diarization segment covers the words.
 */
export interface SpeakerRun {
  speakerLabel: string | undefined;
  startTime: number;
  endTime: number;
  words: string[];
}

export type PipelineStage = 'extract' | 'upload' | 'transcribe' | 'download' | 'render' | 'cleanup';

export interface ProgressEvent {
  stage: PipelineStage;
  message: string;
  done?: boolean;
}

export type ProgressListener = (event: ProgressEvent) => void;

export interface TranscriptionSummary {
  jobName: string;
  audioFile: string;
  rawFile: string;
  markdownFile: string;
  speakersCount: number;
  transcriptLength: number;
  audioRemoved: boolean;
  jsonRemoved: boolean;
  preview: string;
}
