export type ErrorCode =
  | 'TRANSCRIPT_FORMAT'
  | 'AUDIO_EXTRACTION'
  | 'TRANSCRIPTION_JOB'
  | 'INPUT_FILE'
  | 'CONFIG';

export class MeetingTranscriberError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a transcript document does not have the structure the
 * renderer dereferences. `issues` holds one `path: message` entry per problem.
 */
export class TranscriptFormatError extends MeetingTranscriberError {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super('TRANSCRIPT_FORMAT', `Invalid transcript document: ${issues.join(', ')}`, options);
    this.issues = issues;
  }
}

export class AudioExtractionError extends MeetingTranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AUDIO_EXTRACTION', message, options);
  }
}

export class TranscriptionJobError extends MeetingTranscriberError {
  readonly jobName: string;
  readonly reason: string;

  constructor(jobName: string, reason: string) {
    super('TRANSCRIPTION_JOB', `Transcription failed: ${reason}`);
    this.jobName = jobName;
    this.reason = reason;
  }
}

export class InputFileError extends MeetingTranscriberError {
  readonly filePath: string;

  constructor(message: string, filePath: string) {
    super('INPUT_FILE', message);
    this.filePath = filePath;
  }
}

export class ConfigError extends MeetingTranscriberError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
