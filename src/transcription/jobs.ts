import type { LanguageCode } from '@aws-sdk/client-transcribe';

/**
 * Object storage used to hand audio to the transcription service and to
 * fetch its output.
 */
export interface ObjectStore {
  upload(bucket: string, key: string, localFile: string): Promise<void>;
  download(bucket: string, key: string): Promise<string>;
  remove(bucket: string, key: string): Promise<void>;
}

export interface StartJobRequest {
  jobName: string;
  mediaUri: string;
  languageCode: LanguageCode;
  maxSpeakers: number;
  outputBucket: string;
  outputKey: string;
}

export interface JobStatus {
  status?: string;
  failureReason?: string;
}

export interface TranscriptionJobClient {
  start(request: StartJobRequest): Promise<void>;
  getStatus(jobName: string): Promise<JobStatus>;
}
