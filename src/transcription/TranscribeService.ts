import { promises as fs } from 'fs';
import path from 'path';
import { getUnixTime } from 'date-fns';
import { LanguageCode } from '@aws-sdk/client-transcribe';
import { logger, logStageStatus } from '../utils/logger';
import { sleep } from '../utils/time';
import { TranscriptionJobError } from '../utils/errors';
import { parseTranscriptJson } from './TranscriptParser';
import type { ObjectStore, TranscriptionJobClient } from './jobs';
import type { ProgressListener, TranscriptionResult } from '../types/transcript';

export const DEFAULT_MAX_SPEAKERS = 10;
// MaxSpeakerLabels range accepted by Amazon Transcribe
export const MIN_SPEAKERS = 2;
export const MAX_SPEAKERS = 30;
export const RAW_TRANSCRIPT_NAME = 'transcript.json';

export interface TranscribeOptions {
  bucket: string;
  jobName: string;
  maxSpeakers?: number;
  languageCode?: LanguageCode;
  onProgress?: ProgressListener;
}

export interface TranscribeOutcome {
  jobName: string;
  result: TranscriptionResult;
  /** Raw service output saved beside the audio file */
  rawFile: string;
}

/**
 * `transcribe-<file stem>-<unix seconds>`
 */
export function defaultJobName(file: string, now: Date = new Date()): string {
  const stem = path.basename(file, path.extname(file));
  return `transcribe-${stem}-${getUnixTime(now)}`;
}

export class TranscribeService {
  private objectStore: ObjectStore;
  private jobClient: TranscriptionJobClient;
  private pollIntervalMs: number;

  constructor(objectStore: ObjectStore, jobClient: TranscriptionJobClient, pollIntervalMs: number = 10000) {
    this.objectStore = objectStore;
    this.jobClient = jobClient;
    this.pollIntervalMs = pollIntervalMs;
  }

  /**
   * Upload audio, run a speaker-labelled transcription job, and fetch its
   * result. Both S3 objects are deleted once the result is downloaded.
   */
  async transcribe(audioFile: string, options: TranscribeOptions): Promise<TranscribeOutcome> {
    const { bucket, jobName, onProgress } = options;
    const audioKey = `audio/${jobName}/${path.basename(audioFile)}`;
    const outputKey = `transcripts/${jobName}.json`;

    onProgress?.({ stage: 'upload', message: 'Uploading to S3...' });
    logStageStatus(jobName, 'upload', 'started', { bucket, audioKey });
    await this.objectStore.upload(bucket, audioKey, audioFile);
    logStageStatus(jobName, 'upload', 'completed');
    onProgress?.({ stage: 'upload', message: 'Upload complete', done: true });

    onProgress?.({ stage: 'transcribe', message: 'Starting transcription job...' });
    await this.jobClient.start({
      jobName,
      mediaUri: `s3://${bucket}/${audioKey}`,
      languageCode: options.languageCode ?? LanguageCode.EN_US,
      maxSpeakers: options.maxSpeakers ?? DEFAULT_MAX_SPEAKERS,
      outputBucket: bucket,
      outputKey
    });
    logStageStatus(jobName, 'transcribe', 'started', { maxSpeakers: options.maxSpeakers ?? DEFAULT_MAX_SPEAKERS });

    onProgress?.({ stage: 'transcribe', message: 'Waiting for transcription...' });
    await this.waitForCompletion(jobName);
    logStageStatus(jobName, 'transcribe', 'completed');
    onProgress?.({ stage: 'transcribe', message: 'Transcription complete', done: true });

    onProgress?.({ stage: 'download', message: 'Downloading transcript...' });
    const body = await this.objectStore.download(bucket, outputKey);
    const rawFile = path.join(path.dirname(audioFile), RAW_TRANSCRIPT_NAME);
    await fs.writeFile(rawFile, body, 'utf-8');

    await this.objectStore.remove(bucket, audioKey);
    await this.objectStore.remove(bucket, outputKey);
    onProgress?.({ stage: 'download', message: 'Transcript downloaded', done: true });

    const result = parseTranscriptJson(body);
    logger.info('Transcript downloaded', {
      jobName,
      rawFile,
      items: result.items.length,
      segments: result.speakerSegments.length
    });

    return { jobName, result, rawFile };
  }

  private async waitForCompletion(jobName: string): Promise<void> {
    for (;;) {
      const { status, failureReason } = await this.jobClient.getStatus(jobName);

      if (status === 'COMPLETED') {
        return;
      }

      if (status === 'FAILED') {
        const reason = failureReason || 'Unknown error';
        logStageStatus(jobName, 'transcribe', 'failed', { reason });
        throw new TranscriptionJobError(jobName, reason);
      }

      logger.debug(`Job ${jobName} is ${status ?? 'pending'}, checking again in ${this.pollIntervalMs}ms`);
      await sleep(this.pollIntervalMs);
    }
  }
}
