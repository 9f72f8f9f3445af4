import { promises as fs } from 'fs';
import path from 'path';
import { AudioExtractor, DEFAULT_AUDIO_NAME } from '../media/AudioExtractor';
import { TranscribeService, defaultJobName, DEFAULT_MAX_SPEAKERS } from '../transcription/TranscribeService';
import { createAwsClients, type AwsClientOptions } from '../transcription/AwsClients';
import { MarkdownTranscriptBuilder } from '../builders/MarkdownTranscriptBuilder';
import { logger, logStageStatus } from '../utils/logger';
import { fileExists, removeIfExists } from '../utils/files';
import { errorMessage, InputFileError } from '../utils/errors';
import type { AppConfig } from '../utils/config';
import type { ProgressListener, TranscriptionSummary } from '../types/transcript';

export const MARKDOWN_NAME = 'transcript.md';

export interface TranscribeVideoOptions {
  bucket: string;
  jobName?: string;
  maxSpeakers?: number;
  audioName?: string;
  cleanupAudio?: boolean;
  cleanupJson?: boolean;
  onProgress?: ProgressListener;
}

export class MeetingTranscriber {
  private audioExtractor: AudioExtractor;
  private transcribeService: TranscribeService;
  private markdownBuilder: MarkdownTranscriptBuilder;

  constructor(
    audioExtractor: AudioExtractor,
    transcribeService: TranscribeService,
    markdownBuilder: MarkdownTranscriptBuilder = new MarkdownTranscriptBuilder()
  ) {
    this.audioExtractor = audioExtractor;
    this.transcribeService = transcribeService;
    this.markdownBuilder = markdownBuilder;
  }

  /**
   * Extract audio from a video, transcribe it with speaker labels, and write
   * the Markdown transcript beside the audio file.
   */
  async transcribeVideo(videoFile: string, options: TranscribeVideoOptions): Promise<TranscriptionSummary> {
    const {
      bucket,
      maxSpeakers = DEFAULT_MAX_SPEAKERS,
      audioName = DEFAULT_AUDIO_NAME,
      cleanupAudio = true,
      cleanupJson = true,
      onProgress
    } = options;
    const jobName = options.jobName || defaultJobName(videoFile);
    const startTime = Date.now();

    if (!(await fileExists(videoFile))) {
      throw new InputFileError(`Video file not found: ${videoFile}`, videoFile);
    }

    logger.info('Starting transcription pipeline', { videoFile, bucket, jobName, maxSpeakers, audioName });

    try {
      onProgress?.({ stage: 'extract', message: 'Extracting audio from video...' });
      logStageStatus(jobName, 'extract', 'started', { videoFile });
      const audioFile = await this.audioExtractor.extractAudio(videoFile, audioName);
      logStageStatus(jobName, 'extract', 'completed', { audioFile });
      onProgress?.({ stage: 'extract', message: 'Audio extraction complete', done: true });

      const { result, rawFile } = await this.transcribeService.transcribe(audioFile, {
        bucket,
        jobName,
        maxSpeakers,
        onProgress
      });

      onProgress?.({ stage: 'render', message: 'Converting to markdown...' });
      const markdown = this.markdownBuilder.render(result);
      const markdownFile = path.join(path.dirname(audioFile), MARKDOWN_NAME);
      await fs.writeFile(markdownFile, markdown, 'utf-8');
      onProgress?.({ stage: 'render', message: 'Markdown written', done: true });

      let audioRemoved = false;
      let jsonRemoved = false;
      if (cleanupAudio) {
        audioRemoved = await removeIfExists(audioFile);
      }
      if (cleanupJson) {
        jsonRemoved = await removeIfExists(rawFile);
      }
      if (audioRemoved || jsonRemoved) {
        onProgress?.({ stage: 'cleanup', message: 'Intermediate files removed', done: true });
      }

      const summary: TranscriptionSummary = {
        jobName,
        audioFile,
        rawFile,
        markdownFile,
        speakersCount: this.markdownBuilder.countSpeakers(result),
        transcriptLength: result.transcriptText.length,
        audioRemoved,
        jsonRemoved,
        preview: this.markdownBuilder.preview(markdown)
      };

      logStageStatus(jobName, 'pipeline', 'completed', {
        markdownFile,
        speakers: summary.speakersCount,
        processingTime: Date.now() - startTime
      });

      return summary;
    } catch (error) {
      logStageStatus(jobName, 'pipeline', 'failed', {
        error: errorMessage(error),
        processingTime: Date.now() - startTime
      });
      throw error;
    }
  }
}

export function createTranscribeService(config: AppConfig, aws: Partial<AwsClientOptions> = {}): TranscribeService {
  const { objectStore, jobClient } = createAwsClients({
    region: aws.region || config.region,
    credentials: aws.credentials
  });

  return new TranscribeService(objectStore, jobClient, config.pollIntervalMs);
}

/**
 * Wire a MeetingTranscriber to ffmpeg and AWS.
 */
export function createMeetingTranscriber(config: AppConfig, aws: Partial<AwsClientOptions> = {}): MeetingTranscriber {
  return new MeetingTranscriber(
    new AudioExtractor(config.ffmpegPath),
    createTranscribeService(config, aws)
  );
}
