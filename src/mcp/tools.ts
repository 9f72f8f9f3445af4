import { z } from 'zod';
import { AudioExtractor, DEFAULT_AUDIO_NAME } from '../media/AudioExtractor';
import {
  defaultJobName,
  DEFAULT_MAX_SPEAKERS,
  MAX_SPEAKERS,
  MIN_SPEAKERS,
  TranscribeService
} from '../transcription/TranscribeService';
import { MarkdownTranscriptBuilder } from '../builders/MarkdownTranscriptBuilder';
import { createMeetingTranscriber, createTranscribeService, MeetingTranscriber } from '../pipeline/MeetingTranscriber';
import { fileExists } from '../utils/files';
import { errorMessage, InputFileError } from '../utils/errors';
import { logger } from '../utils/logger';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AwsClientOptions } from '../transcription/AwsClients';
import type { AppConfig } from '../utils/config';
import type { ProgressEvent, TranscriptionResult } from '../types/transcript';

const awsShape = {
  region_name: z.string().optional().describe('AWS region (defaults to AWS_REGION or us-east-1)'),
  aws_access_key_id: z.string().optional().describe('AWS access key id; the default credential chain is used when omitted'),
  aws_secret_access_key: z.string().optional().describe('AWS secret access key'),
  aws_session_token: z.string().optional().describe('AWS session token for temporary credentials')
};

export const extractAudioInput = z.object({
  video_path: z.string().min(1).describe('Path to the video file'),
  audio_name: z.string().min(1).default(DEFAULT_AUDIO_NAME).describe('File name for the extracted audio')
});

export const transcribeAudioInput = z.object({
  audio_path: z.string().min(1).describe('Path to the audio file'),
  bucket: z.string().min(1).describe('S3 bucket used for upload and job output'),
  max_speakers: z.number().int().min(MIN_SPEAKERS).max(MAX_SPEAKERS).default(DEFAULT_MAX_SPEAKERS).describe('Maximum number of speakers to identify'),
  job_name: z.string().optional().describe('Transcription job name (generated when omitted)'),
  ...awsShape
});

export const transcribeVideoInput = z.object({
  video_path: z.string().min(1).describe('Path to the video file'),
  bucket: z.string().min(1).describe('S3 bucket used for upload and job output'),
  max_speakers: z.number().int().min(MIN_SPEAKERS).max(MAX_SPEAKERS).default(DEFAULT_MAX_SPEAKERS).describe('Maximum number of speakers to identify'),
  audio_name: z.string().min(1).default(DEFAULT_AUDIO_NAME).describe('File name for the extracted audio'),
  job_name: z.string().optional().describe('Transcription job name (generated when omitted)'),
  cleanup_audio: z.boolean().default(true).describe('Remove the audio file afterwards'),
  ...awsShape
});

export type ExtractAudioInput = z.infer<typeof extractAudioInput>;
export type TranscribeAudioInput = z.infer<typeof transcribeAudioInput>;
export type TranscribeVideoInput = z.infer<typeof transcribeVideoInput>;
type AwsInput = { region_name?: string; aws_access_key_id?: string; aws_secret_access_key?: string; aws_session_token?: string };

export interface ToolDependencies {
  audioExtractor: AudioExtractor;
  transcribeService(aws: Partial<AwsClientOptions>): TranscribeService;
  meetingTranscriber(aws: Partial<AwsClientOptions>): MeetingTranscriber;
}

export function createToolDependencies(config: AppConfig): ToolDependencies {
  return {
    audioExtractor: new AudioExtractor(config.ffmpegPath),
    transcribeService: aws => createTranscribeService(config, aws),
    meetingTranscriber: aws => createMeetingTranscriber(config, aws)
  };
}

export function awsOptionsFromInput(input: AwsInput): Partial<AwsClientOptions> {
  const options: Partial<AwsClientOptions> = {};

  if (input.region_name) {
    options.region = input.region_name;
  }
  if (input.aws_access_key_id && input.aws_secret_access_key) {
    options.credentials = {
      accessKeyId: input.aws_access_key_id,
      secretAccessKey: input.aws_secret_access_key,
      sessionToken: input.aws_session_token
    };
  }

  return options;
}

/**
 * Run a tool body and wrap its outcome as an MCP tool result. Failures are
 * returned as error results rather than protocol errors.
 */
export async function toToolResult(tool: string, run: () => Promise<object>): Promise<CallToolResult> {
  try {
    const payload = await run();
    return {
      content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }]
    };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Tool ${tool} failed`, { error: message });
    return {
      content: [{ type: 'text', text: message }],
      isError: true
    };
  }
}

function logProgress(tool: string) {
  return (event: ProgressEvent) => logger.info(event.message, { tool, stage: event.stage });
}

export interface ExtractAudioOutput {
  audio_path: string;
  video_path: string;
  status: 'success';
}

export async function extractAudioTool(input: ExtractAudioInput, deps: ToolDependencies): Promise<ExtractAudioOutput> {
  if (!(await fileExists(input.video_path))) {
    throw new InputFileError(`Video file not found: ${input.video_path}`, input.video_path);
  }

  const audioPath = await deps.audioExtractor.extractAudio(input.video_path, input.audio_name);

  return {
    audio_path: audioPath,
    video_path: input.video_path,
    status: 'success'
  };
}

export interface TranscribeAudioOutput {
  transcript: TranscriptionResult;
  transcript_path: string;
  speakers_count: number;
  transcript_length: number;
  job_name: string;
  status: 'success';
}

export async function transcribeAudioTool(
  input: TranscribeAudioInput,
  deps: ToolDependencies
): Promise<TranscribeAudioOutput> {
  if (!(await fileExists(input.audio_path))) {
    throw new InputFileError(`Audio file not found: ${input.audio_path}`, input.audio_path);
  }

  const jobName = input.job_name || defaultJobName(input.audio_path);
  logger.info(`Starting transcription job: ${jobName}`, { tool: 'transcribe_audio' });

  const service = deps.transcribeService(awsOptionsFromInput(input));
  const { result, rawFile } = await service.transcribe(input.audio_path, {
    bucket: input.bucket,
    jobName,
    maxSpeakers: input.max_speakers,
    onProgress: logProgress('transcribe_audio')
  });

  return {
    transcript: result,
    transcript_path: rawFile,
    speakers_count: new MarkdownTranscriptBuilder().countSpeakers(result),
    transcript_length: result.transcriptText.length,
    job_name: jobName,
    status: 'success'
  };
}

export interface TranscribeVideoOutput {
  markdown_path: string;
  video_path: string;
  speakers_count: number;
  transcript_length: number;
  job_name: string;
  status: 'success';
}

export async function transcribeVideoTool(
  input: TranscribeVideoInput,
  deps: ToolDependencies
): Promise<TranscribeVideoOutput> {
  if (!(await fileExists(input.video_path))) {
    throw new InputFileError(`Video file not found: ${input.video_path}`, input.video_path);
  }

  const transcriber = deps.meetingTranscriber(awsOptionsFromInput(input));
  const summary = await transcriber.transcribeVideo(input.video_path, {
    bucket: input.bucket,
    jobName: input.job_name,
    maxSpeakers: input.max_speakers,
    audioName: input.audio_name,
    cleanupAudio: input.cleanup_audio,
    cleanupJson: true,
    onProgress: logProgress('transcribe_video')
  });

  return {
    markdown_path: summary.markdownFile,
    video_path: input.video_path,
    speakers_count: summary.speakersCount,
    transcript_length: summary.transcriptLength,
    job_name: summary.jobName,
    status: 'success'
  };
}
