#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { createMeetingTranscriber, MeetingTranscriber, MARKDOWN_NAME } from './pipeline/MeetingTranscriber';
import { MarkdownTranscriptBuilder } from './builders/MarkdownTranscriptBuilder';
import { parseTranscriptJson } from './transcription/TranscriptParser';
import { defaultJobName, DEFAULT_MAX_SPEAKERS, MAX_SPEAKERS, MIN_SPEAKERS } from './transcription/TranscribeService';
import { DEFAULT_AUDIO_NAME } from './media/AudioExtractor';
import { loadConfig, type AppConfig } from './utils/config';
import { ConfigError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import type { ProgressEvent } from './types/transcript';

interface TranscribeCommandOptions {
  bucket?: string;
  jobName?: string;
  maxSpeakers: number;
  region: string;
  audioName: string;
  keepAudio?: boolean;
  keepJson?: boolean;
}

interface RenderCommandOptions {
  output?: string;
}

export interface CliDependencies {
  config: AppConfig;
  createTranscriber(region: string): MeetingTranscriber;
  print(line: string): void;
}

export function parseMaxSpeakers(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < MIN_SPEAKERS || parsed > MAX_SPEAKERS) {
    throw new InvalidArgumentError(`Must be an integer between ${MIN_SPEAKERS} and ${MAX_SPEAKERS}.`);
  }
  return parsed;
}

export function buildProgram(deps: CliDependencies): Command {
  const { config, print } = deps;
  const program = new Command();

  program
    .name('meeting-transcriber')
    .description('Transcribe meeting videos with speaker identification into markdown')
    .version('1.0.0');

  program
    .command('transcribe', { isDefault: true })
    .description('Extract audio from a video, transcribe it with Amazon Transcribe and write transcript.md')
    .argument('<video>', 'Video file to transcribe')
    .option('-b, --bucket <name>', 'S3 bucket name (defaults to TRANSCRIBE_BUCKET)')
    .option('-j, --job-name <name>', 'Transcription job name (auto-generated if not provided)')
    .option('-s, --max-speakers <number>', 'Maximum number of speakers to identify', parseMaxSpeakers, DEFAULT_MAX_SPEAKERS)
    .option('-r, --region <region>', 'AWS region', config.region)
    .option('-a, --audio-name <name>', 'Audio filename', DEFAULT_AUDIO_NAME)
    .option('--keep-audio', 'Keep the extracted audio file')
    .option('--keep-json', 'Keep the raw transcription JSON file')
    .action(async (video: string, options: TranscribeCommandOptions) => {
      const bucket = options.bucket || config.bucket;
      if (!bucket) {
        throw new ConfigError('An S3 bucket is required (--bucket or TRANSCRIBE_BUCKET)');
      }

      const jobName = options.jobName || defaultJobName(video);
      const cleanupAudio = !options.keepAudio;
      const cleanupJson = !options.keepJson;

      print('🎯 Meeting Transcriber');
      print('🔊 Speaker identification enabled');
      print('');
      print(`🎥 Video file: ${path.basename(video)}`);
      print(`🪣 S3 bucket: ${bucket}`);
      print(`🏷️  Job name: ${jobName}`);
      print(`👥 Max speakers: ${options.maxSpeakers}`);
      print(`🎵 Audio filename: ${options.audioName}`);
      print(`🧹 Cleanup audio: ${cleanupAudio ? 'Yes' : 'No'}`);
      print(`📄 Cleanup JSON: ${cleanupJson ? 'Yes' : 'No'}`);

      const transcriber = deps.createTranscriber(options.region);
      const summary = await transcriber.transcribeVideo(video, {
        bucket,
        jobName,
        maxSpeakers: options.maxSpeakers,
        audioName: options.audioName,
        cleanupAudio,
        cleanupJson,
        onProgress: (event: ProgressEvent) => print(event.done ? `✅ ${event.message}` : `⏳ ${event.message}`)
      });

      print('');
      print('✅ Transcription Complete!');
      print(`📝 Markdown saved: ${summary.markdownFile}`);
      print(`📄 JSON ${summary.jsonRemoved ? 'removed' : 'preserved'}: ${summary.rawFile}`);
      print(`🎵 Audio ${summary.audioRemoved ? 'removed' : 'preserved'}: ${summary.audioFile}`);
      print(`👥 Speakers identified: ${summary.speakersCount}`);
      print(`📊 Transcript length: ${summary.transcriptLength} characters`);

      if (summary.preview) {
        print('');
        print('📝 Markdown Preview:');
        print(summary.preview);
      }
    });

  program
    .command('render')
    .description('Render an existing Amazon Transcribe JSON file to markdown')
    .argument('<json>', 'Amazon Transcribe output file')
    .option('-o, --output <file>', `Output file (defaults to ${MARKDOWN_NAME} beside the input)`)
    .action(async (jsonFile: string, options: RenderCommandOptions) => {
      const content = await fs.readFile(jsonFile, 'utf-8');
      const result = parseTranscriptJson(content);
      const builder = new MarkdownTranscriptBuilder();
      const markdown = builder.render(result);

      const outputFile = options.output || path.join(path.dirname(jsonFile), MARKDOWN_NAME);
      await fs.writeFile(outputFile, markdown, 'utf-8');

      logger.info('Rendered transcript', { jsonFile, outputFile, items: result.items.length });
      print(`📝 Markdown saved: ${outputFile}`);
      print(`👥 Speakers identified: ${builder.countSpeakers(result)}`);
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const config = loadConfig();
  const program = buildProgram({
    config,
    createTranscriber: region => createMeetingTranscriber(config, { region }),
    print: line => console.log(line)
  });

  await program.parseAsync(argv);
}

if (require.main === module) {
  main().catch(error => {
    const message = errorMessage(error);
    logger.error('Command failed', { error: message });
    console.error(`\n❌ Error: ${message}`);
    process.exit(1);
  });
}
