import { execFile } from 'child_process';
import path from 'path';
import { logger } from '../utils/logger';
import { fileExists } from '../utils/files';
import { AudioExtractionError } from '../utils/errors';

export const DEFAULT_AUDIO_NAME = 'audio.mp3';

/**
 * Runs an external program to completion. Rejects with the program's stderr
 * when it exits non-zero.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { maxBuffer: 10 * 1024 * 1024 }, (error, _stdout, stderr) => {
      if (error) {
        const detail = stderr.trim().split('\n').slice(-5).join('\n');
        return reject(new Error(detail || error.message));
      }
      resolve();
    });
  });

export class AudioExtractor {
  private ffmpegPath: string;
  private runner: CommandRunner;

  constructor(ffmpegPath: string = 'ffmpeg', runner: CommandRunner = runCommand) {
    this.ffmpegPath = ffmpegPath;
    this.runner = runner;
  }

  /**
   * Extract an MP3 track from a video, written beside the video as `audioName`.
   */
  async extractAudio(videoFile: string, audioName: string = DEFAULT_AUDIO_NAME): Promise<string> {
    if (!(await fileExists(videoFile))) {
      throw new AudioExtractionError(`Video file not found: ${videoFile}`);
    }

    const audioFile = path.join(path.dirname(videoFile), audioName);
    const args = this.buildArgs(videoFile, audioFile);

    logger.info('Extracting audio', { videoFile, audioFile });

    try {
      await this.runner(this.ffmpegPath, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.error('ffmpeg failed', { videoFile, error: message });
      throw new AudioExtractionError(`FFmpeg error: ${message}`, { cause: error });
    }

    logger.info('Audio extracted', { audioFile });
    return audioFile;
  }

  buildArgs(videoFile: string, audioFile: string): string[] {
    return ['-i', videoFile, '-vn', '-acodec', 'libmp3lame', '-b:a', '192k', '-y', audioFile];
  }
}
