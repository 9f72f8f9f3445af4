import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { JobStatus, ObjectStore, StartJobRequest, TranscriptionJobClient } from '../transcription/jobs';
import type { CommandRunner } from '../media/AudioExtractor';
import type { PunctuationItem, SpeakerSegment, WordItem } from '../types/transcript';

export const FIXTURE_PATH = path.join(__dirname, 'fixtures', 'meeting.json');

export const FIXTURE_MARKDOWN = [
  '# Meeting Transcript',
  '',
  '[speaker: spk_0][00:00-00:01]: Hello everyone, welcome.',
  '',
  '[speaker: spk_1][00:02-00:03]: Thanks!',
  '',
  '[speaker: spk_0][01:03-01:04]: So let\'s begin.'
].join('\n');

export function readFixture(): Promise<string> {
  return fs.readFile(FIXTURE_PATH, 'utf-8');
}

export function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'meeting-transcriber-'));
}

export function removeDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}

export function word(text: string, startTime: number, endTime: number): WordItem {
  return { kind: 'word', text, startTime, endTime };
}

export function punct(text: string): PunctuationItem {
  return { kind: 'punctuation', text };
}

export function segment(speakerLabel: string, startTime: number, endTime: number): SpeakerSegment {
  return { speakerLabel, startTime, endTime };
}

/**
 * In-memory object store keyed by `bucket/key`.
 */
export class FakeObjectStore implements ObjectStore {
  objects = new Map<string, string>();
  removed: string[] = [];

  async upload(bucket: string, key: string, localFile: string): Promise<void> {
    this.objects.set(`${bucket}/${key}`, await fs.readFile(localFile, 'utf-8'));
  }

  async download(bucket: string, key: string): Promise<string> {
    const body = this.objects.get(`${bucket}/${key}`);
    if (body === undefined) {
      throw new Error(`NoSuchKey: ${bucket}/${key}`);
    }
    return body;
  }

  async remove(bucket: string, key: string): Promise<void> {
    this.removed.push(`${bucket}/${key}`);
    this.objects.delete(`${bucket}/${key}`);
  }
}

/**
 * Replays a fixed sequence of job statuses. On COMPLETED the output document
 * is written to the store where the job was told to put it.
 */
export class FakeJobClient implements TranscriptionJobClient {
  started: StartJobRequest[] = [];
  statusChecks = 0;
  private statuses: JobStatus[];
  private store: FakeObjectStore;
  private output: string;

  constructor(store: FakeObjectStore, statuses: JobStatus[], output: string) {
    this.store = store;
    this.statuses = statuses;
    this.output = output;
  }

  async start(request: StartJobRequest): Promise<void> {
    this.started.push(request);
  }

  async getStatus(): Promise<JobStatus> {
    const next = this.statuses[Math.min(this.statusChecks, this.statuses.length - 1)];
    this.statusChecks++;

    const request = this.started[this.started.length - 1];
    if (next.status === 'COMPLETED' && request) {
      this.store.objects.set(`${request.outputBucket}/${request.outputKey}`, this.output);
    }
    return next;
  }
}

/**
 * Stands in for ffmpeg: records each call and writes a placeholder file at
 * the output path (the last argument).
 */
export function fakeFfmpeg(): { runner: CommandRunner; calls: Array<{ command: string; args: string[] }> } {
  const calls: Array<{ command: string; args: string[] }> = [];
  const runner: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    await fs.writeFile(args[args.length - 1], 'fake-audio');
  };
  return { runner, calls };
}
