import { promises as fs } from 'fs';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  PutObjectCommand,
  S3Client
} from '@aws-sdk/client-s3';
import {
  GetTranscriptionJobCommand,
  StartTranscriptionJobCommand,
  TranscribeClient
} from '@aws-sdk/client-transcribe';
import { logger } from '../utils/logger';
import type { JobStatus, ObjectStore, StartJobRequest, TranscriptionJobClient } from './jobs';

export interface AwsCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface AwsClientOptions {
  region: string;
  // Falls back to the SDK's default provider chain when omitted
  credentials?: AwsCredentials;
}

export class S3ObjectStore implements ObjectStore {
  private client: S3Client;

  constructor(client: S3Client) {
    this.client = client;
  }

  async upload(bucket: string, key: string, localFile: string): Promise<void> {
    const body = await fs.readFile(localFile);
    logger.debug(`S3 PUT s3://${bucket}/${key}`, { bytes: body.length });
    await this.client.send(new PutObjectCommand({ Bucket: bucket, Key: key, Body: body }));
  }

  async download(bucket: string, key: string): Promise<string> {
    logger.debug(`S3 GET s3://${bucket}/${key}`);
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));

    if (!response.Body) {
      throw new Error(`Empty body for s3://${bucket}/${key}`);
    }

    return response.Body.transformToString('utf-8');
  }

  async remove(bucket: string, key: string): Promise<void> {
    logger.debug(`S3 DELETE s3://${bucket}/${key}`);
    await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
  }
}

export class AwsTranscriptionJobClient implements TranscriptionJobClient {
  private client: TranscribeClient;

  constructor(client: TranscribeClient) {
    this.client = client;
  }

  async start(request: StartJobRequest): Promise<void> {
    await this.client.send(
      new StartTranscriptionJobCommand({
        TranscriptionJobName: request.jobName,
        LanguageCode: request.languageCode,
        Media: { MediaFileUri: request.mediaUri },
        Settings: {
          ShowSpeakerLabels: true,
          MaxSpeakerLabels: request.maxSpeakers
        },
        OutputBucketName: request.outputBucket,
        OutputKey: request.outputKey
      })
    );
  }

  async getStatus(jobName: string): Promise<JobStatus> {
    const response = await this.client.send(
      new GetTranscriptionJobCommand({ TranscriptionJobName: jobName })
    );

    return {
      status: response.TranscriptionJob?.TranscriptionJobStatus,
      failureReason: response.TranscriptionJob?.FailureReason
    };
  }
}

export function createAwsClients(options: AwsClientOptions): {
  objectStore: ObjectStore;
  jobClient: TranscriptionJobClient;
} {
  const config = { region: options.region, credentials: options.credentials };

  return {
    objectStore: new S3ObjectStore(new S3Client(config)),
    jobClient: new AwsTranscriptionJobClient(new TranscribeClient(config))
  };
}
