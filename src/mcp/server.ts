#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../utils/config';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import {
  createToolDependencies,
  extractAudioInput,
  extractAudioTool,
  transcribeAudioInput,
  transcribeAudioTool,
  transcribeVideoInput,
  transcribeVideoTool,
  toToolResult,
  type ToolDependencies
} from './tools';

const SERVER_INSTRUCTIONS =
  'Meeting transcription with Amazon Transcribe. Extract audio from videos, transcribe with speaker identification, and generate markdown transcripts.';

export function createServer(deps: ToolDependencies): McpServer {
  const server = new McpServer(
    { name: 'meeting-transcriber', version: '1.0.0' },
    { instructions: SERVER_INSTRUCTIONS }
  );

  server.registerTool(
    'extract_audio',
    {
      description: 'Extract audio from video file using FFmpeg',
      inputSchema: extractAudioInput.shape
    },
    async args => toToolResult('extract_audio', () => extractAudioTool(args, deps))
  );

  server.registerTool(
    'transcribe_audio',
    {
      description: 'Transcribe audio file using Amazon Transcribe with speaker identification',
      inputSchema: transcribeAudioInput.shape
    },
    async args => toToolResult('transcribe_audio', () => transcribeAudioTool(args, deps))
  );

  server.registerTool(
    'transcribe_video',
    {
      description: 'Complete video transcription pipeline: extract audio, transcribe, convert to markdown',
      inputSchema: transcribeVideoInput.shape
    },
    async args => toToolResult('transcribe_video', () => transcribeVideoTool(args, deps))
  );

  return server;
}

export async function startServer(): Promise<void> {
  const server = createServer(createToolDependencies(loadConfig()));
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('MCP server listening on stdio');
}

if (require.main === module) {
  startServer().catch(error => {
    logger.error('MCP server failed to start', { error: errorMessage(error) });
    process.exit(1);
  });
}
