#!/usr/bin/env node

import 'dotenv/config';
import React from 'react';
import { render } from 'ink';
import { TranscribeApp, HistoryApp, JobApp } from './app.js';
import { loadConfig, ConfigValidationError, type Config } from './config/index.js';
import { CliUsageError, parseCliArgs, usage, type CliCommand } from './cli.js';
import { createCommandInference } from './inference/index.js';
import { createNvidiaSmiProbe } from './device/index.js';

// Load and validate configuration before starting the application
function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n' + error.message + '\n');
      process.exit(1);
    }
    throw error;
  }
}

function parseArgsOrExit(config: Config): CliCommand {
  try {
    return parseCliArgs(process.argv.slice(2), config);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`❌ Error: ${error.message}\n\n${usage()}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfigOrExit();
const command = parseArgsOrExit(config);

if (command.kind === 'help') {
  console.log(usage());
  process.exit(0);
}

const verbose = config.app.verbose;

function renderCommand(command: Exclude<CliCommand, { kind: 'help' }>) {
  switch (command.kind) {
    case 'history':
      return render(<HistoryApp outputRoot={command.outputRoot} />);
    case 'show':
      return render(<JobApp outputRoot={command.outputRoot} job={command.job} />);
    case 'transcribe':
      return render(
        <TranscribeApp
          request={command.request}
          dependencies={{
            inference: createCommandInference({
              command: config.whisper.command,
              ...(verbose ? { onLog: (line: string) => console.error(`[recognizer] ${line}`) } : {}),
            }),
            cudaProbe: createNvidiaSmiProbe({ executable: config.device.nvidiaSmiPath }),
          }}
        />
      );
  }
}

const app = renderCommand(command);

try {
  await app.waitUntilExit();
} catch {
  process.exitCode = 1;
}
