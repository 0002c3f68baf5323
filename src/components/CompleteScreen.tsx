import React from 'react';
import { Box, Text } from 'ink';
import type { TranscriptionResult } from '../types.js';
import { formatDuration } from '../config/processingStages.js';

interface CompleteScreenProps {
  result: TranscriptionResult | null;
  error: Error | null;
  elapsedTime: number;
}

export const CompleteScreen: React.FC<CompleteScreenProps> = ({ result, error, elapsedTime }) => {
  const success = result !== null && error === null;
  const accentColor = success ? 'green' : 'red';
  const title = success ? '✓ Transcription completed successfully!' : '✗ Transcription failed';

  return (
    <Box borderStyle="round" borderColor={accentColor} flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color={accentColor}>
          {title}
        </Text>
      </Box>
      {error && <Text>{error.message}</Text>}
      {result && (
        <Box flexDirection="column">
          <Text>Output directory: {result.outputDir}</Text>
          <Text dimColor>
            Model {result.model} on {result.device}
            {result.language ? ` • language ${result.language}` : ''} • {result.segments.length} segments •{' '}
            {formatDuration(elapsedTime)}
          </Text>
          <Box marginTop={1} flexDirection="column">
            {result.files.map(file => (
              <Text key={file}>Saved output → {file}</Text>
            ))}
          </Box>
          {result.warnings.length > 0 && (
            <Box marginTop={1} flexDirection="column">
              {result.warnings.map((warning, index) => (
                <Text key={`complete-warning-${index}`} color="yellow">
                  ⚠ {warning.message}
                </Text>
              ))}
            </Box>
          )}
        </Box>
      )}
    </Box>
  );
};
