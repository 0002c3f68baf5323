import React from 'react';
import { Box, Text } from 'ink';
import type { JobSummary } from '../output/index.js';

interface HistoryScreenProps {
  outputRoot: string;
  jobs: JobSummary[] | null;
  error: Error | null;
}

export const HistoryScreen: React.FC<HistoryScreenProps> = ({ outputRoot, jobs, error }) => {
  return (
    <Box borderStyle="round" borderColor="cyan" flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          Previous transcription jobs in {outputRoot}
        </Text>
      </Box>
      {error && <Text color="red">{error.message}</Text>}
      {!error && jobs === null && <Text dimColor>Loading...</Text>}
      {jobs?.length === 0 && <Text dimColor>No previous transcription jobs found</Text>}
      {jobs?.map(job => (
        <Text key={job.name}>
          {job.displayTime} | {job.baseName} | {job.files.length} files | {job.name}
        </Text>
      ))}
    </Box>
  );
};
