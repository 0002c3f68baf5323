import React from 'react';
import { Box, Text } from 'ink';
import type { JobContents } from '../output/index.js';
import { FormatterRegistry } from '../formatters/index.js';

interface JobScreenProps {
  job: string;
  contents: JobContents | null;
  error: Error | null;
}

export const JobScreen: React.FC<JobScreenProps> = ({ job, contents, error }) => {
  const formats = contents ? FormatterRegistry.getAvailableFormats().filter(format => contents[format] !== undefined) : [];

  return (
    <Box borderStyle="round" borderColor="cyan" flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          Transcription job {job}
        </Text>
      </Box>
      {error && <Text color="red">{error.message}</Text>}
      {!error && contents === null && <Text dimColor>Loading...</Text>}
      {contents && formats.length === 0 && <Text dimColor>No transcript files in this job</Text>}
      {formats.map(format => (
        <Box key={format} flexDirection="column" marginBottom={1}>
          <Text bold>[{format}]</Text>
          <Text>{(contents?.[format] ?? '').trimEnd()}</Text>
        </Box>
      ))}
    </Box>
  );
};
