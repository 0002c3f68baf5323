import React from 'react';
import { Box, Text } from 'ink';
import type { ProcessingStage, RunWarning } from '../types.js';
import { STAGE_ORDER, getStageInfo, formatDuration } from '../config/processingStages.js';

interface ProcessingScreenProps {
  spinnerSymbol: string;
  audioPath: string;
  statusMessages: string[];
  warnings: RunWarning[];
  currentStage?: ProcessingStage;
  completedStages?: ProcessingStage[];
  elapsedTime?: number;
}

export const ProcessingScreen: React.FC<ProcessingScreenProps> = ({
  spinnerSymbol,
  audioPath,
  statusMessages,
  warnings,
  currentStage,
  completedStages = [],
  elapsedTime,
}) => {
  const currentStageInfo = currentStage ? getStageInfo(currentStage) : null;

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="yellow">
          {spinnerSymbol} Transcribing {audioPath}
        </Text>
      </Box>

      {/* Stage Progress Bar */}
      {currentStage && (
        <Box flexDirection="column" marginBottom={1}>
          <Text bold>Progress:</Text>
          <Box>
            {STAGE_ORDER.map((stage, index) => {
              const stageInfo = getStageInfo(stage);
              const isCompleted = completedStages.includes(stage);
              const isCurrent = stage === currentStage;

              let symbol = '○';
              let color: 'green' | 'yellow' | 'gray' = 'gray';

              if (isCompleted) {
                symbol = stageInfo.icon;
                color = 'green';
              } else if (isCurrent) {
                symbol = stageInfo.icon;
                color = 'yellow';
              }

              return (
                <Text key={stage} color={color}>
                  {symbol}
                  {index < STAGE_ORDER.length - 1 ? ' → ' : ''}
                </Text>
              );
            })}
          </Box>
        </Box>
      )}

      {currentStageInfo && (
        <Box marginBottom={1} paddingX={1}>
          <Text bold color="cyan">
            {currentStageInfo.label}:
          </Text>
          <Text> {currentStageInfo.description}</Text>
        </Box>
      )}

      {elapsedTime !== undefined && (
        <Box marginBottom={1} paddingX={1}>
          <Text dimColor>Elapsed: </Text>
          <Text>{formatDuration(elapsedTime)}</Text>
        </Box>
      )}

      <Box flexDirection="column">
        {statusMessages.length === 0 ? (
          <Text dimColor>Please wait while we process your file...</Text>
        ) : (
          statusMessages.map((message, index) => (
            <Text key={`${message}-${index}`} dimColor>
              {message}
            </Text>
          ))
        )}
      </Box>

      {warnings.length > 0 && (
        <Box flexDirection="column" borderStyle="single" borderColor="yellow" paddingX={1} marginTop={1}>
          {warnings.map((warning, index) => (
            <Text key={`warning-${index}`} color="yellow">
              ⚠ {warning.message}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
};
