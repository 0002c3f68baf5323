import React, { useEffect, useState } from 'react';
import { Box, useApp } from 'ink';
import { ProcessingScreen } from './components/ProcessingScreen.js';
import { CompleteScreen } from './components/CompleteScreen.js';
import { HistoryScreen } from './components/HistoryScreen.js';
import { JobScreen } from './components/JobScreen.js';
import { useTranscriptionRun, type RunDependencies } from './hooks/useTranscriptionRun.js';
import type { TranscribeRequest } from './commands/transcribe.js';
import { listJobs, loadJob, type JobContents, type JobSummary } from './output/index.js';

interface TranscribeAppProps {
  request: TranscribeRequest;
  dependencies: RunDependencies;
}

export const TranscribeApp: React.FC<TranscribeAppProps> = ({ request, dependencies }) => {
  const { exit } = useApp();
  const run = useTranscriptionRun(request, dependencies);

  useEffect(() => {
    if (run.running) {
      return;
    }
    // Let the final frame render before unmounting
    const timer = setTimeout(() => exit(run.error ?? undefined), 0);
    return () => clearTimeout(timer);
  }, [run.running, run.error, exit]);

  if (run.running) {
    return (
      <Box borderStyle="round" borderColor="yellow" flexDirection="column">
        <ProcessingScreen
          spinnerSymbol={run.spinnerSymbol}
          audioPath={request.audioPath}
          statusMessages={run.statusMessages}
          warnings={run.warnings}
          {...(run.currentStage ? { currentStage: run.currentStage } : {})}
          completedStages={run.completedStages}
          elapsedTime={run.elapsedTime}
        />
      </Box>
    );
  }

  return <CompleteScreen result={run.result} error={run.error} elapsedTime={run.elapsedTime} />;
};

interface HistoryAppProps {
  outputRoot: string;
}

export const HistoryApp: React.FC<HistoryAppProps> = ({ outputRoot }) => {
  const { exit } = useApp();
  const [jobs, setJobs] = useState<JobSummary[] | null>(null);
  const [error, setError] = useState<Error | null>(null);

  useEffect(() => {
    listJobs(outputRoot)
      .then(setJobs)
      .catch((loadError: unknown) => {
        setError(loadError instanceof Error ? loadError : new Error(String(loadError)));
      });
  }, [outputRoot]);

  useEffect(() => {
    if (jobs === null && error === null) {
      return;
    }
    const timer = setTimeout(() => exit(error ?? undefined), 0);
    return () => clearTimeout(timer);
  }, [jobs, error, exit]);

  return <HistoryScreen outputRoot={outputRoot} jobs={jobs} error={error} />;
};

interface JobAppProps {
  outputRoot: string;
  job: string;
}

export const JobApp: React.FC<JobAppProps> = ({ outputRoot, job }) => {
  const { exit } = useApp();
  const [contents, setContents] = useState<JobContents | null>(null);
  const [error, setError] = useState<Error | null>(null);

  useEffect(() => {
    loadJob(outputRoot, job)
      .then(setContents)
      .catch((loadError: unknown) => {
        setError(loadError instanceof Error ? loadError : new Error(String(loadError)));
      });
  }, [outputRoot, job]);

  useEffect(() => {
    if (contents === null && error === null) {
      return;
    }
    const timer = setTimeout(() => exit(error ?? undefined), 0);
    return () => clearTimeout(timer);
  }, [contents, error, exit]);

  return <JobScreen job={job} contents={contents} error={error} />;
};
