import { useState, useEffect } from 'react';
import { Box, Text, useInput } from 'ink';
import { StepList } from '../components/StepList.js';
import { ConfirmPrompt } from '../components/ConfirmPrompt.js';
import { useBootstrapRun, idleSteps } from '../hooks/useBootstrapRun.js';
import { BootstrapSequencer } from '../../core/sequencer.js';
import type { ExecutionContext } from '../../core/context.js';
import type { BootstrapStep } from '../../core/steps.js';
import { errorMessage } from '../../core/errors.js';
import { describeCause } from '../../ui/format.js';
import type { Session } from '../session.js';

interface RunScreenProps {
  session: Extract<Session, { ok: true }>;
  onBack: () => void;
  onBusyChange: (busy: boolean) => void;
}

type RunPhase = 'confirming' | 'running' | 'done' | 'cancelled';

export function RunScreen({ session, onBack, onBusyChange }: RunScreenProps) {
  const [phase, setPhase] = useState<RunPhase>('confirming');
  const run = useBootstrapRun(idleSteps(session.steps));

  useInput(() => {
    if (phase === 'done' || phase === 'cancelled') {
      onBack();
    }
  });

  useEffect(() => {
    if (phase !== 'running') return;

    onBusyChange(true);
    const sequencer = new BootstrapSequencer<ExecutionContext, BootstrapStep>(session.steps, {
      onStepStart: (step) => run.start(step.name),
      onStepSucceeded: (step, durationMs) => run.succeed(step.name, durationMs),
      onStepFailed: (step, cause) => run.fail(step.name, cause),
    });

    void sequencer
      .run(session.context)
      .then(run.finish, (err: unknown) => run.crash(errorMessage(err)))
      .finally(() => {
        onBusyChange(false);
        setPhase('done');
      });
  }, [phase]);

  const handleConfirm = (yes: boolean) => {
    setPhase(yes ? 'running' : 'cancelled');
  };

  const { state } = run;
  const result = state.result;
  const failedStep = result?.status === 'aborted' ? session.steps[result.index] : undefined;

  return (
    <Box flexDirection="column">
      <StepList steps={state.steps} />

      {phase === 'confirming' && (
        <Box marginTop={1}>
          <ConfirmPrompt
            message={`Run all ${session.steps.length} steps in ${session.context.environment}?`}
            onConfirm={handleConfirm}
          />
        </Box>
      )}

      {phase === 'cancelled' && (
        <Box marginTop={1}>
          <Text color="yellow">Cancelled. Nothing was run.</Text>
        </Box>
      )}

      {result?.status === 'completed' && (
        <Box marginTop={1}>
          <Text color="green" bold>Bootstrap complete.</Text>
        </Box>
      )}

      {result?.status === 'aborted' && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="red" bold>
            {`Aborted at step ${result.index + 1}: ${failedStep?.label ?? result.step}`}
          </Text>
          {describeCause(result.cause).slice(1).map((line) => (
            <Text key={line} dimColor>{line}</Text>
          ))}
          {result.cause.output && (
            <Box flexDirection="column" marginTop={1}>
              <Text dimColor>Output (last lines):</Text>
              <Text>{result.cause.output}</Text>
            </Box>
          )}
          <Box marginTop={1}>
            <Text dimColor>Fix the cause and run again; every step runs from the top.</Text>
          </Box>
        </Box>
      )}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red">{state.error}</Text>
        </Box>
      )}

      {phase === 'done' || phase === 'cancelled' ? (
        <Box marginTop={1}>
          <Text dimColor>Press any key to return.</Text>
        </Box>
      ) : null}
    </Box>
  );
}
