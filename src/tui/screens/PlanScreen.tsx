import { Box, Text } from 'ink';
import { describeCommand } from '../../collaborators/command.js';
import { StatusLine } from '../components/StatusLine.js';
import type { Session } from '../session.js';

interface PlanScreenProps {
  session: Extract<Session, { ok: true }>;
}

export function PlanScreen({ session }: PlanScreenProps) {
  const { config, context, steps } = session;

  return (
    <Box flexDirection="column">
      <StatusLine label="Environment" value={context.environment} />
      <StatusLine label="Directory" value={context.cwd} />
      <StatusLine label="Env files" value={config.envFiles.join(', ') || '(none)'} />
      <Box flexDirection="column" marginTop={1}>
        {steps.map((step) => (
          <Box key={step.name} flexDirection="column">
            <Box gap={1}>
              <Text dimColor>{`${step.position + 1}.`}</Text>
              <Text bold>{step.label}</Text>
              <Text dimColor>{`(${step.name})`}</Text>
            </Box>
            <Box paddingLeft={3}>
              <Text color="cyan">{`$ ${describeCommand(step.command)}`}</Text>
            </Box>
          </Box>
        ))}
      </Box>
      <Box marginTop={1}>
        <Text dimColor>Nothing is executed from this screen.</Text>
      </Box>
    </Box>
  );
}
