import { Box, Text } from 'ink';

interface HeaderProps {
  environment?: string;
  screenTitle: string;
}

const DIVIDER = '\u2500'.repeat(40);

export function Header({ environment, screenTitle }: HeaderProps) {
  return (
    <Box flexDirection="column" paddingX={1}>
      <Box gap={1}>
        <Text bold color="cyan">deploy-bootstrap</Text>
        {environment && (
          <>
            <Text dimColor>{'\u00b7'}</Text>
            <Text>{environment}</Text>
          </>
        )}
        <Text dimColor>{'\u00b7'}</Text>
        <Text>{screenTitle}</Text>
      </Box>
      <Text dimColor>{DIVIDER}</Text>
    </Box>
  );
}
