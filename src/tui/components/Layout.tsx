import { Box, Text, useInput } from 'ink';
import { Header } from './Header.js';

interface Hint {
  key: string;
  label: string;
}

interface LayoutProps {
  title: string;
  environment?: string;
  children: React.ReactNode;
  hints?: Hint[];
  onQuit: () => void;
  onBack: () => void;
  /** While a step is in flight, quitting would orphan its child process. */
  busy?: boolean;
}

const DEFAULT_HINTS: Hint[] = [
  { key: 'esc', label: 'Back' },
  { key: 'q', label: 'Quit' },
];

const BUSY_HINTS: Hint[] = [{ key: '…', label: 'Running, wait for the current step' }];

export function Layout({ title, environment, children, hints, onQuit, onBack, busy = false }: LayoutProps) {
  useInput((input, key) => {
    if (busy) return;
    if (input === 'q') {
      onQuit();
    }
    if (key.escape) {
      onBack();
    }
  });

  const footerHints = busy ? BUSY_HINTS : hints ?? DEFAULT_HINTS;

  return (
    <Box flexDirection="column" flexGrow={1}>
      <Header screenTitle={title} environment={environment} />
      <Box flexDirection="column" flexGrow={1} paddingX={2}>
        {children}
      </Box>
      <Box flexDirection="column" paddingX={1}>
        <Text dimColor>{'─'.repeat(40)}</Text>
        <Box gap={2}>
          {footerHints.map((hint) => (
            <Box key={hint.key} gap={1}>
              <Text bold>{hint.key}</Text>
              <Text dimColor>{hint.label}</Text>
            </Box>
          ))}
        </Box>
      </Box>
    </Box>
  );
}
