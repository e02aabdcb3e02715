import { Box, Text, useInput } from 'ink';

interface ConfirmPromptProps {
  message: string;
  /** Enter means yes unless the action is destructive. */
  destructive?: boolean;
  onConfirm: (yes: boolean) => void;
}

export function ConfirmPrompt({ message, destructive = false, onConfirm }: ConfirmPromptProps) {
  useInput((input, key) => {
    if (key.return) {
      onConfirm(!destructive);
      return;
    }
    const lower = input.toLowerCase();
    if (lower === 'y') onConfirm(true);
    if (lower === 'n') onConfirm(false);
  });

  return (
    <Box gap={1}>
      <Text color={destructive ? 'red' : undefined}>{message}</Text>
      <Text dimColor>{destructive ? '[y/N]' : '[Y/n]'}</Text>
    </Box>
  );
}
