import { Box, Text } from 'ink';

interface StatusLineProps {
  label: string;
  value: string;
  pad?: number;
  valueColor?: string;
}

export function StatusLine({ label, value, pad = 14, valueColor }: StatusLineProps) {
  return (
    <Box paddingLeft={1}>
      <Text dimColor>{label.padEnd(pad)}</Text>
      <Text color={valueColor}>{value}</Text>
    </Box>
  );
}
