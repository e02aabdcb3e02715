import { Box, Text, useApp } from 'ink';
import SelectInput from 'ink-select-input';
import type { Screen } from '../types.js';

interface MenuScreenProps {
  navigate: (screen: Screen) => void;
  configError?: string;
}

type MenuValue = Screen | 'exit';

interface MenuItem {
  label: string;
  value: MenuValue;
}

export function MenuScreen({ navigate, configError }: MenuScreenProps) {
  const { exit } = useApp();

  const items: MenuItem[] = [];
  if (!configError) {
    items.push(
      { label: 'Run               Execute the bootstrap sequence', value: 'run' },
      { label: 'Plan              Show steps and commands (dry run)', value: 'plan' },
    );
  }
  items.push({ label: 'Exit              Quit deploy-bootstrap', value: 'exit' });

  const handleSelect = (item: { label: string; value: MenuValue }) => {
    if (item.value === 'exit') {
      exit();
      return;
    }
    navigate(item.value);
  };

  return (
    <Box flexDirection="column">
      {configError ? (
        <Box flexDirection="column">
          <Text color="red">Invalid configuration</Text>
          <Text dimColor>{configError}</Text>
        </Box>
      ) : (
        <Text bold>What would you like to do?</Text>
      )}
      <Box marginTop={1}>
        <SelectInput items={items} onSelect={handleSelect} />
      </Box>
    </Box>
  );
}
