import { useMemo, useState } from 'react';
import { Text, useApp } from 'ink';
import { useNavigation } from './hooks/useNavigation.js';
import { Layout } from './components/Layout.js';
import { MenuScreen } from './screens/MenuScreen.js';
import { RunScreen } from './screens/RunScreen.js';
import { PlanScreen } from './screens/PlanScreen.js';
import { loadSession } from './session.js';
import type { Screen } from './types.js';

const screenTitles: Record<Screen, string> = {
  menu: 'Menu',
  run: 'Run',
  plan: 'Plan',
};

export function App() {
  const nav = useNavigation();
  const { exit } = useApp();
  const [busy, setBusy] = useState(false);
  // Re-read on every return to the menu so edits to .bootstrap.json show up.
  const session = useMemo(() => loadSession(), [nav.current]);

  const renderScreen = () => {
    if (!session.ok && nav.current !== 'menu') {
      return <Text color="red">{session.error}</Text>;
    }
    switch (nav.current) {
      case 'menu':
        return <MenuScreen navigate={nav.navigate} configError={session.ok ? undefined : session.error} />;
      case 'run':
        return session.ok ? <RunScreen session={session} onBack={nav.goBack} onBusyChange={setBusy} /> : null;
      case 'plan':
        return session.ok ? <PlanScreen session={session} /> : null;
    }
  };

  return (
    <Layout
      title={screenTitles[nav.current]}
      environment={session.ok ? session.context.environment : undefined}
      onQuit={() => exit()}
      onBack={nav.goBack}
      busy={busy}
    >
      {renderScreen()}
    </Layout>
  );
}
