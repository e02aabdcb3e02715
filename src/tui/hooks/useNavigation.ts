import { useState, useCallback } from 'react';
import type { Screen } from '../types.js';

/**
 * Every screen is one level below the menu, so "back" always means the menu.
 */
export function useNavigation() {
  const [current, setCurrent] = useState<Screen>('menu');

  const navigate = useCallback((screen: Screen) => {
    setCurrent(screen);
  }, []);

  const goBack = useCallback(() => {
    setCurrent('menu');
  }, []);

  return { current, navigate, goBack };
}
