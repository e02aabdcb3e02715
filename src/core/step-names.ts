/**
 * The bootstrap steps in the only order they may run in.
 * Each step may rely on everything before it having succeeded.
 */
export const STEP_NAMES = [
  'install',
  'collect-assets',
  'migrate',
  'init-platform-settings',
  'init-referral-settings',
] as const;

export type StepName = (typeof STEP_NAMES)[number];

export const STEP_LABELS: Record<StepName, string> = {
  install: 'Install dependencies',
  'collect-assets': 'Collect static assets',
  migrate: 'Apply schema migrations',
  'init-platform-settings': 'Initialize platform settings',
  'init-referral-settings': 'Initialize referral settings',
};
