export type Screen = 'menu' | 'run' | 'plan';

export type TaskStatus = 'idle' | 'running' | 'success' | 'error';

export interface TaskStep {
  name: string;
  label: string;
  status: TaskStatus;
  detail?: string;
}
