/**
 * Finite state machine for the lifecycle of a loader run.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING`
 * - `RUNNING` → `PAUSED` | `COMPLETED` | `FAILED`
 * - `PAUSED` → `RUNNING`
 * - `FAILED` → `RUNNING` (retry from the last checkpoint)
 * - `COMPLETED` → (terminal)
 */
export const RunStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  PAUSED: 'PAUSED',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.CREATED]: [RunStatus.RUNNING],
  [RunStatus.RUNNING]: [RunStatus.PAUSED, RunStatus.COMPLETED, RunStatus.FAILED],
  [RunStatus.PAUSED]: [RunStatus.RUNNING],
  [RunStatus.FAILED]: [RunStatus.RUNNING],
  [RunStatus.COMPLETED]: [],
};

/** Check whether a state transition is valid according to the run lifecycle FSM. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Type guard for run status values read from storage. */
export function isRunStatus(value: unknown): value is RunStatus {
  return typeof value === 'string' && Object.values<string>(RunStatus).includes(value);
}
