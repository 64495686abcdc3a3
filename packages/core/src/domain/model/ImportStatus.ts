/**
 * Finite state machine for the import job lifecycle.
 *
 * Valid transitions:
 * - `pending` → `running` | `failed`
 * - `running` → `completed` | `failed`
 * - `completed`, `failed` → (terminal)
 *
 * `pending` → `failed` covers jobs rejected before any row is processed
 * (missing header columns, cancellation while queued).
 */
export const ImportStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type ImportStatus = (typeof ImportStatus)[keyof typeof ImportStatus];

const VALID_TRANSITIONS: Record<ImportStatus, readonly ImportStatus[]> = {
  [ImportStatus.PENDING]: [ImportStatus.RUNNING, ImportStatus.FAILED],
  [ImportStatus.RUNNING]: [ImportStatus.COMPLETED, ImportStatus.FAILED],
  [ImportStatus.COMPLETED]: [],
  [ImportStatus.FAILED]: [],
};

export const IMPORT_STATUSES: readonly ImportStatus[] = Object.values(ImportStatus);

/** Check whether a state transition is valid according to the import lifecycle FSM. */
export function canTransition(from: ImportStatus, to: ImportStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: ImportStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

export function isImportStatus(value: unknown): value is ImportStatus {
  return typeof value === 'string' && IMPORT_STATUSES.some((status) => status === value);
}
