/**
 * Finite state machine for a read operation.
 *
 * Valid transitions:
 * - `CREATED` → `READING`
 * - `READING` → `COMPLETED` | `ABORTED` | `FAILED`
 * - `COMPLETED`, `ABORTED`, `FAILED` → (terminal)
 *
 * `ABORTED` is a `failfast` stop on malformed data; `FAILED` is an error from
 * the source or tokenizer.
 */
export const ReadStatus = {
  CREATED: 'CREATED',
  READING: 'READING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type ReadStatus = (typeof ReadStatus)[keyof typeof ReadStatus];

const VALID_TRANSITIONS: Record<ReadStatus, readonly ReadStatus[]> = {
  [ReadStatus.CREATED]: [ReadStatus.READING],
  [ReadStatus.READING]: [ReadStatus.COMPLETED, ReadStatus.ABORTED, ReadStatus.FAILED],
  [ReadStatus.COMPLETED]: [],
  [ReadStatus.ABORTED]: [],
  [ReadStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the read lifecycle FSM. */
export function canTransition(from: ReadStatus, to: ReadStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
