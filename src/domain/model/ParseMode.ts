import { ReadConfigError } from '../errors/ReadErrors.js';

/** How malformed records affect the output stream. */
export const ParseMode = {
  /** Malformed records become all-null rows (raw text kept in the corrupt-record slot). */
  PERMISSIVE: 'permissive',
  /** Malformed records are suppressed. */
  DROP_MALFORMED: 'dropmalformed',
  /** The first malformed record aborts the read. */
  FAIL_FAST: 'failfast',
} as const;

export type ParseMode = (typeof ParseMode)[keyof typeof ParseMode];

const MODES: readonly ParseMode[] = Object.values(ParseMode);

/** Resolve a mode option, case-insensitively. Throws `ReadConfigError` on unknown names. */
export function parseMode(value: string): ParseMode {
  const normalized = value.trim().toLowerCase();
  const mode = MODES.find((m) => m === normalized);
  if (!mode) {
    throw new ReadConfigError(`Unknown parse mode '${value}'. Expected one of: ${MODES.join(', ')}`);
  }
  return mode;
}
