import { v4 as uuidv4 } from 'uuid';

/**
 * Run ID format: YYYYMMDD-HHMMSS-GMT-{uuid4}
 * The timestamp is the run's start time in UTC, so IDs sort by start time.
 *
 * @param startedAt - When the run started
 * @returns Run ID in format YYYYMMDD-HHMMSS-GMT-{uuid4}
 *
 * @example
 * generateRunId(new Date("2026-02-22T14:30:27Z"))
 * // => "20260222-143027-GMT-a1b2c3d4-e5f6-7890-abcd-ef1234567890"
 */
export function generateRunId(startedAt: Date): string {
  if (isNaN(startedAt.getTime())) {
    throw new Error('Invalid run start time');
  }

  const year = startedAt.getUTCFullYear().toString();
  const month = (startedAt.getUTCMonth() + 1).toString().padStart(2, '0');
  const day = startedAt.getUTCDate().toString().padStart(2, '0');
  const hours = startedAt.getUTCHours().toString().padStart(2, '0');
  const minutes = startedAt.getUTCMinutes().toString().padStart(2, '0');
  const seconds = startedAt.getUTCSeconds().toString().padStart(2, '0');

  return `${year}${month}${day}-${hours}${minutes}${seconds}-GMT-${uuidv4()}`;
}
