/**
 * Economic-activity classification codes.
 *
 * The activity search takes one code per classification level: 2 digits
 * for a sector, 3 for a subsector, 4 for a rama, 6 for a clase.
 */

import { err, ok, type Result } from 'neverthrow';

import { createInvalidParameterError, type InvalidParameterError } from '@/common/types/errors.js';

import type { ActivityCode, ActivityLevel } from './types.js';

const LEVEL_BY_LENGTH: Readonly<Record<number, ActivityLevel>> = {
  2: 'sector',
  3: 'subsector',
  4: 'rama',
  6: 'clase',
};

/** Blank and '0' mean every activity (null) */
export const parseActivityCode = (
  raw: string,
  field = 'actividad_economica'
): Result<ActivityCode | null, InvalidParameterError> => {
  const code = raw.trim();
  if (code === '' || code === '0') {
    return ok(null);
  }
  if (!/^\d+$/.test(code)) {
    return err(createInvalidParameterError(field, `Activity code '${raw}' must be numeric`));
  }

  const level = LEVEL_BY_LENGTH[code.length];
  if (level === undefined) {
    return err(
      createInvalidParameterError(
        field,
        `Activity code '${code}' must have 2 (sector), 3 (subsector), 4 (rama) or 6 (clase) digits`
      )
    );
  }
  return ok({ level, code });
};

/** Path slots of the activity search, in sector/subsector/rama/clase order */
export const activitySlots = (activity: ActivityCode | null): [string, string, string, string] => {
  const slot = (level: ActivityLevel): string =>
    activity !== null && activity.level === level ? activity.code : '0';
  return [slot('sector'), slot('subsector'), slot('rama'), slot('clase')];
};
