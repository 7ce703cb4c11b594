import { CadenceStep, OutreachCadence } from './contact';
import { IsoDate } from './opportunity';
import { ConsistencyViolation } from '../utils/errors';

export interface CadenceColumns {
  outreachDay0: IsoDate | null;
  outreachDay3: IsoDate | null;
  outreachDay7: IsoDate | null;
}

const NO_OUTREACH: OutreachCadence = { lastStep: null };

/**
 * Builds a cadence from the three stored columns.
 * Throws ConsistencyViolation when a later step is set without its predecessor
 * or when dates go backwards.
 */
export function cadenceFromColumns(columns: CadenceColumns, contactId?: number): OutreachCadence {
  const { outreachDay0: day0, outreachDay3: day3, outreachDay7: day7 } = columns;
  const where = contactId === undefined ? '' : ` for contact ${contactId}`;

  if (day0 === null) {
    if (day3 !== null || day7 !== null) {
      throw new ConsistencyViolation(`Follow-up recorded before first outreach${where}`);
    }
    return NO_OUTREACH;
  }
  if (day3 === null) {
    if (day7 !== null) {
      throw new ConsistencyViolation(`Day 7 follow-up recorded before Day 3${where}`);
    }
    return { lastStep: 'day0', day0 };
  }
  if (day3 < day0) {
    throw new ConsistencyViolation(`Day 3 follow-up dated before first outreach${where}`);
  }
  if (day7 === null) {
    return { lastStep: 'day3', day0, day3 };
  }
  if (day7 < day3) {
    throw new ConsistencyViolation(`Day 7 follow-up dated before Day 3${where}`);
  }
  return { lastStep: 'day7', day0, day3, day7 };
}

export function cadenceToColumns(cadence: OutreachCadence): CadenceColumns {
  switch (cadence.lastStep) {
    case null:
      return { outreachDay0: null, outreachDay3: null, outreachDay7: null };
    case 'day0':
      return { outreachDay0: cadence.day0, outreachDay3: null, outreachDay7: null };
    case 'day3':
      return { outreachDay0: cadence.day0, outreachDay3: cadence.day3, outreachDay7: null };
    case 'day7':
      return { outreachDay0: cadence.day0, outreachDay3: cadence.day3, outreachDay7: cadence.day7 };
  }
}

export function cadenceDate(cadence: OutreachCadence, step: CadenceStep): IsoDate | null {
  const columns = cadenceToColumns(cadence);
  switch (step) {
    case 'day0':
      return columns.outreachDay0;
    case 'day3':
      return columns.outreachDay3;
    case 'day7':
      return columns.outreachDay7;
  }
}

/**
 * Records `step` as sent on `date`.
 * Returns null when the step is already recorded; steps can only be taken in order.
 */
export function advanceCadence(
  cadence: OutreachCadence,
  step: CadenceStep,
  date: IsoDate
): OutreachCadence | null {
  if (cadenceDate(cadence, step) !== null) {
    return null;
  }

  switch (step) {
    case 'day0':
      return { lastStep: 'day0', day0: date };
    case 'day3':
      if (cadence.lastStep !== 'day0') {
        throw new ConsistencyViolation('Day 3 follow-up requires the first outreach to be sent');
      }
      return { lastStep: 'day3', day0: cadence.day0, day3: maxDate(cadence.day0, date) };
    case 'day7':
      if (cadence.lastStep !== 'day3') {
        throw new ConsistencyViolation('Day 7 follow-up requires the Day 3 follow-up to be sent');
      }
      return {
        lastStep: 'day7',
        day0: cadence.day0,
        day3: cadence.day3,
        day7: maxDate(cadence.day3, date),
      };
  }
}

function maxDate(a: IsoDate, b: IsoDate): IsoDate {
  return a > b ? a : b;
}
