import { IsoDate, OpenStage, Stage } from '../types/opportunity';
import { addDays } from '../utils/dates';

interface NextActionRule {
  action: string;
  days: number;
}

export const NEXT_ACTION_POLICY: Record<OpenStage, NextActionRule> = {
  'Prospect': { action: 'Research company and find a contact', days: 3 },
  'Warm Lead': { action: 'Follow up with warm contact', days: 2 },
  'Applied': { action: 'Check application status', days: 7 },
  'Recruiter Screen': { action: 'Send thank-you and confirm next steps', days: 2 },
  'HM Interview': { action: 'Send thank-you to hiring manager', days: 2 },
  'Loop': { action: 'Follow up on loop feedback', days: 3 },
  'Offer Pending': { action: 'Decide on offer', days: 2 },
};

export interface NextAction {
  nextAction: string | null;
  nextActionDate: IsoDate | null;
}

/**
 * Next action for an opportunity entering `stage` on `from`; Closed clears it
 */
export function nextActionFor(stage: Stage, from: IsoDate): NextAction {
  if (stage === 'Closed') {
    return { nextAction: null, nextActionDate: null };
  }
  const rule = NEXT_ACTION_POLICY[stage];
  return { nextAction: rule.action, nextActionDate: addDays(from, rule.days) };
}
