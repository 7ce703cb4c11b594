import { Store } from '../db/store';
import { parseEnum } from '../types/enums';
import { CLOSE_REASONS, Opportunity, STAGES, StageState } from '../types/opportunity';
import { Clock, systemClock, toIsoDate } from '../utils/dates';
import { NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { Ledger } from './ledger';
import { nextActionFor } from './next-action-policy';

export interface TransitionOptions {
  /** Required when moving to Closed, rejected otherwise */
  closeReason?: string;
  note?: string;
}

const log = logger.child('stage-machine');

/**
 * Applies opportunity stage changes.
 * Any stage may follow any other so mistakes can be corrected by moving back.
 */
export class StageMachine {
  constructor(
    private store: Store,
    private ledger: Ledger,
    private clock: Clock = systemClock
  ) {}

  /**
   * Moves an opportunity to `targetStage`, recomputes its next action and logs
   * the change, all in one transaction
   */
  async transition(
    opportunityId: number,
    targetStage: string,
    options: TransitionOptions = {}
  ): Promise<Opportunity> {
    const today = toIsoDate(this.clock.now());
    const state = this.resolveState(targetStage, options.closeReason, today);

    const updated = await this.store.withTransaction(async (repos) => {
      const current = await repos.opportunities.findById(opportunityId);
      if (!current) {
        throw new NotFoundError('Opportunity', opportunityId);
      }

      const dateApplied = state.stage === 'Applied' && current.dateApplied === null
        ? today
        : current.dateApplied;
      await repos.opportunities.updateStage(opportunityId, state, dateApplied);

      const { nextAction, nextActionDate } = nextActionFor(state.stage, today);
      const result = await repos.opportunities.updateNextAction(opportunityId, nextAction, nextActionDate);

      await this.ledger.record(repos, {
        activityType: 'Stage Change',
        opportunityId,
        description: `${current.stage} → ${state.stage}${options.note ? `: ${options.note}` : ''}`,
        metadata: {
          from: current.stage,
          to: state.stage,
          ...(state.closeReason ? { closeReason: state.closeReason } : {}),
          ...(options.note ? { note: options.note } : {}),
        },
      });

      return result;
    });

    log.info('Stage changed', { opportunityId, stage: updated.stage });
    return updated;
  }

  private resolveState(targetStage: string, closeReason: string | undefined, today: string): StageState {
    const stage = parseEnum(STAGES, targetStage, 'stage');

    if (stage === 'Closed') {
      if (!closeReason) {
        throw new ValidationError(
          `Closing requires a close reason: ${CLOSE_REASONS.join(', ')}`
        );
      }
      return {
        stage,
        closeReason: parseEnum(CLOSE_REASONS, closeReason, 'close reason'),
        dateClosed: today,
      };
    }

    if (closeReason) {
      throw new ValidationError(`A close reason only applies to the Closed stage, not ${stage}`);
    }
    return { stage, closeReason: null, dateClosed: null };
  }
}
