import { firstOrderingViolation } from '../lib/ordering.js';
import { parseRoleKind } from './roles.js';
import type { PlanDraft, RoleKind, Step, StepStatus } from './types.js';

export class PlanContractError extends Error {}

const NEXT_STATUSES: Record<StepStatus, StepStatus[]> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed'],
  completed: [],
  failed: []
};

export type StepResult = {
  status: 'completed' | 'failed';
  resultSummary: string;
  error?: string | null;
  caveat?: string | null;
};

/**
 * Ordered list of steps created once from a planning draft. Steps are addressed by their `order`
 * and never reordered, added or removed; only status and result fields change, and only forward.
 */
export class Plan {
  private readonly steps: Step[];

  private constructor(readonly summary: string, steps: Step[]) {
    this.steps = steps;
  }

  static fromDraft(draft: PlanDraft, fallback: { query: string; role: RoleKind }): Plan {
    if (draft.steps.length === 0) {
      return new Plan(draft.summary, [createStep(1, fallback.query, fallback.role)]);
    }

    const orders = draft.steps.map((step) => step.order);
    if (orders.some((order) => !Number.isInteger(order))) {
      throw new PlanContractError('plan step order values must be integers');
    }
    const violation = firstOrderingViolation(orders);
    if (violation >= 0) {
      throw new PlanContractError(
        `plan step order must be strictly increasing and unique (order ${orders[violation]} follows ${orders[violation - 1]})`
      );
    }

    const steps = draft.steps.map((step) => {
      const description = step.description.trim();
      if (!description) {
        throw new PlanContractError(`plan step ${step.order} has an empty description`);
      }
      return createStep(step.order, description, parseRoleKind(step.assignedAgent));
    });
    return new Plan(draft.summary, steps);
  }

  nextPending(): Step | null {
    const step = this.steps.find((candidate) => candidate.status === 'pending');
    return step ? { ...step } : null;
  }

  get(order: number): Step {
    return { ...this.find(order) };
  }

  snapshot(): Step[] {
    return this.steps.map((step) => ({ ...step }));
  }

  finished(): Step[] {
    return this.steps.filter((step) => step.status === 'completed' || step.status === 'failed').map((step) => ({ ...step }));
  }

  start(order: number): Step {
    this.move(this.find(order), 'in_progress');
    return this.get(order);
  }

  record(order: number, result: StepResult): Step {
    const step = this.find(order);
    this.move(step, result.status);
    step.resultSummary = result.resultSummary;
    step.error = result.error ?? null;
    step.caveat = result.caveat ?? null;
    return { ...step };
  }

  private find(order: number): Step {
    const step = this.steps.find((candidate) => candidate.order === order);
    if (!step) {
      throw new Error(`no plan step with order ${order}`);
    }
    return step;
  }

  private move(step: Step, to: StepStatus): void {
    if (!NEXT_STATUSES[step.status].includes(to)) {
      throw new Error(`step ${step.order} cannot move from ${step.status} to ${to}`);
    }
    step.status = to;
  }
}

function createStep(order: number, description: string, role: RoleKind): Step {
  return { order, description, role, status: 'pending', resultSummary: '', error: null, caveat: null };
}
