import type { PlanDraft, PlanDraftStep, Route, RouterDecision, SupervisorDecision, ToolCall } from '../engine/types.js';
import { isRecord } from '../lib/json.js';

const ROUTES: readonly Route[] = ['chat', 'analysis', 'analysis_followup'];

function optionalString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function requiredString(record: Record<string, unknown>, key: string, context: string): string {
  const value = record[key];
  if (typeof value !== 'string' || !value.trim()) {
    throw new Error(`${context} requires a non-empty "${key}"`);
  }
  return value;
}

export function parseRouterDecision(value: Record<string, unknown>): RouterDecision {
  const route = ROUTES.find((candidate) => candidate === value.route);
  if (!route) {
    throw new Error(`route must be one of: ${ROUTES.join(', ')}`);
  }
  return { route, reasoning: optionalString(value.reasoning) };
}

export function parseSupervisorDecision(value: Record<string, unknown>): SupervisorDecision {
  if (typeof value.needs_analysis !== 'boolean') {
    throw new Error('supervision decision requires a boolean "needs_analysis"');
  }
  return { needsAnalysis: value.needs_analysis, reasoning: optionalString(value.reasoning) };
}

export function parsePlanDraft(value: Record<string, unknown>): PlanDraft {
  if (!Array.isArray(value.steps)) {
    throw new Error('plan requires a "steps" array');
  }
  const steps: PlanDraftStep[] = value.steps.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new Error(`plan step ${index + 1} is not an object`);
    }
    if (typeof entry.order !== 'number') {
      throw new Error(`plan step ${index + 1} requires a numeric "order"`);
    }
    return {
      order: entry.order,
      description: optionalString(entry.description),
      assignedAgent: optionalString(entry.assigned_agent) || 'general'
    };
  });
  return { summary: optionalString(value.summary), steps };
}

export function parseToolCall(value: Record<string, unknown>): ToolCall {
  switch (value.tool) {
    case 'execute_code':
      return { tool: 'execute_code', code: requiredString(value, 'code', 'execute_code'), rationale: optionalString(value.rationale) };
    case 'execute_shell':
      return { tool: 'execute_shell', command: requiredString(value, 'command', 'execute_shell').trim(), rationale: optionalString(value.rationale) };
    case 'reflect':
      return { tool: 'reflect', note: requiredString(value, 'note', 'reflect').trim() };
    case 'complete_step':
      return { tool: 'complete_step', summary: requiredString(value, 'summary', 'complete_step').trim() };
    default:
      throw new Error(`unknown tool: ${typeof value.tool === 'string' ? value.tool : JSON.stringify(value.tool ?? null)}`);
  }
}

export function parseReply(value: Record<string, unknown>): string {
  return requiredString(value, 'answer', 'reply').trim();
}
