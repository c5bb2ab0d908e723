import type { ExecutorRole, RoleKind, ToolName } from './types.js';

const FULL_TOOLS = ['execute_code', 'execute_shell', 'reflect', 'complete_step'] as const;
// Document and slide content is already in the step context, so these roles skip reflection.
const IN_CONTEXT_TOOLS = ['execute_code', 'execute_shell', 'complete_step'] as const;

export const ROLE_KINDS: readonly RoleKind[] = ['spreadsheet', 'code', 'general', 'document', 'presentation'];

export function roleFor(kind: RoleKind): ExecutorRole {
  switch (kind) {
    case 'spreadsheet':
      return { kind, tools: FULL_TOOLS };
    case 'code':
      return { kind, tools: FULL_TOOLS };
    case 'general':
      return { kind, tools: FULL_TOOLS };
    case 'document':
      return { kind, tools: IN_CONTEXT_TOOLS };
    case 'presentation':
      return { kind, tools: IN_CONTEXT_TOOLS };
  }
}

export function allowsTool(role: ExecutorRole, tool: ToolName): boolean {
  const tools: readonly ToolName[] = role.tools;
  return tools.includes(tool);
}

const AGENT_ALIASES: Record<string, RoleKind> = {
  spreadsheet: 'spreadsheet',
  excel: 'spreadsheet',
  csv: 'spreadsheet',
  data: 'spreadsheet',
  code: 'code',
  codebase: 'code',
  document: 'document',
  pdf: 'document',
  docx: 'document',
  presentation: 'presentation',
  powerpoint: 'presentation',
  slides: 'presentation',
  general: 'general'
};

/**
 * Maps a planner's free-form `assigned_agent` label onto a role; anything unknown becomes `general`.
 */
export function parseRoleKind(label: string): RoleKind {
  const normalized = label.trim().toLowerCase().replace(/[_\s-]*(agent|analyst|analysis)$/, '');
  return AGENT_ALIASES[normalized] ?? 'general';
}
