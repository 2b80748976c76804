import fs from 'node:fs/promises';
import { z } from 'zod';
import { APPROVAL_LEVELS, ApprovalRule } from '../actions/actionTypes.js';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';

export const approvalRuleSchema = z.object({
  level: z.enum(APPROVAL_LEVELS),
  approvers: z.array(z.string().min(1)).default([]),
  requireAll: z.boolean().default(false),
  timeoutHours: z.number().positive().default(24),
});

const approvalRulesFileSchema = z.object({
  rules: z.array(approvalRuleSchema),
});

export const parseApprovalRules = (raw: unknown): ApprovalRule[] => {
  const parsed = approvalRulesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DomainError(
      ErrorCode.ConfigInvalid,
      500,
      'Approval rules file is invalid.',
      parsed.error.flatten(),
    );
  }
  return parsed.data.rules;
};

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

/**
 * Load approval rules from a JSON file. A missing file means no rules:
 * every level then approves with a single sign-off.
 */
export async function loadApprovalRules(filePath: string): Promise<ApprovalRule[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw error;
  }
  return parseApprovalRules(JSON.parse(raw));
}
