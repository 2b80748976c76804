import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadApprovalRules, parseApprovalRules } from '../src/domain/approval/approvalRules.js';
import { DomainError, ErrorCode } from '../src/errors/taxonomy.js';

describe('approval rules', () => {
  it('applies defaults to omitted fields', () => {
    expect(parseApprovalRules({ rules: [{ level: 'red' }] })).toEqual([
      { level: 'red', approvers: [], requireAll: false, timeoutHours: 24 },
    ]);
  });

  it('rejects an unknown level as a config error', () => {
    let caught: unknown;
    try {
      parseApprovalRules({ rules: [{ level: 'purple' }] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DomainError);
    expect(caught instanceof DomainError ? caught.code : null).toBe(ErrorCode.ConfigInvalid);
  });

  it('treats a missing file as no rules', async () => {
    expect(await loadApprovalRules(path.join(os.tmpdir(), 'no-such-dir', 'rules.json'))).toEqual([]);
  });

  it('loads the shipped rules file', async () => {
    const rules = await loadApprovalRules(path.resolve(process.cwd(), 'config', 'approval-rules.json'));

    expect(rules).toEqual([
      { level: 'red', approvers: ['controller@example.com'], requireAll: false, timeoutHours: 48 },
      { level: 'critical', approvers: ['cfo@example.com', 'ceo@example.com'], requireAll: true, timeoutHours: 72 },
    ]);
  });

  it('reads a rules file from disk', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pipeline-rules-'));
    const file = path.join(dir, 'rules.json');
    await fs.writeFile(file, JSON.stringify({ rules: [{ level: 'critical', approvers: ['a', 'b'], requireAll: true }] }));

    try {
      expect(await loadApprovalRules(file)).toEqual([
        { level: 'critical', approvers: ['a', 'b'], requireAll: true, timeoutHours: 24 },
      ]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
