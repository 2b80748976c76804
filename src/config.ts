import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data');

export const config = {
  app: {
    name: 'savings-action-pipeline',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    dataDir,
    stateFile: process.env.STATE_FILE ?? path.join(dataDir, 'state.json'),
    logFile: process.env.LOG_FILE ?? path.join(dataDir, 'events.ndjson'),
    approvalRulesFile: process.env.APPROVAL_RULES_FILE ?? path.resolve(process.cwd(), 'config', 'approval-rules.json'),
  },
  approval: {
    requireApproval: parseBool(process.env.REQUIRE_APPROVAL, true),
    autoApproveGreen: parseBool(process.env.AUTO_APPROVE_GREEN, true),
    autoApproveYellow: parseBool(process.env.AUTO_APPROVE_YELLOW, true),
  },
  execution: {
    maxActionsPerRun: parseNumber(process.env.MAX_ACTIONS_PER_RUN, 50),
    dryRunByDefault: parseBool(process.env.DRY_RUN_BY_DEFAULT, true),
  },
  logging: {
    recentBufferSize: parseNumber(process.env.LOG_RECENT_BUFFER_SIZE, 500),
  },
};

export type AppConfig = typeof config;
