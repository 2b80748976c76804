import { AppState } from '../../types.js';
import { isoNow } from '../../utils/time.js';

export const createDefaultState = (): AppState => ({
  actions: {},
  decisions: [],
  executionLog: [],
  notifications: [],
  metrics: {
    startedAt: isoNow(),
    actionsProposed: 0,
    actionsApproved: 0,
    actionsRejected: 0,
    executionsRecorded: 0,
    rollbacksRecorded: 0,
  },
});
