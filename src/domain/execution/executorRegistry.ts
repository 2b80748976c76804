import { ProposedAction } from '../actions/actionTypes.js';
import { ActionExecutor } from './executors/baseExecutor.js';
import { LogOnlyExecutor } from './executors/logOnlyExecutor.js';

/**
 * Executors in registration order. The first one that claims an action
 * handles it; anything unclaimed goes to the log-only fallback.
 */
export class ExecutorRegistry {
  private readonly executors: ActionExecutor[] = [];

  constructor(
    executors: ActionExecutor[] = [],
    private readonly fallback: ActionExecutor = new LogOnlyExecutor(),
  ) {
    for (const executor of executors) {
      this.register(executor);
    }
  }

  register(executor: ActionExecutor): void {
    this.executors.push(executor);
  }

  list(): ActionExecutor[] {
    return [...this.executors];
  }

  names(): string[] {
    return this.executors.map((e) => e.name);
  }

  get fallbackExecutor(): ActionExecutor {
    return this.fallback;
  }

  resolve(action: ProposedAction): ActionExecutor {
    return this.executors.find((executor) => executor.canHandle(action)) ?? this.fallback;
  }
}
