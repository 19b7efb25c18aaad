/**
 * Run-scoped context for a scrape run.
 * The CLI runs each category inside this context so log lines can carry the
 * run ID without threading it through every call.
 */
import { AsyncLocalStorage } from 'async_hooks';

export interface RunContext {
  runId: string;
  category?: string;
}

const storage = new AsyncLocalStorage<RunContext>();

export function runWithRunContext<T>(context: RunContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getRunContext(): RunContext | undefined {
  return storage.getStore();
}
