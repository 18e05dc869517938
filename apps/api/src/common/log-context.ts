// apps/api/src/common/log-context.ts
import { AsyncLocalStorage } from 'async_hooks';

/** Per-request fields every AppLogger line is tagged with. */
export interface LogContext {
  requestId: string;
  intent?: string;
}

const storage = new AsyncLocalStorage<LogContext>();

export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getLogContext(): LogContext | undefined {
  return storage.getStore();
}

/** Records which webhook intent the current request is serving. */
export function tagIntent(intent: string): void {
  const context = storage.getStore();
  if (context) context.intent = intent;
}

/** `[reqId=abc intent=PlaceOrder]`, or undefined outside a request. */
export function formatLogTag(context = storage.getStore()): string | undefined {
  if (!context) return undefined;
  const fields = [`reqId=${context.requestId}`];
  if (context.intent) fields.push(`intent=${context.intent}`);
  return `[${fields.join(' ')}]`;
}
