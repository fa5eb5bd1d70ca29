/**
 * Request Context
 *
 * AsyncLocalStorage scope opened per inbound request, so records logged while
 * a health round runs carry the caller's correlation id.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContext {
  correlationId: string;
  service?: string;
  method?: string;
  path?: string;
}

const requestContext = new AsyncLocalStorage<RequestContext>();

export function getRequestContext(): RequestContext | undefined {
  return requestContext.getStore();
}

export function withRequestContext<T>(context: RequestContext, fn: () => T): T {
  return requestContext.run(context, fn);
}

export function newCorrelationId(): string {
  return randomUUID();
}
