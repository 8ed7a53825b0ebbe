import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const RequestLogContextSchema = z
  .object({
    correlation_id: z.string().min(1).max(128),
    request_id: z.string().min(1).max(128),
    method: z.string().min(1),
    route: z.string().min(1).optional(),
    path_params: z.record(z.string(), z.string()).optional()
  })
  .strict();

const MatchedRouteFieldsSchema = RequestLogContextSchema.pick({route: true, path_params: true});

export type RequestLogContext = z.infer<typeof RequestLogContextSchema>;
export type MatchedRouteFields = z.infer<typeof MatchedRouteFieldsSchema>;

const requestContexts = new AsyncLocalStorage<RequestLogContext>();

/** Every line logged while `operation` runs, sync or async, carries `context`. */
export const runWithLogContext = <T>(context: RequestLogContext, operation: () => T): T =>
  requestContexts.run(RequestLogContextSchema.parse(context), operation);

/**
 * Tags the running request with the route it matched. Outside of
 * `runWithLogContext` there is nothing to tag and the call does nothing.
 */
export const setLogContextFields = (fields: MatchedRouteFields): void => {
  const current = requestContexts.getStore();
  if (!current) {
    return;
  }

  const parsed = MatchedRouteFieldsSchema.parse(fields);
  if (parsed.route) {
    current.route = parsed.route;
  }
  if (parsed.path_params) {
    current.path_params = {...parsed.path_params};
  }
};

export const currentLogContext = (): Readonly<RequestLogContext> | undefined => requestContexts.getStore();
