/**
 * Access request construction.
 */

import { z } from 'zod';
import { accessRequestBodySchema } from '@ztgate/shared';
import { MalformedRequestError } from '../errors.js';
import type { AccessRequest } from '../types.js';

/**
 * Raw request fields as supplied by a caller. `requestTime` is for trusted
 * in-process callers (operator CLI, tests); the HTTP body never carries it.
 */
export interface AccessRequestInput {
  user: string;
  action: string;
  resource: string;
  sourceIP: string;
  deviceId: string;
  requestTime?: Date | string;
}

const accessRequestInputSchema = accessRequestBodySchema.extend({
  requestTime: z.coerce.date().optional(),
});

/**
 * Validate and freeze an access request. Accepts an AccessRequestInput or
 * any untrusted value, such as a parsed HTTP body. Without a `requestTime`
 * the request is stamped with `now()`.
 *
 * @throws MalformedRequestError when a field is missing, empty or not a string
 */
export function createAccessRequest(input: unknown, now: () => Date = () => new Date()): AccessRequest {
  const result = accessRequestInputSchema.safeParse(input);

  if (!result.success) {
    throw new MalformedRequestError(
      result.error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }

  const { user, action, resource, sourceIP, deviceId, requestTime } = result.data;

  return Object.freeze({
    user,
    action,
    resource,
    sourceIP,
    deviceId,
    requestTime: new Date(requestTime ?? now()),
  });
}
