/**
 * Handler Utilities
 *
 * WHY THIS FILE EXISTS:
 * - Gives every command the same error handling and logging
 * - Converts thrown errors into the { success: false, ... } response shape
 * - Validates request payloads against their zod schema before any work starts
 */

import { z } from 'zod';
import { Command, ErrorResponse, HandlerResult } from '../types/export';
import { HighlightReelError, InvalidRequestError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('HANDLER');

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof InvalidRequestError) {
    return {
      success: false,
      error: error.message,
      code: error.code,
      details: error.issues.map((issue) => `${issue.path || '(root)'}: ${issue.message}`).join('\n'),
    };
  }
  if (error instanceof HighlightReelError) {
    return { success: false, error: error.message, code: error.code, details: error.stack };
  }
  return {
    success: false,
    error: error instanceof Error ? error.message : 'Unknown error occurred',
    details: error instanceof Error ? error.stack : String(error),
  };
}

/**
 * Run a command with automatic error handling and logging
 *
 * @example
 * return runHandler<PlanSuccessResponse>(COMMANDS.PLAN, async () => {
 *   const { project } = parseRequest(planRequestSchema, request);
 *   ...
 * });
 */
export async function runHandler<T>(command: Command, handler: () => Promise<T>): Promise<HandlerResult<T>> {
  const startTime = Date.now();
  log.debug(`Incoming call to '${command}'`);
  try {
    const result = await handler();
    log.debug(`Call to '${command}' completed successfully (${Date.now() - startTime}ms)`);
    return result;
  } catch (error) {
    log.error(`Error in handler '${command}':`, error instanceof Error ? error.message : error);
    return toErrorResponse(error);
  }
}

/** Validate a payload, throwing InvalidRequestError with every zod issue */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, request: unknown): z.output<T> {
  const result = schema.safeParse(request);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const [first] = issues;
    throw new InvalidRequestError(
      first ? `Invalid request: ${first.path || '(root)'}: ${first.message}` : 'Invalid request',
      issues
    );
  }
  return result.data;
}
