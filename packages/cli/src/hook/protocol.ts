/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * PreToolUse hook protocol: one JSON request on stdin, the decision as an
 * exit code, with an optional JSON payload on stdout.
 */

import { z } from 'zod';
import { FatalInputError, getErrorMessage } from '@shellward/core';

export const EXIT_ALLOW = 0;
export const EXIT_ERROR = 1;
export const EXIT_BLOCK = 2;

export const HOOK_EVENT_NAME = 'PreToolUse';

export const HookInputSchema = z
  .object({
    session_id: z.string().optional(),
    transcript_path: z.string().optional(),
    cwd: z.string().optional(),
    hook_event_name: z.string().optional(),
    tool_name: z.string().min(1),
    tool_input: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type HookInput = z.infer<typeof HookInputSchema>;

export interface AskOutput {
  hookSpecificOutput: {
    hookEventName: typeof HOOK_EVENT_NAME;
    permissionDecision: 'ask';
    permissionDecisionReason: string;
  };
}

export function askOutput(reason: string): AskOutput {
  return {
    hookSpecificOutput: {
      hookEventName: HOOK_EVENT_NAME,
      permissionDecision: 'ask',
      permissionDecisionReason: reason,
    },
  };
}

/**
 * @throws FatalInputError for malformed JSON or a request that does not match
 * the protocol
 */
export function parseHookInput(text: string): HookInput {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new FatalInputError(
      `Invalid hook input: ${getErrorMessage(error)}`,
    );
  }

  const result = HookInputSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message,
      )
      .join(', ');
    throw new FatalInputError(`Invalid hook input: ${issues}`);
  }
  return result.data;
}
