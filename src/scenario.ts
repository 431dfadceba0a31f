/**
 * Scenario model and loader
 *
 * A scenario is the whole script of a run: ordered response rules, the fallback
 * response, the identity shown in the header and timing overrides. Files are
 * JSON, validated with zod before anything else sees them.
 */

import fs from 'node:fs';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RESPONSE_TEXT = "I'm a simulated assistant. No scenario rule matched your prompt.";
export const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
export const DEFAULT_PRODUCT_NAME = 'Understudy';
export const DEFAULT_PROVIDER = 'Claude Max';
export const DEFAULT_PLACEHOLDER = 'Try "write a test for scenario.ts"';

// ============================================================================
// Schemas
// ============================================================================

const PatternSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('contains'), text: z.string() }).strict(),
  z.object({ type: z.literal('exact'), text: z.string() }).strict(),
  z.object({ type: z.literal('regex'), pattern: z.string() }).strict(),
  z.object({ type: z.literal('glob'), pattern: z.string() }).strict(),
  z.object({ type: z.literal('any') }).strict(),
]);

const ToolCallSchema = z
  .object({
    tool: z.string().min(1),
    input: z.record(z.unknown()).default({}),
    result: z.string().optional(),
  })
  .strict();

const StreamSchema = z
  .object({
    chunk_size: z.number().int().positive(),
    interval_ms: z.number().int().nonnegative().default(0),
  })
  .strict();

const DetailedResponseSchema = z
  .object({
    text: z.string(),
    delay_ms: z.number().int().nonnegative().optional(),
    tool_calls: z.array(ToolCallSchema).default([]),
    stream: StreamSchema.optional(),
  })
  .strict();

const ResponseSchema = z.union([z.string(), DetailedResponseSchema]);

const FailureSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('network_unreachable') }).strict(),
  z.object({ type: z.literal('connection_timeout'), after_ms: z.number().int().nonnegative() }).strict(),
  z.object({ type: z.literal('auth_error'), message: z.string() }).strict(),
  z.object({ type: z.literal('rate_limit'), retry_after: z.number().int().nonnegative() }).strict(),
  z.object({ type: z.literal('out_of_credits') }).strict(),
  z.object({ type: z.literal('partial_response'), partial_text: z.string() }).strict(),
  z.object({ type: z.literal('malformed_json'), raw: z.string() }).strict(),
]);

const RuleSchema = z
  .object({
    pattern: PatternSchema,
    response: ResponseSchema.optional(),
    failure: FailureSchema.optional(),
    delay_ms: z.number().int().nonnegative().optional(),
    max_matches: z.number().int().positive().optional(),
  })
  .strict()
  .superRefine((rule, ctx) => {
    if ((rule.response === undefined) === (rule.failure === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a rule needs exactly one of "response" or "failure"',
      });
    }
  });

export const PermissionModeSchema = z.enum(['default', 'acceptEdits', 'plan', 'bypassPermissions']);

export const ScenarioSchema = z
  .object({
    name: z.string().default(''),
    default_response: ResponseSchema.default(DEFAULT_RESPONSE_TEXT),
    responses: z.array(RuleSchema).default([]),
    identity: z
      .object({
        model: z.string().min(1),
        product_name: z.string().min(1),
        version: z.string().min(1),
        provider: z.string().min(1),
        placeholder: z.string(),
      })
      .partial()
      .strict()
      .default({}),
    environment: z
      .object({
        working_directory: z.string().min(1),
        permission_mode: PermissionModeSchema,
      })
      .partial()
      .strict()
      .default({}),
    timeouts: z
      .object({
        exit_hint_ms: z.number().int().positive(),
        response_delay_ms: z.number().int().nonnegative(),
      })
      .partial()
      .strict()
      .default({}),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type Pattern = z.infer<typeof PatternSchema>;
export type ToolCallSpec = z.infer<typeof ToolCallSchema>;
export type StreamSpec = z.infer<typeof StreamSchema>;
export type DetailedResponse = z.infer<typeof DetailedResponseSchema>;
export type ResponseSpec = z.infer<typeof ResponseSchema>;
export type FailureSpec = z.infer<typeof FailureSchema>;
export type FailureKind = FailureSpec['type'];
export type RuleSpec = z.infer<typeof RuleSchema>;
export type PermissionMode = z.infer<typeof PermissionModeSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioInput = z.input<typeof ScenarioSchema>;

export type ScenarioErrorKind = 'io' | 'parse' | 'validation' | 'pattern';

/**
 * Configuration problem found while loading a scenario. Always fatal.
 */
export class ScenarioError extends Error {
  constructor(
    readonly kind: ScenarioErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'ScenarioError';
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate an already-parsed scenario value
 */
export function parseScenario(value: unknown, source: string = 'scenario'): Scenario {
  const result = ScenarioSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ScenarioError('validation', `Invalid ${source}: ${details}`);
  }
  return result.data;
}

/**
 * Read and validate a scenario JSON file
 */
export function loadScenario(filePath: string): Scenario {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ScenarioError('io', `Cannot read scenario ${filePath}: ${reason}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ScenarioError('parse', `Scenario ${filePath} is not valid JSON: ${reason}`);
  }

  return parseScenario(value, `scenario ${filePath}`);
}

/** Scenario used when none is given on the command line */
export function emptyScenario(): Scenario {
  return parseScenario({});
}

/** JSON Schema for scenario files, for editors and CI validation */
export function scenarioJsonSchema(): object {
  return zodToJsonSchema(ScenarioSchema, 'Scenario');
}

/** Text of a response, whichever form it was written in */
export function responseText(response: ResponseSpec): string {
  return typeof response === 'string' ? response : response.text;
}
