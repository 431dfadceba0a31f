// Pattern matcher: picks the scenario rule that answers a prompt.
// Rules are tried in declaration order and the first hit wins.

import picomatch from 'picomatch';
import {
  type FailureSpec,
  type Pattern,
  type ResponseSpec,
  type Scenario,
  ScenarioError,
} from './scenario.js';

/**
 * What a rule produces once matched. Success and failure are exclusive.
 */
export type RuleOutcome =
  | { kind: 'respond'; response: ResponseSpec }
  | { kind: 'fail'; failure: FailureSpec };

export interface CompiledRule {
  /** Position in the scenario, or null for the fallback rule */
  index: number | null;
  pattern: Pattern;
  outcome: RuleOutcome;
  delayMs: number | null;
  maxMatches: number | null;
  test: (prompt: string) => boolean;
}

export interface CompiledScenario {
  rules: readonly CompiledRule[];
  fallback: CompiledRule;
}

export interface MatchResult {
  rule: CompiledRule;
  fallback: boolean;
}

/** How many times each rule index has matched so far */
export type MatchCounts = ReadonlyMap<number, number>;

// Prompts are not paths: picomatch's "anything but /" becomes any character
const PATH_CHAR = '[^/]';
const ANY_CHAR = '[\\s\\S]';

/**
 * Compile a glob against the whole prompt, with `*` and `?` crossing `/`
 */
export function globToRegExp(glob: string): RegExp {
  const re = picomatch.makeRe(glob, { bash: true, dot: true });
  return new RegExp(re.source.split(PATH_CHAR).join(ANY_CHAR), re.flags);
}

/**
 * Build the predicate for a pattern. Throws ScenarioError for patterns that
 * cannot compile so a bad scenario fails at load instead of mid-session.
 */
export function compilePattern(pattern: Pattern, ruleNumber: number): (prompt: string) => boolean {
  switch (pattern.type) {
    case 'contains': {
      const needle = pattern.text;
      return (prompt) => prompt.includes(needle);
    }
    case 'exact': {
      const expected = pattern.text;
      return (prompt) => prompt === expected;
    }
    case 'regex': {
      let re: RegExp;
      try {
        re = new RegExp(pattern.pattern);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ScenarioError('pattern', `Rule ${ruleNumber}: invalid regex "${pattern.pattern}": ${reason}`);
      }
      return (prompt) => re.test(prompt);
    }
    case 'glob': {
      let re: RegExp;
      try {
        re = globToRegExp(pattern.pattern);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ScenarioError('pattern', `Rule ${ruleNumber}: invalid glob "${pattern.pattern}": ${reason}`);
      }
      return (prompt) => re.test(prompt);
    }
    case 'any':
      return () => true;
    default: {
      const unreachable: never = pattern;
      throw new Error(`Unknown pattern ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Compile every rule of a scenario, plus the fallback built from default_response
 */
export function compileScenario(scenario: Scenario): CompiledScenario {
  const rules = scenario.responses.map((rule, index): CompiledRule => {
    let outcome: RuleOutcome;
    if (rule.failure !== undefined) {
      outcome = { kind: 'fail', failure: rule.failure };
    } else if (rule.response !== undefined) {
      outcome = { kind: 'respond', response: rule.response };
    } else {
      throw new ScenarioError('validation', `Rule ${index + 1}: no response or failure`);
    }
    return {
      index,
      pattern: rule.pattern,
      outcome,
      delayMs: rule.delay_ms ?? null,
      maxMatches: rule.max_matches ?? null,
      test: compilePattern(rule.pattern, index + 1),
    };
  });

  const fallback: CompiledRule = {
    index: null,
    pattern: { type: 'any' },
    outcome: { kind: 'respond', response: scenario.default_response },
    delayMs: null,
    maxMatches: null,
    test: () => true,
  };

  return { rules, fallback };
}

/**
 * Find the rule answering a prompt. Pure: the caller records the match.
 */
export function matchPrompt(prompt: string, compiled: CompiledScenario, counts: MatchCounts = new Map()): MatchResult {
  for (const rule of compiled.rules) {
    if (rule.index !== null && rule.maxMatches !== null && (counts.get(rule.index) ?? 0) >= rule.maxMatches) {
      continue;
    }
    if (rule.test(prompt)) {
      return { rule, fallback: false };
    }
  }
  return { rule: compiled.fallback, fallback: true };
}

/** Return counts with one more match recorded for the rule */
export function recordMatch(counts: MatchCounts, rule: CompiledRule): Map<number, number> {
  const next = new Map(counts);
  if (rule.index !== null) {
    next.set(rule.index, (next.get(rule.index) ?? 0) + 1);
  }
  return next;
}
