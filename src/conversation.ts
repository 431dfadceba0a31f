// Append-only conversation transcript. Entries are frozen when appended;
// the only other mutation is clearing the whole log (/clear).

import type { FailureKind, ToolCallSpec } from './scenario.js';

/**
 * Where an entry came from. Picks the prefix glyph when rendering.
 */
export type EntrySource = 'user' | 'shell' | 'assistant' | 'tool' | 'system';

export type ConversationEntry =
  | { kind: 'prompt'; source: 'user'; text: string }
  | { kind: 'shell'; source: 'shell'; text: string }
  | { kind: 'tool-call'; source: 'tool'; text: string; tool: string; result: string | null }
  | { kind: 'response'; source: 'assistant'; text: string }
  | { kind: 'error'; source: 'assistant'; text: string; failure: FailureKind }
  | { kind: 'notice'; source: 'system'; text: string };

export class ConversationModel {
  private log: Readonly<ConversationEntry>[] = [];

  /** Append an entry; it can no longer change afterwards */
  append(entry: ConversationEntry): Readonly<ConversationEntry> {
    const frozen = Object.freeze({ ...entry });
    this.log.push(frozen);
    return frozen;
  }

  entries(): readonly Readonly<ConversationEntry>[] {
    return this.log.slice();
  }

  last(): Readonly<ConversationEntry> | null {
    return this.log.length > 0 ? this.log[this.log.length - 1] : null;
  }

  clear(): void {
    this.log = [];
  }

  get size(): number {
    return this.log.length;
  }
}

// ============================================================================
// Entry constructors
// ============================================================================

export function promptEntry(text: string): ConversationEntry {
  return { kind: 'prompt', source: 'user', text };
}

export function shellEntry(command: string): ConversationEntry {
  return { kind: 'shell', source: 'shell', text: command };
}

export function responseEntry(text: string): ConversationEntry {
  return { kind: 'response', source: 'assistant', text };
}

export function errorEntry(text: string, failure: FailureKind): ConversationEntry {
  return { kind: 'error', source: 'assistant', text, failure };
}

export function noticeEntry(text: string): ConversationEntry {
  return { kind: 'notice', source: 'system', text };
}

export function toolCallEntry(tool: string, text: string, result: string | null): ConversationEntry {
  return { kind: 'tool-call', source: 'tool', tool, text, result };
}

/**
 * One-line label for a tool call, e.g. "Bash(npm test)" or "Update(src/app.ts)"
 */
export function describeToolCall(call: ToolCallSpec): string {
  const str = (key: string): string | null => {
    const value = call.input[key];
    return typeof value === 'string' ? value : null;
  };

  switch (call.tool) {
    case 'Bash':
      return `Bash(${str('command') ?? ''})`;
    case 'Edit':
      return `Update(${str('file_path') ?? ''})`;
    case 'Write':
    case 'Read':
      return `${call.tool}(${str('file_path') ?? ''})`;
    default: {
      const first = Object.values(call.input).find((value): value is string => typeof value === 'string');
      return `${call.tool}(${first ?? ''})`;
    }
  }
}
