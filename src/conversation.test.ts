import { describe, expect, it } from 'vitest';
import {
  ConversationModel,
  describeToolCall,
  errorEntry,
  noticeEntry,
  promptEntry,
  responseEntry,
  shellEntry,
  toolCallEntry,
} from './conversation.js';

describe('ConversationModel', () => {
  it('should keep entries in append order', () => {
    const model = new ConversationModel();
    model.append(promptEntry('hello'));
    model.append(responseEntry('hi there'));

    expect(model.size).toBe(2);
    expect(model.entries().map((entry) => entry.kind)).toEqual(['prompt', 'response']);
    expect(model.last()).toEqual({ kind: 'response', source: 'assistant', text: 'hi there' });
  });

  it('should freeze appended entries', () => {
    const model = new ConversationModel();
    const entry = model.append(shellEntry('ls'));
    expect(Object.isFrozen(entry)).toBe(true);
  });

  it('should not expose its internal array', () => {
    const model = new ConversationModel();
    model.append(noticeEntry('one'));
    const snapshot = model.entries();
    model.append(noticeEntry('two'));
    expect(snapshot).toHaveLength(1);
  });

  it('should empty on clear', () => {
    const model = new ConversationModel();
    model.append(errorEntry('Error: No credits remaining', 'out_of_credits'));
    model.clear();
    expect(model.size).toBe(0);
    expect(model.last()).toBeNull();
  });

  it('should tag entries with their source', () => {
    expect(shellEntry('pwd').source).toBe('shell');
    expect(toolCallEntry('Bash', 'Bash(ls)', null).source).toBe('tool');
    expect(noticeEntry('Interrupted').source).toBe('system');
  });
});

describe('describeToolCall', () => {
  it('should label known tools by their main argument', () => {
    expect(describeToolCall({ tool: 'Bash', input: { command: 'npm test' } })).toBe('Bash(npm test)');
    expect(describeToolCall({ tool: 'Edit', input: { file_path: 'src/app.ts' } })).toBe('Update(src/app.ts)');
    expect(describeToolCall({ tool: 'Write', input: { file_path: 'notes.md' } })).toBe('Write(notes.md)');
    expect(describeToolCall({ tool: 'Read', input: { file_path: 'a.txt' } })).toBe('Read(a.txt)');
  });

  it('should fall back to the first string input for other tools', () => {
    expect(describeToolCall({ tool: 'Glob', input: { limit: 5, pattern: '**/*.ts' } })).toBe('Glob(**/*.ts)');
    expect(describeToolCall({ tool: 'TodoWrite', input: {} })).toBe('TodoWrite()');
  });
});
