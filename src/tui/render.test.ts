import { describe, expect, it } from 'vitest';
import { noticeEntry, promptEntry, responseEntry, shellEntry, toolCallEntry } from '../conversation.js';
import type { PermissionRequest } from '../permission.js';
import { createInputState } from './input.js';
import { type Line, layoutLines, type RenderView, renderFrame } from './render.js';

function makeView(overrides: Partial<RenderView> = {}): RenderView {
  return {
    identity: {
      productName: 'Understudy',
      version: '1.0.0',
      modelId: 'claude-sonnet-4-5-20250929',
      modelDisplayName: 'Sonnet 4.5',
      provider: 'Claude Max',
      workingDirectory: '~/demo',
      placeholder: 'Try "hi"',
    },
    entries: [],
    streaming: '',
    input: createInputState(),
    mode: { kind: 'normal' },
    permissionMode: 'default',
    hint: null,
    thinking: null,
    now: 0,
    ...overrides,
  };
}

function lineText(line: Line): string {
  return line.runs.map((run) => run.text).join('');
}

function texts(view: RenderView, width = 40): string[] {
  return layoutLines(view, width).map(lineText);
}

function inputWith(buffer: string): RenderView['input'] {
  const input = createInputState();
  input.buffer = buffer;
  input.cursor = Array.from(buffer).length;
  return input;
}

describe('renderFrame', () => {
  it('should draw the header, placeholder and status line on an empty session', () => {
    const grid = renderFrame(makeView(), { width: 40, height: 12 });

    expect(grid.toText().split('\n')).toEqual([
      '',
      ' ▐▛███▜▌   Understudy v1.0.0',
      '▝▜█████▛▘  Sonnet 4.5 · Claude Max',
      '  ▘▘ ▝▝    ~/demo',
      '',
      '─'.repeat(40),
      '❯ Try "hi"',
      '─'.repeat(40),
      '  ? for shortcuts',
      '',
      '',
      '',
    ]);
  });

  it('should draw the cursor inverse', () => {
    const grid = renderFrame(makeView(), { width: 40, height: 12 });
    expect(grid.cellAt(2, 6)).toEqual({ char: 'T', style: { fg: null, bold: false, dim: true, inverse: true } });
  });

  it('should scroll the top off when content is taller than the screen', () => {
    const grid = renderFrame(makeView(), { width: 40, height: 5 });
    expect(grid.rowText(0)).toBe('');
    expect(grid.rowText(2)).toBe('❯ Try "hi"');
    expect(grid.rowText(4)).toBe('  ? for shortcuts');
  });

  it('should scroll long input to keep the cursor visible', () => {
    const view = makeView({ input: inputWith('abcdefghijklmnopqrstuvwxyz') });
    const grid = renderFrame(view, { width: 20, height: 12 });

    expect(grid.rowText(6)).toBe('❯ jklmnopqrstuvwxyz');
    expect(grid.cellAt(19, 6).style.inverse).toBe(true);
  });
});

describe('layoutLines', () => {
  describe('transcript', () => {
    it('should prefix entries and separate them with blank lines', () => {
      const view = makeView({
        entries: [
          promptEntry('hello'),
          toolCallEntry('Bash', 'Bash(ls)', 'a.txt'),
          responseEntry('done'),
          noticeEntry('Interrupted'),
        ],
      });

      expect(texts(view).slice(5, 13)).toEqual([
        '❯ hello',
        '',
        '⏺ Bash(ls)',
        '  ⎿  a.txt',
        '',
        '⏺ done',
        '  ⎿  Interrupted',
        '',
      ]);
    });

    it('should echo shell commands with the shell marker', () => {
      expect(texts(makeView({ entries: [shellEntry('ls -la')] }))[5]).toBe('❯ \\!ls -la');
    });

    it('should indent wrapped continuation lines under the prefix', () => {
      const view = makeView({ entries: [responseEntry('alpha beta gamma')] });
      expect(texts(view, 12).slice(5, 7)).toEqual(['⏺ alpha beta', '  gamma']);
    });

    it('should show the spinner while thinking', () => {
      const view = makeView({
        entries: [promptEntry('go')],
        mode: { kind: 'thinking' },
        thinking: { startedAt: 0, verbIndex: 1 },
        now: 250,
      });
      expect(texts(view)[7]).toBe('* Computing… (ctrl+c to interrupt)');
    });

    it('should show streamed text instead of the spinner', () => {
      const view = makeView({
        entries: [promptEntry('go')],
        mode: { kind: 'thinking' },
        thinking: { startedAt: 0, verbIndex: 0 },
        streaming: 'partial',
      });
      expect(texts(view)[7]).toBe('⏺ partial');
    });
  });

  describe('input block', () => {
    it('should drop the placeholder once there is a transcript', () => {
      const lines = texts(makeView({ entries: [promptEntry('x')] }));
      expect(lines[lines.length - 3]).toBe('❯ ');
    });

    it('should show the shell prompt and hint in shell mode', () => {
      const lines = texts(makeView({ mode: { kind: 'shell' }, input: inputWith('ls') }));
      expect(lines[lines.length - 3]).toBe('! ls');
      expect(lines[lines.length - 1]).toBe('  ! for bash mode');
    });

    it('should show an active exit hint', () => {
      const lines = texts(makeView({ hint: { kind: 'ctrl-c', shownAt: 0 } }));
      expect(lines[lines.length - 1]).toBe('  Press Ctrl-C again to exit');
    });

    it('should show the permission mode', () => {
      const lines = texts(makeView({ permissionMode: 'acceptEdits' }));
      expect(lines[lines.length - 1]).toBe('  ⏵⏵ accept edits on (shift+tab to cycle)');
      const plan = texts(makeView({ permissionMode: 'plan' }));
      expect(plan[plan.length - 1]).toBe('  ⏸ plan mode on (shift+tab to cycle)');
    });

    it('should show the stash indicator above the input', () => {
      const input = createInputState();
      input.stash = 'parked';
      expect(texts(makeView({ input }))[5]).toBe('  › Stashed (auto-restores after submit)');
    });

    it('should replace the status line with the shortcuts panel', () => {
      const lines = texts(makeView({ mode: { kind: 'shortcuts' } }));
      const panel = lines.slice(-6);
      expect(panel[0]).toBe(
        '  ! for bash mode         double tap esc to clear input      ctrl + _ to undo',
      );
      expect(panel[5]).toBe(`${' '.repeat(26)}newline`);
      expect(lines).not.toContain('  ? for shortcuts');
    });
  });

  describe('dialogs', () => {
    it('should draw the bash permission dialog', () => {
      const request: PermissionRequest = {
        kind: 'bash',
        tool: 'Bash',
        target: 'npm test',
        call: { tool: 'Bash', input: { command: 'npm test' } },
        selected: 0,
      };
      const lines = texts(makeView({ mode: { kind: 'permission', request } }), 30);

      expect(lines.slice(5)).toEqual([
        '─'.repeat(30),
        ' Bash command',
        '',
        '   npm test',
        '',
        ' Do you want to proceed?',
        ' ❯ 1. Yes',
        "   2. Yes, and don't ask again for Bash commands this session",
        '   3. No',
        '',
        ' Esc to cancel',
      ]);
    });

    it('should draw the model picker with the current model ticked', () => {
      const lines = texts(makeView({ mode: { kind: 'model-picker', selected: 1 } }));

      expect(lines.slice(6, 8)).toEqual([' Select model', ' Switch between models for this session.']);
      expect(lines[9]).toBe('   1. Default (recommended) ✔  Sonnet 4.5 · Best for everyday tasks');
      expect(lines[10]).toBe(` ❯ 2. Opus${' '.repeat(21)}Opus 4.5 · Most capable for complex work`);
      expect(lines[lines.length - 1]).toBe(' Enter to confirm · Esc to exit');
    });

    it('should draw nothing below the transcript while suspended', () => {
      expect(texts(makeView({ mode: { kind: 'suspended', previous: { kind: 'normal' } } }))).toHaveLength(5);
    });
  });
});
