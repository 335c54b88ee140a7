import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { isIdentifier, parseVmFile } from '../src/frontend/parser.js';

function parse(text: string): { commands: ReturnType<typeof parseVmFile>; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const commands = parseVmFile('Main.vm', text, diagnostics);
  return { commands, diagnostics };
}

describe('parseVmFile', () => {
  it('skips comments and blank lines and records 1-based locations', () => {
    const { commands, diagnostics } = parse('push constant 7 // seven\n\n   pop local 0\r\n// only a comment\nadd');
    expect(diagnostics).toEqual([]);
    expect(commands).toEqual([
      {
        kind: 'MemoryAccess',
        direction: 'push',
        segment: 'constant',
        index: 7,
        span: { file: 'Main.vm', line: 1, column: 1 },
      },
      {
        kind: 'MemoryAccess',
        direction: 'pop',
        segment: 'local',
        index: 0,
        span: { file: 'Main.vm', line: 3, column: 4 },
      },
      { kind: 'Arithmetic', op: 'add', span: { file: 'Main.vm', line: 5, column: 1 } },
    ]);
  });

  it('parses every command kind', () => {
    const { commands, diagnostics } = parse(
      [
        'function Main.main 2',
        'label LOOP',
        'if-goto LOOP',
        'goto END',
        'call Math.multiply 2',
        'return',
        'neg',
      ].join('\n'),
    );
    expect(diagnostics).toEqual([]);
    expect(commands.map(({ span: _span, ...rest }) => rest)).toEqual([
      { kind: 'Function', name: 'Main.main', nLocals: 2 },
      { kind: 'Label', name: 'LOOP' },
      { kind: 'IfGoto', name: 'LOOP' },
      { kind: 'Goto', name: 'END' },
      { kind: 'Call', name: 'Math.multiply', nArgs: 2 },
      { kind: 'Return' },
      { kind: 'Arithmetic', op: 'neg' },
    ]);
  });

  it('accepts pop constant; the code generator rejects it', () => {
    const { commands, diagnostics } = parse('pop constant 0');
    expect(diagnostics).toEqual([]);
    expect(commands).toHaveLength(1);
  });

  it('reports every malformed line', () => {
    const { commands, diagnostics } = parse(
      [
        'push constant',
        'pop nowhere 1',
        'push local -1',
        'frobnicate',
        'label 1abc',
        'function f x',
        'add 3',
        'return now',
        'call $RET.0 0',
      ].join('\n'),
    );
    expect(commands).toEqual([]);
    expect(diagnostics.map((d) => [d.id, d.line, d.message])).toEqual([
      [DiagnosticIds.ParseError, 1, 'push expects a segment and an index'],
      [DiagnosticIds.InvalidSegment, 2, 'Unknown segment "nowhere"'],
      [DiagnosticIds.ParseError, 3, 'push expects a non-negative integer index, got "-1"'],
      [DiagnosticIds.UnknownCommand, 4, 'Unknown command "frobnicate"'],
      [DiagnosticIds.ParseError, 5, 'Invalid label name "1abc"'],
      [DiagnosticIds.ParseError, 6, 'function expects a non-negative integer local count, got "x"'],
      [DiagnosticIds.ParseError, 7, 'add expects no operands'],
      [DiagnosticIds.ParseError, 8, 'return expects no operands'],
      [DiagnosticIds.ParseError, 9, 'Invalid function name "$RET.0"'],
    ]);
    expect(diagnostics.every((d) => d.severity === 'error' && d.file === 'Main.vm')).toBe(true);
  });

  it('keeps the good lines around a bad one', () => {
    const { commands, diagnostics } = parse('push constant 1\nbogus\npush constant 2');
    expect(diagnostics).toHaveLength(1);
    expect(commands).toHaveLength(2);
  });
});

describe('isIdentifier', () => {
  it('follows the symbol rules of the assembler', () => {
    expect(isIdentifier('Main.main')).toBe(true);
    expect(isIdentifier('f$LOOP')).toBe(true);
    expect(isIdentifier('_x:1')).toBe(true);
    expect(isIdentifier('$TRUE.0')).toBe(false);
    expect(isIdentifier('2x')).toBe(false);
    expect(isIdentifier('a-b')).toBe(false);
    expect(isIdentifier('')).toBe(false);
  });
});
