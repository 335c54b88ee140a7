import { describe, expect, it } from 'vitest';

import { TranslationError } from '../src/diagnostics/errors.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import type { VmCommand } from '../src/frontend/ast.js';
import type { AsmLine } from '../src/formats/types.js';
import { CodeWriter, describeCommand } from '../src/lowering/codeWriter.js';

function render(lines: readonly AsmLine[]): string[] {
  return lines.map((l) => {
    if (l.kind === 'comment') return `// ${l.text}`;
    if (l.kind === 'label') return `(${l.name})`;
    return l.text;
  });
}

function fragment(writer: CodeWriter, command: VmCommand): string[] {
  const from = writer.lines.length;
  writer.write(command);
  return render(writer.lines.slice(from));
}

function thrown(fn: () => void): TranslationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TranslationError) return err;
    throw err;
  }
  throw new Error('expected a TranslationError');
}

const PUSH_D = ['@SP', 'A=M', 'M=D', '@SP', 'M=M+1'];
const POP_D = ['@SP', 'AM=M-1', 'D=M'];

describe('CodeWriter fragments', () => {
  it('starts every stream with the bootstrap', () => {
    const writer = new CodeWriter();
    const lines = render(writer.lines);
    expect(lines.slice(0, 8)).toEqual(['// bootstrap', '@256', 'D=A', '@SP', 'M=D', '@$RET.0', 'D=A', '@SP']);
    expect(lines.slice(-3)).toEqual(['@Sys.init', '0;JMP', '($RET.0)']);
  });

  it('emits binary and unary arithmetic in place on the stack top', () => {
    const writer = new CodeWriter();
    expect(fragment(writer, { kind: 'Arithmetic', op: 'sub' })).toEqual(['// sub', ...POP_D, 'A=A-1', 'M=M-D']);
    expect(fragment(writer, { kind: 'Arithmetic', op: 'not' })).toEqual(['// not', '@SP', 'A=M-1', 'M=!M']);
  });

  it('gives each comparison its own labels', () => {
    const writer = new CodeWriter();
    const expected = (id: number, jump: string): string[] => [
      ...POP_D,
      'A=A-1',
      'D=M-D',
      `@$TRUE.${id}`,
      `D;${jump}`,
      '@SP',
      'A=M-1',
      'M=0',
      `@$END.${id}`,
      '0;JMP',
      `($TRUE.${id})`,
      '@SP',
      'A=M-1',
      'M=-1',
      `($END.${id})`,
    ];
    // id 0 went to the bootstrap return address
    expect(fragment(writer, { kind: 'Arithmetic', op: 'eq' })).toEqual(['// eq', ...expected(1, 'JEQ')]);
    expect(fragment(writer, { kind: 'Arithmetic', op: 'lt' })).toEqual(['// lt', ...expected(2, 'JLT')]);
  });

  it('addresses register, fixed and constant segments', () => {
    const writer = new CodeWriter();
    const push = (segment: 'local' | 'temp' | 'pointer' | 'constant', index: number): string[] =>
      fragment(writer, { kind: 'MemoryAccess', direction: 'push', segment, index });

    expect(push('local', 2)).toEqual(['// push local 2', '@LCL', 'D=M', '@2', 'A=D+A', 'D=M', ...PUSH_D]);
    expect(push('temp', 7)).toEqual(['// push temp 7', '@12', 'D=M', ...PUSH_D]);
    expect(push('pointer', 1)).toEqual(['// push pointer 1', '@THAT', 'D=M', ...PUSH_D]);
    expect(push('constant', 32767)).toEqual(['// push constant 32767', '@32767', 'D=A', ...PUSH_D]);

    expect(
      fragment(writer, { kind: 'MemoryAccess', direction: 'pop', segment: 'argument', index: 1 }),
    ).toEqual(['// pop argument 1', '@ARG', 'D=M', '@1', 'D=D+A', '@R13', 'M=D', ...POP_D, '@R13', 'A=M', 'M=D']);
  });

  it('names static cells after the current unit', () => {
    const writer = new CodeWriter();
    writer.setUnit('Main');
    expect(
      fragment(writer, { kind: 'MemoryAccess', direction: 'pop', segment: 'static', index: 3 }),
    ).toEqual(['// pop static 3', ...POP_D, '@Main.3', 'M=D']);
    writer.setUnit('Other');
    expect(
      fragment(writer, { kind: 'MemoryAccess', direction: 'push', segment: 'static', index: 3 }),
    ).toEqual(['// push static 3', '@Other.3', 'D=M', ...PUSH_D]);
  });

  it('emits branching commands', () => {
    const writer = new CodeWriter();
    expect(fragment(writer, { kind: 'Label', name: 'f$LOOP' })).toEqual(['// label f$LOOP', '(f$LOOP)']);
    expect(fragment(writer, { kind: 'Goto', name: 'f$LOOP' })).toEqual(['// goto f$LOOP', '@f$LOOP', '0;JMP']);
    expect(fragment(writer, { kind: 'IfGoto', name: 'f$LOOP' })).toEqual([
      '// if-goto f$LOOP',
      ...POP_D,
      '@f$LOOP',
      'D;JNE',
    ]);
  });

  it('reserves locals by advancing SP, or zeroes them on request', () => {
    expect(fragment(new CodeWriter(), { kind: 'Function', name: 'Main.f', nLocals: 3 })).toEqual([
      '// function Main.f 3',
      '(Main.f)',
      '@3',
      'D=A',
      '@SP',
      'M=D+M',
    ]);
    expect(fragment(new CodeWriter(), { kind: 'Function', name: 'Main.g', nLocals: 0 })).toEqual([
      '// function Main.g 0',
      '(Main.g)',
    ]);
    expect(
      fragment(new CodeWriter({ zeroLocals: true }), { kind: 'Function', name: 'Main.h', nLocals: 2 }),
    ).toEqual(['// function Main.h 2', '(Main.h)', '@SP', 'A=M', 'M=0', '@SP', 'M=M+1', '@SP', 'A=M', 'M=0', '@SP', 'M=M+1']);
  });

  it('saves the caller frame on call', () => {
    const writer = new CodeWriter();
    expect(fragment(writer, { kind: 'Call', name: 'Math.max', nArgs: 2 })).toEqual([
      '// call Math.max 2',
      '@$RET.1',
      'D=A',
      ...PUSH_D,
      '@LCL',
      'D=M',
      ...PUSH_D,
      '@ARG',
      'D=M',
      ...PUSH_D,
      '@THIS',
      'D=M',
      ...PUSH_D,
      '@THAT',
      'D=M',
      ...PUSH_D,
      '@SP',
      'D=M',
      '@7',
      'D=D-A',
      '@ARG',
      'M=D',
      '@SP',
      'D=M',
      '@LCL',
      'M=D',
      '@Math.max',
      '0;JMP',
      '($RET.1)',
    ]);
  });

  it('restores the caller frame on return', () => {
    const restore = (pointer: string): string[] => ['@R13', 'AM=M-1', 'D=M', `@${pointer}`, 'M=D'];
    expect(fragment(new CodeWriter(), { kind: 'Return' })).toEqual([
      '// return',
      '@LCL',
      'D=M',
      '@R13',
      'M=D',
      '@5',
      'A=D-A',
      'D=M',
      '@R14',
      'M=D',
      ...POP_D,
      '@ARG',
      'A=M',
      'M=D',
      '@ARG',
      'D=M+1',
      '@SP',
      'M=D',
      ...restore('THAT'),
      ...restore('THIS'),
      ...restore('ARG'),
      ...restore('LCL'),
      '@R14',
      'A=M',
      '0;JMP',
    ]);
  });

  it('tags generated lines with the command they came from', () => {
    const writer = new CodeWriter();
    const span = { file: 'Main.vm', line: 4, column: 3 };
    const from = writer.lines.length;
    writer.write({ kind: 'Arithmetic', op: 'add', span });
    const origins = new Set(writer.lines.slice(from).map((l) => l.origin));
    expect([...origins]).toEqual([{ command: 'add', span }]);
    expect(writer.lines[0]?.origin).toEqual({ command: 'bootstrap' });
  });
});

describe('CodeWriter errors', () => {
  it('rejects pops to constant', () => {
    const err = thrown(() => new CodeWriter().writePushPop('pop', 'constant', 0));
    expect(err.id).toBe(DiagnosticIds.InvalidOperation);
    expect(err.message).toBe('Cannot pop to constant');
  });

  it('rejects unknown segments and operators', () => {
    expect(thrown(() => new CodeWriter().writePushPop('push', 'heap', 0))).toMatchObject({
      id: DiagnosticIds.InvalidSegment,
      message: 'Unknown segment "heap"',
    });
    expect(thrown(() => new CodeWriter().writeArithmetic('mul'))).toMatchObject({
      id: DiagnosticIds.UnknownCommand,
      message: 'Unknown arithmetic command "mul"',
    });
  });

  it('bounds temp and pointer indexes', () => {
    expect(thrown(() => new CodeWriter().writePushPop('push', 'temp', 8)).message).toBe(
      'temp index 8 out of range (0..7)',
    );
    expect(thrown(() => new CodeWriter().writePushPop('pop', 'pointer', 2)).message).toBe(
      'pointer index 2 out of range (0..1)',
    );
    expect(thrown(() => new CodeWriter().writePushPop('push', 'constant', 32768)).message).toBe(
      'constant index must be an integer in 0..32767, got 32768',
    );
  });

  it('keeps the call frame offset within an A-instruction literal', () => {
    const writer = new CodeWriter();
    const from = writer.lines.length;
    writer.writeCall('Main.f', 32762);
    expect(render(writer.lines.slice(from))).toContain('@32767');

    const err = thrown(() => new CodeWriter().writeCall('Main.f', 32763));
    expect(err.id).toBe(DiagnosticIds.InvalidOperation);
    expect(err.message).toBe('argument count must be an integer in 0..32762, got 32763');
  });

  it('needs a unit before touching static', () => {
    expect(thrown(() => new CodeWriter().writePushPop('push', 'static', 0)).message).toBe(
      'static segment used before a translation unit was set',
    );
    expect(thrown(() => new CodeWriter().setUnit('my-unit')).id).toBe(DiagnosticIds.UnitNameInvalid);
  });

  it('rejects names that collide with generated labels', () => {
    expect(thrown(() => new CodeWriter().writeLabel('$RET.0')).message).toBe(
      'Invalid label name "$RET.0"',
    );
    expect(thrown(() => new CodeWriter().writeCall('9lives', 0)).message).toBe(
      'Invalid function name "9lives"',
    );
  });
});

describe('describeCommand', () => {
  it('renders canonical VM text', () => {
    expect(describeCommand({ kind: 'MemoryAccess', direction: 'pop', segment: 'that', index: 4 })).toBe(
      'pop that 4',
    );
    expect(describeCommand({ kind: 'IfGoto', name: 'X' })).toBe('if-goto X');
    expect(describeCommand({ kind: 'Function', name: 'F.g', nLocals: 1 })).toBe('function F.g 1');
    expect(describeCommand({ kind: 'Call', name: 'F.g', nArgs: 0 })).toBe('call F.g 0');
    expect(describeCommand({ kind: 'Return' })).toBe('return');
  });
});
