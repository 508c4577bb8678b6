import { classifyLine, parseLineno, parseTextStacktrace, parseV8Stack } from './stacktrace';

describe('classifyLine', () => {
  it('should read a failure summary', () => {
    expect(classifyLine('** (ArgumentError) argument error')).toEqual({
      kind: 'summary',
      type: 'ArgumentError',
      value: 'argument error',
      message: '(ArgumentError) argument error',
    });
  });

  it('should read an indented frame line', () => {
    expect(classifyLine('    file.js:42: Billing.charge/1')).toEqual({
      kind: 'frame',
      frame: { filename: 'file.js', lineno: '42', function: 'Billing.charge/1', app: null },
    });
  });

  it('should read the app prefix of a frame line', () => {
    expect(classifyLine('    (stdlib) scheduler.js:615: Scheduler.dispatch/4')).toEqual({
      kind: 'frame',
      frame: {
        filename: 'scheduler.js',
        lineno: '615',
        function: 'Scheduler.dispatch/4',
        app: 'stdlib',
      },
    });
  });

  it('should not treat an unindented frame-like line as a frame', () => {
    expect(classifyLine('file.js:42: Billing.charge/1')).toEqual({ kind: 'ignored' });
  });

  it('should drop a frame line whose line number is not positive', () => {
    expect(classifyLine('    file.js:0: Billing.charge/1')).toEqual({ kind: 'ignored' });
  });

  it('should drop a frame line whose line number is out of range', () => {
    expect(classifyLine('    file.js:99999999999999999999: Billing.charge/1')).toEqual({
      kind: 'ignored',
    });
  });

  it('should read metadata lines', () => {
    expect(classifyLine('Last message: :tick')).toEqual({
      kind: 'metadata',
      key: 'last_message',
      value: ':tick',
    });
    expect(classifyLine('    Args: [1, 2]')).toEqual({ kind: 'metadata', key: 'args', value: '[1, 2]' });
  });

  it('should ignore anything else', () => {
    expect(classifyLine('')).toEqual({ kind: 'ignored' });
    expect(classifyLine('    not a frame at all')).toEqual({ kind: 'ignored' });
  });
});

describe('parseLineno', () => {
  it.each<[number | string, number | null]>([
    ['42', 42],
    [7, 7],
    ['0', null],
    ['-3', null],
    ['4.5', null],
    ['abc', null],
    ['99999999999999999999', null],
  ])('should parse %p as %p', (input, expected) => {
    expect(parseLineno(input)).toBe(expected);
  });
});

describe('parseTextStacktrace', () => {
  const report = [
    'Error in unit worker-7 with exit value:',
    '** (RuntimeError) Unique Error',
    '    (app) lib/worker.js:12: Worker.handle/2',
    '    (stdlib) scheduler.js:615: Scheduler.dispatch/4',
    '    lib/broken.js:0: Broken.zero/0',
    '    this line is not a frame',
    'Last message: :tick',
    'State: { count: 1 }',
    'Last message: :ignored',
    '    Args: [1, 2]',
    'Function: Worker.tick/0',
  ].join('\n');

  it('should extract the exception from the summary line', () => {
    const trace = parseTextStacktrace(report);

    expect(trace.exception).toEqual([{ type: 'RuntimeError', value: 'Unique Error' }]);
    expect(trace.message).toBe('(RuntimeError) Unique Error');
  });

  it('should keep valid frames outer to inner and drop malformed ones', () => {
    const trace = parseTextStacktrace(report);

    expect(trace.frames.map((frame) => frame.function)).toEqual([
      'Scheduler.dispatch/4',
      'Worker.handle/2',
    ]);
  });

  it('should use the innermost frame as culprit', () => {
    expect(parseTextStacktrace(report).culprit).toBe('Worker.handle/2');
  });

  it('should keep the first occurrence of each metadata key', () => {
    expect(parseTextStacktrace(report).extra).toEqual({
      last_message: ':tick',
      state: '{ count: 1 }',
      args: '[1, 2]',
      function: 'Worker.tick/0',
    });
  });

  it('should reset the culprit when a summary line follows frames', () => {
    const trace = parseTextStacktrace(
      ['    a.js:1: A.first/0', '** (KeyError) key not found', '    b.js:2: B.second/0'].join('\n'),
    );

    expect(trace.culprit).toBe('B.second/0');
  });

  it('should use a header line as message when there is no summary', () => {
    const trace = parseTextStacktrace('Error in process <worker-7> with exit value:\n    a.js:3: A.run/0');

    expect(trace.message).toBe('Error in process <worker-7> with exit value:');
    expect(trace.exception).toEqual([]);
    expect(trace.frames).toHaveLength(1);
  });

  it('should return an empty trace for unrelated text', () => {
    expect(parseTextStacktrace('nothing to see\nhere')).toEqual({
      message: null,
      exception: [],
      frames: [],
      culprit: null,
      extra: {},
    });
  });
});

describe('parseV8Stack', () => {
  it('should parse frames innermost last', () => {
    const stack = [
      'Error: boom',
      '    at inner (/app/src/worker.ts:10:5)',
      '    at Object.<anonymous> (/app/src/main.ts:3:1)',
      '    at node:internal/modules/cjs/loader:1234:14',
    ].join('\n');

    expect(parseV8Stack(stack)).toEqual([
      { function: '<anonymous>', filename: 'node:internal/modules/cjs/loader', lineno: 1234, colno: 14 },
      { function: 'Object.<anonymous>', filename: '/app/src/main.ts', lineno: 3, colno: 1 },
      { function: 'inner', filename: '/app/src/worker.ts', lineno: 10, colno: 5 },
    ]);
  });

  it('should ignore the message line even when it looks like a location', () => {
    expect(parseV8Stack('Error: at config.ts:1:2\n    at run (/app/run.ts:5:9)')).toHaveLength(1);
  });

  it('should return no frames without a stack', () => {
    expect(parseV8Stack(undefined)).toEqual([]);
  });
});
