import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SourceContextResolver, clearSourceCache } from './source-context';

describe('SourceContextResolver', () => {
  let root: string;
  let resolver: SourceContextResolver;

  beforeEach(() => {
    clearSourceCache();
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'faultline-source-'));
    const lines = Array.from({ length: 10 }, (_, i) => `line ${i + 1}`);
    fs.writeFileSync(path.join(root, 'worker.ts'), `${lines.join('\n')}\n`);
    fs.mkdirSync(path.join(root, 'node_modules', 'dep'), { recursive: true });
    fs.writeFileSync(path.join(root, 'node_modules', 'dep', 'index.js'), 'module.exports = 1;\n');

    resolver = new SourceContextResolver({
      rootPath: root,
      pattern: '**/*.{ts,js}',
      excludePatterns: ['**/node_modules/**'],
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should return three lines on each side of line 5', () => {
    const window = resolver.resolve('worker.ts', 5, 3);

    expect(window).toEqual({
      contextLine: 'line 5',
      preContext: ['line 2', 'line 3', 'line 4'],
      postContext: ['line 6', 'line 7', 'line 8'],
    });
  });

  it('should truncate the window at the edges of the file', () => {
    const first = resolver.resolve(path.join(root, 'worker.ts'), 1, 3);
    const last = resolver.resolve(path.join(root, 'worker.ts'), 10, 3);

    expect(first?.preContext).toEqual([]);
    expect(first?.postContext).toEqual(['line 2', 'line 3', 'line 4']);
    expect(last?.preContext).toEqual(['line 7', 'line 8', 'line 9']);
    expect(last?.postContext).toEqual([]);
  });

  it('should return undefined for lines out of range', () => {
    expect(resolver.resolve('worker.ts', 11, 3)).toBeUndefined();
    expect(resolver.resolve('worker.ts', 0, 3)).toBeUndefined();
  });

  it('should return undefined for missing files', () => {
    expect(resolver.resolve('missing.ts', 1, 3)).toBeUndefined();
  });

  it('should preload matching files and skip excluded directories', () => {
    expect(resolver.preload()).toBe(1);
  });

  it('should serve preloaded content after the file is gone', () => {
    resolver.preload();
    fs.rmSync(path.join(root, 'worker.ts'));

    expect(resolver.resolve('worker.ts', 2, 1)?.contextLine).toBe('line 2');
  });
});
