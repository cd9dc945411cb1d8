import { describe, it, expect } from '@jest/globals';
import { canonicalizePath } from '../../../src/utils/path.js';
import { StaticSystemProvider } from '../../../src/utils/provider.js';

describe('canonicalizePath', () => {
  const provider = new StaticSystemProvider('/work', {}, '/home/tester');

  it('相對路徑按工作目錄解析', () => {
    expect(canonicalizePath('a/b', provider)).toBe('/work/a/b');
    expect(canonicalizePath('.', provider)).toBe('/work');
    expect(canonicalizePath('../x', provider)).toBe('/x');
  });

  it('絕對路徑保持不變', () => {
    expect(canonicalizePath('/etc/hosts', provider)).toBe('/etc/hosts');
  });

  it('展開 ~', () => {
    expect(canonicalizePath('~', provider)).toBe('/home/tester');
    expect(canonicalizePath('~/notes.txt', provider)).toBe('/home/tester/notes.txt');
  });

  it('~user 形式不展開', () => {
    expect(canonicalizePath('~other', provider)).toBe('/work/~other');
  });

  it('家目錄未知時報錯', () => {
    const noHome = new StaticSystemProvider('/work');
    expect(() => canonicalizePath('~/x', noHome)).toThrow("Unable to expand '~' in path '~/x'");
  });
});
