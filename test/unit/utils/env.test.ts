import { describe, it, expect } from '@jest/globals';
import { expandEnvVars } from '../../../src/utils/env.js';

describe('expandEnvVars', () => {
  const lookup = (name: string) => (name === 'TOOLS_HOME' ? '/opt/tools' : undefined);

  it('替換 ${env:NAME} 佔位符', () => {
    expect(expandEnvVars({ PATH_EXTRA: '${env:TOOLS_HOME}/bin', PLAIN: 'value' }, lookup)).toEqual({
      PATH_EXTRA: '/opt/tools/bin',
      PLAIN: 'value',
    });
  });

  it('找不到的變量保留為 ${NAME}', () => {
    expect(expandEnvVars({ A: 'x-${env:MISSING}-y' }, lookup)).toEqual({ A: 'x-${MISSING}-y' });
  });

  it('一個值中可以有多個佔位符', () => {
    expect(expandEnvVars({ A: '${env:TOOLS_HOME}:${env:TOOLS_HOME}' }, lookup)).toEqual({
      A: '/opt/tools:/opt/tools',
    });
  });

  it('lookup 拋錯時視為未定義', () => {
    const failing = (): string | undefined => {
      throw new Error('lookup failed');
    };
    expect(expandEnvVars({ A: '${env:X}' }, failing)).toEqual({ A: '${X}' });
  });

  it('不修改輸入', () => {
    const input = { A: '${env:TOOLS_HOME}' };
    expandEnvVars(input, lookup);
    expect(input).toEqual({ A: '${env:TOOLS_HOME}' });
  });
});
